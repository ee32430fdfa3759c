import path from "node:path";
import type { NetlistEncoding } from "../types.js";
import { EncodingDetectError, detectEncoding } from "../util/encoding.js";
import { searchFile } from "../util/fileSearch.js";
import { readTextSync } from "../util/io.js";
import type { NetlistLogger } from "../util/logger.js";
import { CircuitScope, type LibraryLoader } from "./circuit.js";
import { splitLines } from "./classify.js";
import { StructuralError } from "./errors.js";

/** Where LTspice installs its symbol libraries. */
export const DEFAULT_SIMULATOR_LIBRARY_PATHS: readonly string[] = [
  "~/AppData/Local/LTspice/lib/sub",
  "~/Documents/LTspiceXVII/lib/sub",
  "~/Documents/LTspice/lib/sub",
  "C:/Program Files/LTC/LTspiceXVII/lib/sub",
  "C:/Program Files (x86)/LTC/LTspiceIV/lib/sub",
  "~/Library/Application Support/LTspice/lib/sub",
  "~/.wine/drive_c/users/Public/Documents/LTspiceXVII/lib/sub",
];

export type LibraryCacheOptions = {
  logger: NetlistLogger;
  lineTerminator: string;
  /** Consulted on every lookup, after the netlist's directory and the working directory. */
  searchPaths: () => readonly string[];
};

/**
 * Resolves include directives to files and keeps each parsed library for the
 * lifetime of the editor (until clear()). Libraries are read-only scopes with
 * no terminator of their own.
 */
export class LibraryCache implements LibraryLoader {
  private readonly loaded = new Map<string, CircuitScope | null>();

  constructor(private readonly opts: LibraryCacheOptions) {}

  resolve(fileName: string, baseDir: string): string | undefined {
    return searchFile(fileName, baseDir, process.cwd(), ...this.opts.searchPaths());
  }

  load(filePath: string): CircuitScope | undefined {
    const cached = this.loaded.get(filePath);
    if (cached !== undefined) return cached ?? undefined;

    let encoding: NetlistEncoding;
    try {
      encoding = detectEncoding(filePath);
    } catch (e: unknown) {
      if (!(e instanceof EncodingDetectError)) throw e;
      this.opts.logger.warn(`Skipping library ${filePath}: ${e.message}`);
      this.loaded.set(filePath, null);
      return undefined;
    }

    const library = new CircuitScope({
      context: {
        logger: this.opts.logger,
        lineTerminator: this.opts.lineTerminator,
        baseDir: path.dirname(filePath),
        libraries: this,
      },
      terminator: null,
      readOnly: true,
    });
    const source = splitLines(readTextSync(filePath, encoding))[Symbol.iterator]();
    if (!library.collect(source)) throw new StructuralError(`Library ${filePath} has a subcircuit without .ENDS`);

    this.loaded.set(filePath, library);
    return library;
  }

  clear(): void {
    this.loaded.clear();
  }
}
