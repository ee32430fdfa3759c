import path from "node:path";
import fs from "fs-extra";
import type { NetlistEncoding } from "../types.js";
import { detectEncoding } from "../util/encoding.js";
import { expandHome } from "../util/fileSearch.js";
import { readTextSync, writeTextSync } from "../util/io.js";
import { defaultLogger, type NetlistLogger } from "../util/logger.js";
import { CircuitScope, type ScopeContext } from "./circuit.js";
import { splitLines } from "./classify.js";
import { StructuralError } from "./errors.js";
import { DEFAULT_SIMULATOR_LIBRARY_PATHS, LibraryCache } from "./library.js";

export const BLANK_NETLIST_HEADER = "* netlist generated by spice-netlist-editor";

/** A netlist starts with a title/comment line or a directive. */
export const NETLIST_PROBE = /^\s*[*.]/m;

export interface NetlistEditorOptions {
  encoding?: NetlistEncoding | "autodetect";
  /** Start from an empty netlist instead of reading the file. */
  createBlank?: boolean;
  logger?: NetlistLogger;
  /** Terminator for lines the editor adds. Default "\n". */
  lineTerminator?: string;
  /** User library directories, searched after the simulator's own. */
  libraryPaths?: string[];
  simulatorLibraryPaths?: readonly string[];
}

/**
 * Root scope of a netlist file. Reads the file on construction, keeps the
 * encoding it was read with, and writes the same encoding back on save().
 *
 * ```ts
 * const netlist = new NetlistEditor("amp.net");
 * netlist.setComponentValue("X1:R1", "2k");
 * netlist.save("amp_edited.net");
 * ```
 */
export class NetlistEditor extends CircuitScope {
  readonly netlistPath: string;
  readonly encoding: NetlistEncoding;
  private readonly libraryCache: LibraryCache;
  private readonly customLibraryPaths: string[];

  constructor(netlistPath: string, options: NetlistEditorOptions = {}) {
    const customLibraryPaths: string[] = [];
    const context = NetlistEditor.buildContext(netlistPath, options, customLibraryPaths);
    super({ context: context.scope, terminator: ".END" });

    this.netlistPath = netlistPath;
    this.libraryCache = context.libraries;
    this.customLibraryPaths = customLibraryPaths;
    this.setCustomLibraryPaths(...(options.libraryPaths ?? []));

    const createBlank = options.createBlank ?? false;
    if (createBlank) {
      this.encoding = options.encoding === undefined || options.encoding === "autodetect" ? "utf8" : options.encoding;
    } else {
      if (!fs.pathExistsSync(netlistPath)) throw new Error(`Netlist file not found: ${netlistPath}`);
      this.encoding =
        options.encoding === undefined || options.encoding === "autodetect"
          ? detectEncoding(netlistPath, NETLIST_PROBE)
          : options.encoding;
    }
    this.reset(createBlank);
  }

  private static buildContext(
    netlistPath: string,
    options: NetlistEditorOptions,
    customLibraryPaths: readonly string[],
  ): { scope: ScopeContext; libraries: LibraryCache } {
    const logger = options.logger ?? defaultLogger();
    const lineTerminator = options.lineTerminator ?? "\n";
    const simulatorPaths = options.simulatorLibraryPaths ?? DEFAULT_SIMULATOR_LIBRARY_PATHS;
    const libraries = new LibraryCache({
      logger,
      lineTerminator,
      searchPaths: () => [...simulatorPaths, ...customLibraryPaths],
    });
    return {
      scope: { logger, lineTerminator, baseDir: path.dirname(path.resolve(netlistPath)), libraries },
      libraries,
    };
  }

  /**
   * Discards every edit and re-reads the file (or starts blank). Text after
   * `.END` is kept as is.
   */
  reset(createBlank = false): void {
    this.lines = [];
    this.modifiedSubcircuits.clear();
    this.libraryCache.clear();

    const eol = this.context.lineTerminator;
    const source = createBlank
      ? [`${BLANK_NETLIST_HEADER}${eol}`, `.end${eol}`]
      : splitLines(readTextSync(this.netlistPath, this.encoding));

    const it = source[Symbol.iterator]();
    if (!this.collect(it)) {
      throw new StructuralError(`Netlist ${this.netlistPath} has missing .END or .ENDS statements`);
    }
    for (let next = it.next(); !next.done; next = it.next()) {
      this.lines.push({ kind: "text", text: next.value });
    }
  }

  /** Writes the edited netlist in the encoding it was read with. Pass `netlistPath` to overwrite the source. */
  save(outputPath: string): void {
    writeTextSync(outputPath, this.serialize(), this.encoding);
  }

  /** Replaces the user library directories. Directories that do not exist are skipped with a warning. */
  setCustomLibraryPaths(...paths: string[]): void {
    this.customLibraryPaths.length = 0;
    for (const p of paths) {
      const dir = expandHome(p);
      if (fs.pathExistsSync(dir) && fs.statSync(dir).isDirectory()) {
        this.customLibraryPaths.push(dir);
      } else {
        this.logger.warn(`Library path "${p}" is not a directory; ignored`);
      }
    }
  }

  getCustomLibraryPaths(): string[] {
    return [...this.customLibraryPaths];
  }
}
