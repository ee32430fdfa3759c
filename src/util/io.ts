import fs from "fs-extra";
import type { NetlistEncoding } from "../types.js";

export function readTextSync(filePath: string, encoding: NetlistEncoding): string {
  return fs.readFileSync(filePath).toString(encoding);
}

/** Creates parent directories as needed. */
export function writeTextSync(filePath: string, content: string, encoding: NetlistEncoding): void {
  fs.outputFileSync(filePath, Buffer.from(content, encoding));
}
