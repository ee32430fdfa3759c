import os from "node:os";
import path from "node:path";
import fs from "fs-extra";

export function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/") || p.startsWith("~\\")) return path.join(os.homedir(), p.slice(2));
  return p;
}

/**
 * Looks for `fileName` in each root in order and returns the first existing
 * file. Absolute names are only checked as given.
 */
export function searchFile(fileName: string, ...roots: string[]): string | undefined {
  const name = expandHome(fileName);
  if (path.isAbsolute(name)) return isFile(name) ? name : undefined;

  for (const root of roots) {
    if (!root) continue;
    const candidate = path.resolve(expandHome(root), name);
    if (isFile(candidate)) return candidate;
  }
  return undefined;
}

function isFile(p: string): boolean {
  return fs.pathExistsSync(p) && fs.statSync(p).isFile();
}
