export type IncludeDirective = {
  directive: "include" | "lib";
  fileToken: string;
  filePath: string;
  quote: "\"" | "'" | "";
};

const COMMENT_RE = /^\s*[\*;#]/;

function stripQuotes(s: string): { value: string; quote: "\"" | "'" | "" } {
  const t = s.trim();
  if (t.length >= 2 && t.startsWith("\"") && t.endsWith("\"")) return { value: t.slice(1, -1), quote: "\"" };
  if (t.length >= 2 && t.startsWith("'") && t.endsWith("'")) return { value: t.slice(1, -1), quote: "'" };
  return { value: t, quote: "" };
}

/**
 * Reads `.include`, `.inc` and `.lib` lines. For `.lib` the second token may
 * be a section name; it is ignored.
 *
 *   .include foo.lib
 *   .inc "foo.lib"
 *   .lib "mymodels.lib" TT
 */
export function parseIncludeDirective(line: string): IncludeDirective | undefined {
  const trimmed = line.trim();
  if (!trimmed) return undefined;
  if (COMMENT_RE.test(trimmed)) return undefined;

  const m = trimmed.match(/^\.(include|inc|lib)\s+(.+?)\s*$/i);
  if (!m) return undefined;

  const directive = m[1].toLowerCase() === "lib" ? "lib" : "include";
  const rest = m[2].trim();
  if (!rest) return undefined;

  let fileToken = "";
  if (rest.startsWith("\"")) {
    const j = rest.indexOf("\"", 1);
    if (j > 0) fileToken = rest.slice(0, j + 1);
  } else if (rest.startsWith("'")) {
    const j = rest.indexOf("'", 1);
    if (j > 0) fileToken = rest.slice(0, j + 1);
  } else {
    fileToken = rest.split(/\s+/)[0];
  }

  if (!fileToken) return undefined;
  const { value: filePath, quote } = stripQuotes(fileToken);
  if (!filePath) return undefined;

  return { directive, fileToken, filePath, quote };
}
