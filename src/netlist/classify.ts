import { UnknownPrefixError } from "./errors.js";
import { grammarPrefixes, isComponentPrefix } from "./grammar.js";

/**
 * Analysis directives. A netlist runs a single analysis, so adding any one of
 * these replaces whichever is already present.
 */
export const UNIQUE_INSTRUCTIONS: ReadonlySet<string> = new Set([".AC", ".DC", ".TRAN", ".NOISE", ".TF"]);

const COMMENT_CHARS = "#;*\n\r";

/**
 * Command of one logical line:
 *   - the upper-cased component prefix ("R", "X", ...)
 *   - "+" for a continuation line
 *   - "*" for comments and blank lines
 *   - the upper-cased directive keyword (".TRAN", ".SUBCKT", ...)
 */
export function lineCommand(line: string): string {
  const cmd = tryLineCommand(line);
  if (cmd === undefined) throw new UnknownPrefixError(line, grammarPrefixes());
  return cmd;
}

/** Same as lineCommand, but undefined for lines no family or directive claims. */
export function tryLineCommand(line: string): string | undefined {
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === " " || ch === "\t") continue;
    if (isComponentPrefix(ch)) return ch.toUpperCase();
    if (ch === "+") return "+";
    if (COMMENT_CHARS.includes(ch)) return "*";
    if (ch === ".") {
      let j = i + 1;
      while (j < line.length && !" \t\r\n".includes(line[j])) j++;
      return line.slice(i, j).toUpperCase();
    }
    return undefined;
  }
  return "*";
}

/** First whitespace-delimited token as written. */
export function leadingToken(line: string): string {
  const m = /^[ \t]*([^ \t\r\n]*)/.exec(line);
  return m?.[1] ?? "";
}

export function firstToken(line: string): string {
  return leadingToken(line).toUpperCase();
}

export function isUniqueInstruction(line: string): boolean {
  const cmd = tryLineCommand(line);
  return cmd !== undefined && UNIQUE_INSTRUCTIONS.has(cmd);
}

export type SplitLine = { body: string; eol: string };

export function splitTerminator(line: string): SplitLine {
  const m = /(\r\n|\n|\r)$/.exec(line);
  if (!m) return { body: line, eol: "" };
  return { body: line.slice(0, m.index), eol: m[1] };
}

/** Splits text into lines, each keeping its own terminator so that join("") restores the input. */
export function splitLines(text: string): string[] {
  return text.match(/[^\r\n]*(?:\r\n|\n|\r)|[^\r\n]+$/g) ?? [];
}
