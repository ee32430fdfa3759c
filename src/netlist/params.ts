import { formatEngineering } from "../util/engineering.js";
import { GrammarMismatchError } from "./errors.js";
import { splitTokens } from "./grammar.js";

export type ParamValue = string | number;
/** null or undefined removes the key. */
export type ParamUpdates = Record<string, ParamValue | null | undefined>;

/**
 * `name=value` (or `name value`) inside a .PARAM directive. The value is a
 * braced formula kept verbatim, or any single token (number, word, expression).
 */
export function paramAssignmentPattern(name = String.raw`\w+`): RegExp {
  return new RegExp(String.raw`(?<![\w.])(?<name>${name})\s*[= ]\s*(?<value>\{[^}]*\}|[^\s{}=][^\s{}]*)`, "dgi");
}

/**
 * Parses whitespace-separated `key=value` tokens. Spaces around "=" are
 * accepted; a bare key without a value is a GrammarMismatchError.
 */
export function parseParams(text: string): Map<string, string> {
  const params = new Map<string, string>();
  const tokens = splitTokens(text.replace(/\s*=\s*/g, "="));
  for (const token of tokens) {
    const eq = token.indexOf("=");
    if (eq <= 0 || eq === token.length - 1) {
      throw new GrammarMismatchError(text, "key=value ...", `Malformed parameter "${token}"`);
    }
    params.set(token.slice(0, eq), token.slice(eq + 1));
  }
  return params;
}

export function formatParamValue(value: ParamValue): string {
  return typeof value === "number" ? formatEngineering(value) : value.trim();
}

/**
 * Applies updates on top of existing params. Keys match case-insensitively and
 * keep their existing spelling and position; new keys are appended.
 */
export function mergeParams(existing: ReadonlyMap<string, string>, updates: ParamUpdates): Map<string, string> {
  const merged = new Map(existing);
  for (const [key, value] of Object.entries(updates)) {
    const current = findKey(merged, key);
    if (value === null || value === undefined) {
      if (current !== undefined) merged.delete(current);
      continue;
    }
    merged.set(current ?? key, formatParamValue(value));
  }
  return merged;
}

export function serializeParams(params: ReadonlyMap<string, string>): string {
  return Array.from(params, ([k, v]) => `${k}=${v}`).join(" ");
}

function findKey(params: ReadonlyMap<string, string>, key: string): string | undefined {
  const upper = key.toUpperCase();
  for (const k of params.keys()) {
    if (k.toUpperCase() === upper) return k;
  }
  return undefined;
}
