import { UnknownPrefixError } from "./errors.js";

/**
 * Grammar table: one row per component family, keyed by the designator's
 * leading character.
 *
 * Every pattern exposes the same named groups so the component view can work
 * on any family without branching:
 *   designator  reference, e.g. R1
 *   nodes       whitespace-separated node list
 *   model       optional model name (only families with modelSpan "model")
 *   value       value, formula ({...}) or model/subcircuit name
 *   params      trailing key=value tokens
 *
 * Patterns are matched against one logical line (continuations already
 * joined, line terminator removed). Field separators also accept a
 * continuation break so that "R1 a\n+ b 1k" parses like "R1 a b 1k".
 */

export type ComponentKind =
  | "special-function"
  | "behavioral-source"
  | "capacitor"
  | "diode"
  | "vcvs"
  | "cccs"
  | "vccs"
  | "ccvs"
  | "current-source"
  | "jfet"
  | "mutual-inductance"
  | "inductor"
  | "mosfet"
  | "lossy-line"
  | "bjt"
  | "resistor"
  | "voltage-switch"
  | "lossless-line"
  | "rc-line"
  | "voltage-source"
  | "current-switch"
  | "subcircuit-call"
  | "mesfet"
  | "fra-wiggler"
  | "vendor-extension";

/**
 * Where the "model" of a family lives:
 * - "model": its own optional capture, distinct from the value (R, C)
 * - "value": the value span is the model name (D, Q, M, X, sources...)
 * - "none":  the family has neither
 */
export type ModelSpan = "model" | "value" | "none";

export interface GrammarEntry {
  readonly prefix: string;
  readonly kind: ComponentKind;
  readonly pattern: RegExp;
  readonly modelSpan: ModelSpan;
  readonly hasValue: boolean;
  readonly hasParams: boolean;
}

/** Whitespace between fields, or a continuation break ("\n+"). */
const SP = String.raw`(?:[ \t]*\r?\n\+[ \t]*|\s+)`;
const SEPARATOR_RE = /[ \t]*\r?\n\+[ \t]*|\s+/;

const FLOAT = String.raw`[-+]?[0-9]*\.?[0-9]+(?:[eE][-+]?[0-9]+)?`;
const PARAMS = String.raw`(?<params>(?:${SP}\w+\s*(?:=\s*[\w{}()\-+*/%.]+)?)*)?`;
const STRICT_PARAMS = String.raw`(?<params>(?:${SP}\w+\s*=\s*[\w{}()\-+*/%.]+)*)`;
/** A model-like word that is not the key of a key=value pair. */
const WORD_VALUE = String.raw`(?<value>\w+)(?!\w|\s*=)`;

function nodes(min: number, max = min): string {
  const count = min === max ? `{${min}}` : `{${min},${max}}`;
  return String.raw`(?<nodes>(?:${SP}\S+)${count})`;
}

function designator(prefix: string, body = String.raw`\w+`): string {
  return String.raw`^[ \t]*(?<designator>${escapePrefix(prefix)}§?${body})`;
}

function valueOrFormula(number: string): string {
  return String.raw`(?<value>\{.*\}|${number})`;
}

function escapePrefix(prefix: string): string {
  return prefix.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

type RowOptions = Partial<Pick<GrammarEntry, "modelSpan" | "hasValue" | "hasParams">>;

function row(prefix: string, kind: ComponentKind, source: string, opts: RowOptions = {}): GrammarEntry {
  return Object.freeze({
    prefix,
    kind,
    pattern: new RegExp(source, "dis"),
    modelSpan: opts.modelSpan ?? "value",
    hasValue: opts.hasValue ?? true,
    hasParams: opts.hasParams ?? false,
  });
}

/** Families whose trailing text is free-form: everything after the nodes is the value. */
function freeForm(prefix: string, kind: ComponentKind, minNodes: number, maxNodes = minNodes): GrammarEntry {
  return row(prefix, kind, `${designator(prefix)}${nodes(minNodes, maxNodes)}${SP}(?<value>.*)$`);
}

/** Families whose value is a model name followed by optional parameters. */
function modelled(prefix: string, kind: ComponentKind, minNodes: number, maxNodes = minNodes): GrammarEntry {
  return row(prefix, kind, `${designator(prefix)}${nodes(minNodes, maxNodes)}${SP}${WORD_VALUE}${PARAMS}.*?$`, {
    hasParams: true,
  });
}

/** Independent sources: value runs up to the trailing key=value block. */
function source(prefix: string, kind: ComponentKind): GrammarEntry {
  return row(prefix, kind, `${designator(prefix)}${nodes(2)}${SP}(?<value>.*?)${STRICT_PARAMS}$`, { hasParams: true });
}

/** Vendor-extended families with large fixed or ranged node counts. */
function extended(prefix: string, minNodes: number, maxNodes = minNodes): GrammarEntry {
  return row(
    prefix,
    "vendor-extension",
    `${designator(prefix)}${nodes(minNodes, maxNodes)}${SP}(?<value>[^\\s=]+)(?![^\\s=]|\\s*=)${PARAMS}.*?$`,
    { hasParams: true },
  );
}

const ROWS: readonly GrammarEntry[] = [
  row("A", "special-function", `${designator("A")}${nodes(8)}${SP}${WORD_VALUE}${PARAMS}.*?$`, { hasParams: true }),
  row("B", "behavioral-source", `${designator("B", String.raw`[VI]?\w+`)}${nodes(2)}${SP}(?<value>.*)$`),
  row(
    "C",
    "capacitor",
    `${designator("C")}${nodes(2)}(?:${SP}(?<model>\\w+))?${SP}${valueOrFormula(`${FLOAT}[muµnpfgt]?F?`)}${PARAMS}.*?$`,
    { modelSpan: "model", hasParams: true },
  ),
  modelled("D", "diode", 2),
  freeForm("E", "vcvs", 2, 4),
  freeForm("F", "cccs", 2),
  freeForm("G", "vccs", 2, 4),
  freeForm("H", "ccvs", 2),
  source("I", "current-source"),
  modelled("J", "jfet", 3),
  row("K", "mutual-inductance", `${designator("K")}${nodes(2, 4)}${SP}(?<value>[+-]?[0-9.E+-]+[kmuµnpgt]?).*$`),
  row(
    "L",
    "inductor",
    `${designator("L")}${nodes(2)}${SP}${valueOrFormula(`[0-9.E+-]+(?:Meg|[kmuµnpgt])?H?`)}${PARAMS}.*?$`,
    { hasParams: true },
  ),
  modelled("M", "mosfet", 3, 4),
  modelled("O", "lossy-line", 4),
  modelled("Q", "bjt", 3, 4),
  row(
    "R",
    "resistor",
    `${designator("R")}${nodes(2)}(?:${SP}(?<model>\\w+))?${SP}(?:R=)?${valueOrFormula(`${FLOAT}(?:Meg|[kRmuµnpfgt])?\\d*`)}${PARAMS}.*?$`,
    { modelSpan: "model", hasParams: true },
  ),
  freeForm("S", "voltage-switch", 4),
  freeForm("T", "lossless-line", 4),
  freeForm("U", "rc-line", 3),
  source("V", "voltage-source"),
  freeForm("W", "current-switch", 2),
  row(
    "X",
    "subcircuit-call",
    `${designator("X")}${nodes(1, 99)}${SP}(?<value>[\\w.]+)(?![\\w.]|\\s*=)(?:${SP}params:)?${PARAMS}\\s*\\\\?$`,
    { hasParams: true },
  ),
  row("Z", "mesfet", `${designator("Z")}${nodes(3)}${SP}${WORD_VALUE}.*$`),
  row("@", "fra-wiggler", `${designator("@", String.raw`\d+`)}${nodes(2)}\\s?(?<params>.*)$`, {
    modelSpan: "none",
    hasValue: false,
    hasParams: true,
  }),
  extended("Ã", 16),
  extended("¥", 16),
  extended("€", 32),
  extended("£", 64),
  extended("Ø", 1, 99),
  extended("×", 4, 16),
  row("Ö", "vendor-extension", `${designator("Ö")}${nodes(5)}${SP}(?<params>.*?)\\s*\\\\?$`, {
    modelSpan: "none",
    hasValue: false,
    hasParams: true,
  }),
];

const GRAMMAR: ReadonlyMap<string, GrammarEntry> = new Map(ROWS.map((entry) => [entry.prefix, entry]));

export function grammarPrefixes(): string[] {
  return Array.from(GRAMMAR.keys());
}

export function isComponentPrefix(ch: string): boolean {
  return GRAMMAR.has(ch.toUpperCase());
}

/** Throws UnknownPrefixError when no family is registered for the line's first character. */
export function lookupGrammar(prefixOrLine: string): GrammarEntry {
  const prefix = prefixOrLine.trimStart().charAt(0).toUpperCase();
  const entry = GRAMMAR.get(prefix);
  if (!entry) throw new UnknownPrefixError(prefixOrLine, grammarPrefixes());
  return entry;
}

/** Splits a captured span into tokens, treating continuation breaks as whitespace. */
export function splitTokens(text: string): string[] {
  return text.split(SEPARATOR_RE).filter((t) => t.length > 0);
}
