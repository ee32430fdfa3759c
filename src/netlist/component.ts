import { formatEngineering } from "../util/engineering.js";
import type { CircuitScope } from "./circuit.js";
import { splitTerminator } from "./classify.js";
import { GrammarMismatchError } from "./errors.js";
import { lookupGrammar, splitTokens, type GrammarEntry } from "./grammar.js";
import { mergeParams, parseParams, serializeParams, type ParamUpdates } from "./params.js";

type Span = readonly [start: number, end: number];

interface ParsedLine {
  text: string;
  entry: GrammarEntry;
  groups: Partial<Record<string, string>>;
  spans: Partial<Record<string, Span>>;
}

/**
 * Read/write view over the component line at `index` of a scope.
 *
 * The view holds no parsed state: every getter and setter re-reads the line,
 * so it stays correct after other edits touch the same line. It is still meant
 * to be short-lived, because inserting or removing lines shifts indices.
 */
export class ComponentView {
  constructor(
    readonly scope: CircuitScope,
    readonly index: number,
  ) {
    this.parse();
  }

  get line(): string {
    return this.scope.textAt(this.index);
  }

  get entry(): GrammarEntry {
    return this.parse().entry;
  }

  get reference(): string {
    return this.parse().groups.designator ?? "";
  }

  get nodes(): string[] {
    return splitTokens(this.parse().groups.nodes ?? "");
  }

  get value(): string {
    const parsed = this.parse();
    if (!parsed.entry.hasValue) throw this.mismatch(parsed, "this component has no value field");
    return parsed.groups.value ?? "";
  }

  /** Model name; the value itself for families whose model aliases the value. */
  get model(): string | undefined {
    const { entry, groups } = this.parse();
    switch (entry.modelSpan) {
      case "model":
        return groups.model;
      case "value":
        return groups.value;
      case "none":
        return undefined;
    }
  }

  get params(): Map<string, string> {
    const { entry, groups } = this.parse();
    if (!entry.hasParams) return new Map();
    return parseParams(groups.params ?? "");
  }

  /** Numbers are written in engineering notation (4700 -> 4.7k). */
  setValue(value: string | number): void {
    this.scope.assertWritable();
    const parsed = this.parse();
    const span = parsed.spans.value;
    if (!parsed.entry.hasValue || !span) throw this.mismatch(parsed, "this component has no value field");
    const text = typeof value === "number" ? formatEngineering(value) : value;
    this.splice(parsed, span, text);
  }

  setModel(model: string): void {
    this.scope.assertWritable();
    const parsed = this.parse();
    const { entry, spans } = parsed;
    switch (entry.modelSpan) {
      case "value": {
        const span = spans.value;
        if (!span) throw this.mismatch(parsed, "this component has no model field");
        this.splice(parsed, span, model);
        return;
      }
      case "model": {
        const span = spans.model;
        if (span) {
          this.splice(parsed, span, model);
          return;
        }
        const nodesEnd = spans.nodes?.[1];
        if (nodesEnd === undefined) throw this.mismatch(parsed, "this component has no model field");
        this.splice(parsed, [nodesEnd, nodesEnd], ` ${model}`);
        return;
      }
      case "none":
        throw this.mismatch(parsed, "this component has no model field");
    }
  }

  setParams(updates: ParamUpdates): void {
    this.scope.assertWritable();
    const parsed = this.parse();
    const { entry, groups, spans, text } = parsed;
    if (!entry.hasParams) throw this.mismatch(parsed, "this component takes no key=value parameters");

    const original = groups.params ?? "";
    const merged = serializeParams(mergeParams(parseParams(original), updates));

    const anchor = spans.value?.[1] ?? spans.nodes?.[1] ?? text.length;
    const span: Span = spans.params ?? [anchor, anchor];
    const needsLead = /^\s/.test(original) || (span[0] > 0 && !/\s/.test(text[span[0] - 1]));
    this.splice(parsed, span, merged ? `${needsLead ? " " : ""}${merged}` : "");
  }

  private parse(): ParsedLine {
    const text = this.scope.textAt(this.index);
    const entry = lookupGrammar(text);
    const { body } = splitTerminator(text);
    const m = entry.pattern.exec(body);
    if (!m) throw new GrammarMismatchError(text, entry.pattern.source);
    return {
      text,
      entry,
      groups: m.groups ?? {},
      spans: m.indices?.groups ?? {},
    };
  }

  private splice(parsed: ParsedLine, [start, end]: Span, replacement: string): void {
    const next = parsed.text.slice(0, start) + replacement + parsed.text.slice(end);
    this.scope.replaceText(this.index, next);
  }

  private mismatch(parsed: ParsedLine, detail: string): GrammarMismatchError {
    return new GrammarMismatchError(parsed.text, parsed.entry.pattern.source, detail);
  }
}
