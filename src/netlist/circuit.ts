import type { ComponentSpec, Placement } from "../types.js";
import { formatEngineering, parseEngineering } from "../util/engineering.js";
import type { NetlistLogger } from "../util/logger.js";
import { parseIncludeDirective } from "../util/spiceIncludes.js";
import { isUniqueInstruction, leadingToken, firstToken, lineCommand, splitTerminator, tryLineCommand } from "./classify.js";
import { ComponentView } from "./component.js";
import {
  AmbiguousInstructionError,
  GrammarMismatchError,
  ReadOnlyViolationError,
  ReferenceNotFoundError,
  StructuralError,
} from "./errors.js";
import { isComponentPrefix, lookupGrammar, splitTokens } from "./grammar.js";
import { formatParamValue, paramAssignmentPattern, serializeParams, type ParamUpdates } from "./params.js";

/** Separates instance levels in a hierarchical reference: "X1:X2:R3". */
export const HIERARCHY_DIVIDER = ":";

export type NetlistLine = { kind: "text"; text: string } | { kind: "scope"; scope: CircuitScope };

export interface LibraryLoader {
  /** Absolute path of a library named by an include directive, or undefined when it is nowhere on the search path. */
  resolve(fileName: string, baseDir: string): string | undefined;
  /** Parsed, read-only library; undefined when it cannot be decoded. */
  load(filePath: string): CircuitScope | undefined;
}

/** Shared by every scope of one netlist. */
export interface ScopeContext {
  logger: NetlistLogger;
  /** Terminator given to lines the editor creates. */
  lineTerminator: string;
  /** Directory relative include paths resolve from. */
  baseDir: string;
  libraries: LibraryLoader;
}

export type ScopeTerminator = ".END" | ".ENDS";

export interface CircuitScopeOptions {
  context: ScopeContext;
  parent?: CircuitScope;
  /** Directive that closes the scope; null for a library file, which has none. */
  terminator?: ScopeTerminator | null;
  readOnly?: boolean;
}

type ParamLocation = { index: number; start: number; end: number; value: string };

const SUBCKT_RE = /^\s*\.SUBCKT\s+(?<name>[\w.]+)/di;
const ENDS_RE = /^\s*\.ENDS(?:[ \t]+(?<name>[\w.]+))?/di;

function splitReference(reference: string): [head: string, rest: string | undefined] {
  const i = reference.indexOf(HIERARCHY_DIVIDER);
  if (i < 0) return [reference, undefined];
  return [reference.slice(0, i), reference.slice(i + 1)];
}

function isInstanceReference(reference: string): boolean {
  return reference.trimStart().charAt(0).toUpperCase() === "X";
}

/**
 * An ordered list of netlist lines, some of which are nested subcircuit
 * definitions. The root netlist, every `.SUBCKT ... .ENDS` block and every
 * loaded library file is a CircuitScope.
 *
 * Text is kept byte for byte; edits splice the affected span of a single line
 * and leave the rest untouched, so serialize() of an unedited scope returns
 * its input.
 *
 * Editing a component inside a subcircuit instance ("X1:R1") never touches
 * the shared definition. The first such edit clones the definition under the
 * name `<DEF>_<instance>`, points the instance at the clone, and registers the
 * clone with this scope. Later edits through the same instance go to the clone.
 */
export class CircuitScope {
  protected lines: NetlistLine[] = [];
  readonly parent: CircuitScope | undefined;
  protected readonly context: ScopeContext;
  protected readonly terminator: ScopeTerminator | null;
  private readonly readOnly: boolean;
  /** Clones created for per-instance edits, keyed by upper-cased instance reference. */
  protected readonly modifiedSubcircuits = new Map<string, CircuitScope>();

  constructor(options: CircuitScopeOptions) {
    this.context = options.context;
    this.parent = options.parent;
    this.terminator = options.terminator === undefined ? ".ENDS" : options.terminator;
    this.readOnly = options.readOnly ?? false;
  }

  get logger(): NetlistLogger {
    return this.context.logger;
  }

  get lineCount(): number {
    return this.lines.length;
  }

  lineAt(index: number): NetlistLine {
    const line = this.lines[index];
    if (line === undefined) throw new ReferenceNotFoundError(String(index), `No line at index ${index}`);
    return line;
  }

  textAt(index: number): string {
    const line = this.lineAt(index);
    if (line.kind === "scope") throw new StructuralError(`Line ${index} is a subcircuit definition, not a text line`);
    return line.text;
  }

  replaceText(index: number, text: string): void {
    this.assertWritable();
    this.textAt(index);
    this.lines[index] = { kind: "text", text };
  }

  isReadOnly(): boolean {
    return this.readOnly;
  }

  assertWritable(): void {
    if (this.readOnly) throw new ReadOnlyViolationError(this.describe());
  }

  /**
   * Consumes lines until this scope's terminator. A `.SUBCKT` line opens a
   * nested scope that consumes its own block; a continuation line is joined to
   * the line before it.
   *
   * Returns false when input ran out before the terminator, at any depth.
   */
  collect(source: Iterator<string>): boolean {
    for (let next = source.next(); !next.done; next = source.next()) {
      let line = next.value;
      const cmd = tryLineCommand(line);

      if (cmd === ".SUBCKT") {
        const sub = new CircuitScope({ context: this.context, parent: this, readOnly: this.readOnly });
        sub.lines.push({ kind: "text", text: line });
        if (!sub.collect(source)) return false;
        this.lines.push({ kind: "scope", scope: sub });
        continue;
      }

      if (cmd === "+") {
        this.appendContinuation(line);
        continue;
      }

      if (cmd !== undefined && isComponentPrefix(cmd)) {
        const start = line.length - line.trimStart().length;
        if (line.charAt(start + 1) === "§") line = line.slice(0, start + 1) + line.slice(start + 2);
      }

      this.lines.push({ kind: "text", text: line });
      if (this.terminator !== null && cmd === this.terminator) return true;
    }
    return this.terminator === null;
  }

  private appendContinuation(line: string): void {
    const last = this.lines[this.lines.length - 1];
    if (last === undefined) {
      throw new StructuralError(`Continuation line with nothing to continue: "${line.trimEnd()}"`);
    }
    if (last.kind === "scope") {
      throw new StructuralError(`Continuation line follows a subcircuit definition: "${line.trimEnd()}"`);
    }
    last.text += line;
  }

  // ---------------------------------------------------------------------------
  // Lookup

  /** Index of the first text line whose first token equals `token`, ignoring case. */
  lineStartingWith(token: string): number {
    const wanted = token.toUpperCase();
    const index = this.lines.findIndex((line) => line.kind === "text" && firstToken(line.text) === wanted);
    if (index < 0) throw new ReferenceNotFoundError(token);
    return index;
  }

  getComponent(reference: string): ComponentView {
    const [head, rest] = splitReference(reference);
    if (rest === undefined) return new ComponentView(this, this.lineStartingWith(head));
    return this.instanceScope(head, reference).getComponent(rest);
  }

  /** Definition a (possibly hierarchical) instance reference resolves to, clones first. */
  getSubcircuit(reference: string): CircuitScope {
    const [head, rest] = splitReference(reference);
    const scope = this.instanceScope(head, reference);
    return rest === undefined ? scope : scope.getSubcircuit(rest);
  }

  /** Searches nested definitions here and then in each enclosing scope. Case-insensitive. */
  getSubcircuitNamed(name: string): CircuitScope | undefined {
    const wanted = name.toUpperCase();
    for (const line of this.lines) {
      if (line.kind === "scope" && line.scope.definitionName()?.toUpperCase() === wanted) return line.scope;
    }
    return this.parent?.getSubcircuitNamed(name);
  }

  /**
   * Follows the include directives of this scope and its ancestors. Each
   * library file is visited at most once, which also breaks include cycles.
   */
  findSubcircuitInLibraries(name: string, visited = new Set<string>()): CircuitScope | undefined {
    for (const line of this.lines) {
      if (line.kind !== "text") continue;
      const include = parseIncludeDirective(line.text);
      if (!include) continue;

      const file = this.context.libraries.resolve(include.filePath, this.context.baseDir);
      if (file === undefined) {
        this.logger.warn(`Library "${include.filePath}" not found in the library search paths`);
        continue;
      }
      if (visited.has(file)) continue;
      visited.add(file);

      const library = this.context.libraries.load(file);
      if (!library) continue;
      const found = library.getSubcircuitNamed(name) ?? library.findSubcircuitInLibraries(name, visited);
      if (found) return found;
    }
    return this.parent?.findSubcircuitInLibraries(name, visited);
  }

  private instanceScope(instance: string, reference: string): CircuitScope {
    if (!isInstanceReference(instance)) {
      throw new ReferenceNotFoundError(reference, `"${instance}" is not a subcircuit instance (in "${reference}")`);
    }
    return this.modifiedSubcircuits.get(instance.toUpperCase()) ?? this.definitionOf(instance);
  }

  private definitionOf(instance: string): CircuitScope {
    const name = this.getComponent(instance).value;
    const found = this.getSubcircuitNamed(name) ?? this.findSubcircuitInLibraries(name);
    if (!found) throw new ReferenceNotFoundError(name, `Subcircuit "${name}" used by ${instance} not found`);
    return found;
  }

  /**
   * Runs `apply` against the clone registered for the instance. On first use
   * the clone is built and edited before anything else changes: the instance
   * line is retargeted and the clone registered only when `apply` succeeds.
   */
  private withInstanceClone(instance: string, reference: string, apply: (scope: CircuitScope) => void): void {
    if (!isInstanceReference(instance)) {
      throw new ReferenceNotFoundError(reference, `"${instance}" is not a subcircuit instance (in "${reference}")`);
    }
    const key = instance.toUpperCase();
    const existing = this.modifiedSubcircuits.get(key);
    if (existing) {
      apply(existing);
      return;
    }

    this.assertWritable();
    const definition = this.definitionOf(instance);
    const cloneName = `${definition.name()}_${leadingToken(this.textAt(this.lineStartingWith(instance)))}`;
    const copy = definition.clone(cloneName, this);
    apply(copy);
    this.getComponent(instance).setModel(cloneName);
    this.modifiedSubcircuits.set(key, copy);
    this.logger.info(`Subcircuit ${definition.name()} copied to ${cloneName} for instance ${instance}`);
  }

  private editComponent(reference: string, edit: (view: ComponentView) => void): void {
    const [head, rest] = splitReference(reference);
    if (rest === undefined) {
      edit(this.getComponent(head));
      return;
    }
    this.withInstanceClone(head, reference, (scope) => scope.editComponent(rest, edit));
  }

  /**
   * Deep copy: nested definitions and registered clones are copied too. The
   * copy is always writable, so a library definition can be edited through it.
   */
  clone(newName?: string, parent: CircuitScope | undefined = this.parent): CircuitScope {
    const copy = new CircuitScope({ context: this.context, parent, terminator: this.terminator });
    copy.lines = this.lines.map((line): NetlistLine =>
      line.kind === "text" ? { kind: "text", text: line.text } : { kind: "scope", scope: line.scope.clone(undefined, copy) },
    );
    for (const [key, scope] of this.modifiedSubcircuits) copy.modifiedSubcircuits.set(key, scope.clone(undefined, copy));
    if (newName !== undefined) copy.rename(newName);
    return copy;
  }

  // ---------------------------------------------------------------------------
  // Components

  getComponentValue(reference: string): string {
    return this.getComponent(reference).value;
  }

  getComponentFloatValue(reference: string): number {
    return parseEngineering(this.getComponentValue(reference));
  }

  setComponentValue(reference: string, value: string | number): void {
    this.editComponent(reference, (view) => view.setValue(value));
  }

  setComponentValues(values: Record<string, string | number>): void {
    for (const [reference, value] of Object.entries(values)) this.setComponentValue(reference, value);
  }

  getElementModel(reference: string): string | undefined {
    return this.getComponent(reference).model;
  }

  setElementModel(reference: string, model: string): void {
    this.editComponent(reference, (view) => view.setModel(model));
  }

  getComponentNodes(reference: string): string[] {
    return this.getComponent(reference).nodes;
  }

  getComponentParameters(reference: string): Map<string, string> {
    return this.getComponent(reference).params;
  }

  setComponentParameters(reference: string, updates: ParamUpdates): void {
    this.editComponent(reference, (view) => view.setParams(updates));
  }

  /** References of this scope's own components, in file order. `prefixes` filters by family ("RC"); "*" keeps all. */
  getComponents(prefixes = "*"): string[] {
    const wanted = prefixes.toUpperCase();
    const refs: string[] = [];
    for (const line of this.lines) {
      if (line.kind !== "text") continue;
      const cmd = tryLineCommand(line.text);
      if (cmd === undefined || !isComponentPrefix(cmd)) continue;
      if (wanted !== "*" && !wanted.includes(cmd)) continue;
      refs.push(leadingToken(line.text));
    }
    return refs;
  }

  /**
   * Adds a component line, or replaces the line of an existing component with
   * the same reference. The line must parse under its family's grammar.
   */
  addComponent(spec: ComponentSpec, placement?: Placement): void {
    this.assertWritable();
    const value = typeof spec.value === "number" ? formatEngineering(spec.value) : spec.value;
    const params = spec.params ? serializeParams(new Map(Object.entries(spec.params).map(([k, v]) => [k, formatParamValue(v)]))) : "";
    const body = [spec.reference, ...spec.nodes, value, params].filter((part) => part.length > 0).join(" ");

    const entry = lookupGrammar(body);
    if (!entry.pattern.test(body)) throw new GrammarMismatchError(body, entry.pattern.source);
    const text = body + this.context.lineTerminator;

    const existing = this.lines.findIndex((line) => line.kind === "text" && firstToken(line.text) === spec.reference.toUpperCase());
    if (existing >= 0) {
      this.lines[existing] = { kind: "text", text };
      return;
    }

    let index: number;
    if (placement && "before" in placement) index = this.lineStartingWith(placement.before);
    else if (placement && "after" in placement) index = this.lineStartingWith(placement.after) + 1;
    else index = this.insertionIndex();
    this.lines.splice(index, 0, { kind: "text", text });
  }

  /** Removes a component; a hierarchical reference removes it from the instance's clone. */
  removeComponent(reference: string): void {
    const [head, rest] = splitReference(reference);
    if (rest !== undefined) {
      this.withInstanceClone(head, reference, (scope) => scope.removeComponent(rest));
      return;
    }
    this.assertWritable();
    const index = this.lineStartingWith(head);
    if (!isComponentPrefix(lineCommand(this.textAt(index)))) {
      throw new ReferenceNotFoundError(reference, `"${reference}" is not a component`);
    }
    this.lines.splice(index, 1);
  }

  /** Every node named by a recognizable component line of this scope, first-seen order. */
  allNodes(): string[] {
    const seen = new Set<string>();
    for (const line of this.lines) {
      if (line.kind !== "text") continue;
      const cmd = tryLineCommand(line.text);
      if (cmd === undefined || !isComponentPrefix(cmd)) continue;
      const m = lookupGrammar(cmd).pattern.exec(splitTerminator(line.text).body);
      for (const node of splitTokens(m?.groups?.nodes ?? "")) seen.add(node);
    }
    return Array.from(seen);
  }

  // ---------------------------------------------------------------------------
  // Instructions

  /**
   * Adds a directive before the end marker. An analysis directive replaces the
   * analysis already present, in place; an identical line is not added twice.
   */
  addInstruction(instruction: string): void {
    this.assertWritable();
    const { body } = splitTerminator(instruction);
    const cmd = lineCommand(body);
    if (cmd === ".PARAM") throw new AmbiguousInstructionError(body);

    if (isUniqueInstruction(body)) {
      const current = this.lines.findIndex((line) => line.kind === "text" && isUniqueInstruction(line.text));
      if (current >= 0) {
        const { eol } = splitTerminator(this.textAt(current));
        this.lines[current] = { kind: "text", text: body + (eol || this.context.lineTerminator) };
        return;
      }
    }

    if (this.findInstruction(body) >= 0) return;
    this.lines.splice(this.insertionIndex(), 0, { kind: "text", text: body + this.context.lineTerminator });
  }

  addInstructions(...instructions: string[]): void {
    for (const instruction of instructions) this.addInstruction(instruction);
  }

  removeInstruction(instruction: string): boolean {
    this.assertWritable();
    const { body } = splitTerminator(instruction);
    const index = this.findInstruction(body);
    if (index < 0) {
      this.logger.error(`Instruction "${body}" not found`);
      return false;
    }
    this.lines.splice(index, 1);
    this.logger.info(`Instruction "${body}" removed`);
    return true;
  }

  /**
   * Removes every text line whose start matches `pattern` (case-insensitive
   * when given as a string). Returns how many lines went.
   */
  removeInstructionsMatching(pattern: string | RegExp): number {
    this.assertWritable();
    const re = typeof pattern === "string" ? new RegExp(`^(?:${pattern})`, "i") : pattern;
    const before = this.lines.length;
    this.lines = this.lines.filter((line) => {
      if (line.kind !== "text") return true;
      re.lastIndex = 0;
      return !re.test(line.text);
    });
    const removed = before - this.lines.length;
    if (removed > 0) this.logger.info(`${removed} line(s) matching ${String(re)} removed`);
    else this.logger.error(`No line matches ${String(re)}`);
    return removed;
  }

  private findInstruction(body: string): number {
    return this.lines.findIndex((line) => line.kind === "text" && splitTerminator(line.text).body === body);
  }

  /** Before a `.BACKANNO` line, else before the last terminator line, else at the end. */
  private insertionIndex(): number {
    const backanno = this.lines.findIndex((line) => line.kind === "text" && tryLineCommand(line.text) === ".BACKANNO");
    if (backanno >= 0) return backanno;
    if (this.terminator !== null) {
      for (let i = this.lines.length - 1; i >= 0; i--) {
        const line = this.lines[i];
        if (line.kind === "text" && tryLineCommand(line.text) === this.terminator) return i;
      }
    }
    return this.lines.length;
  }

  // ---------------------------------------------------------------------------
  // .PARAM

  private findParameter(name: string): ParamLocation | undefined {
    const wanted = name.toUpperCase();
    for (let index = 0; index < this.lines.length; index++) {
      const line = this.lines[index];
      if (line.kind !== "text" || tryLineCommand(line.text) !== ".PARAM") continue;
      for (const m of line.text.matchAll(paramAssignmentPattern())) {
        const span = m.indices?.groups?.value;
        const value = m.groups?.value;
        if (m.groups?.name?.toUpperCase() === wanted && span && value !== undefined) {
          return { index, start: span[0], end: span[1], value };
        }
      }
    }
    return undefined;
  }

  getParameter(name: string): string {
    const found = this.findParameter(name);
    if (!found) throw new ReferenceNotFoundError(name, `Parameter "${name}" not found`);
    return found.value;
  }

  /** Rewrites the existing assignment in place, or adds `.PARAM name=value`. */
  setParameter(name: string, value: string | number): void {
    this.assertWritable();
    const text = formatParamValue(value);
    const found = this.findParameter(name);
    if (found) {
      const line = this.textAt(found.index);
      this.lines[found.index] = { kind: "text", text: line.slice(0, found.start) + text + line.slice(found.end) };
      return;
    }
    this.lines.splice(this.insertionIndex(), 0, {
      kind: "text",
      text: `.PARAM ${name}=${text}${this.context.lineTerminator}`,
    });
  }

  setParameters(values: Record<string, string | number>): void {
    for (const [name, value] of Object.entries(values)) this.setParameter(name, value);
  }

  /** Upper-cased, sorted. */
  getAllParameterNames(): string[] {
    const names = new Set<string>();
    for (const line of this.lines) {
      if (line.kind !== "text" || tryLineCommand(line.text) !== ".PARAM") continue;
      for (const m of line.text.matchAll(paramAssignmentPattern())) {
        const name = m.groups?.name;
        if (name) names.add(name.toUpperCase());
      }
    }
    return Array.from(names).sort();
  }

  // ---------------------------------------------------------------------------
  // Naming and output

  name(): string {
    if (this.lines.length === 0) throw new StructuralError("Empty subcircuit");
    const first = this.lines[0];
    if (first.kind !== "text" || tryLineCommand(first.text) !== ".SUBCKT") {
      throw new StructuralError("Unable to find .SUBCKT clause in subcircuit");
    }
    const name = SUBCKT_RE.exec(first.text)?.groups?.name;
    if (name === undefined) throw new StructuralError(`Malformed .SUBCKT clause "${first.text.trimEnd()}"`);
    return name;
  }

  /** Renames the `.SUBCKT` line and the name on `.ENDS`, when it carries one. */
  rename(newName: string): void {
    this.assertWritable();
    if (this.lines.length === 0) {
      const eol = this.context.lineTerminator;
      this.lines.push({ kind: "text", text: `.SUBCKT ${newName}${eol}` }, { kind: "text", text: `.ENDS ${newName}${eol}` });
      return;
    }

    this.name();
    this.spliceName(0, SUBCKT_RE, newName);
    for (let i = this.lines.length - 1; i > 0; i--) {
      const line = this.lines[i];
      if (line.kind === "text" && tryLineCommand(line.text) === ".ENDS") {
        this.spliceName(i, ENDS_RE, newName);
        break;
      }
    }
  }

  private spliceName(index: number, re: RegExp, newName: string): void {
    const text = this.textAt(index);
    const span = re.exec(text)?.indices?.groups?.name;
    if (!span) return;
    this.lines[index] = { kind: "text", text: text.slice(0, span[0]) + newName + text.slice(span[1]) };
  }

  getSubcircuitNames(): string[] {
    const names: string[] = [];
    for (const line of this.lines) {
      if (line.kind !== "scope") continue;
      const name = line.scope.definitionName();
      if (name !== undefined) names.push(name);
    }
    return names;
  }

  /** Name when the scope opens with a well-formed `.SUBCKT` line. */
  protected definitionName(): string | undefined {
    const first = this.lines[0];
    if (first === undefined || first.kind !== "text") return undefined;
    return SUBCKT_RE.exec(first.text)?.groups?.name;
  }

  /**
   * Appends the scope's text to `out`. Clones registered here are written
   * right before the terminator line, or at the end when there is none.
   */
  writeLines(out: string[]): void {
    let flushed = false;
    for (const line of this.lines) {
      if (line.kind === "scope") {
        line.scope.writeLines(out);
        continue;
      }
      if (!flushed && this.terminator !== null && tryLineCommand(line.text) === this.terminator) {
        this.writeClones(out);
        flushed = true;
      }
      out.push(line.text);
    }
    if (!flushed) this.writeClones(out);
  }

  private writeClones(out: string[]): void {
    for (const copy of this.modifiedSubcircuits.values()) {
      const last = out[out.length - 1];
      if (last !== undefined && !/[\r\n]$/.test(last)) out.push(this.context.lineTerminator);
      copy.writeLines(out);
      const end = out[out.length - 1];
      if (end !== undefined && !/[\r\n]$/.test(end)) out.push(this.context.lineTerminator);
    }
  }

  serialize(): string {
    const out: string[] = [];
    this.writeLines(out);
    return out.join("");
  }

  private describe(): string {
    const name = this.definitionName();
    return name === undefined ? "Netlist scope" : `Subcircuit ${name}`;
  }
}
