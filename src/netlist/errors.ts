/**
 * Errors raised while interpreting or editing a netlist.
 *
 * Every error is thrown synchronously by the operation that needed to read the
 * offending text; nothing is retried or repaired.
 */

export class NetlistError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Missing `.END`/`.ENDS`, a truncated subcircuit, or a misplaced continuation. */
export class StructuralError extends NetlistError {}

/** A line does not fit the grammar registered for its own prefix. */
export class GrammarMismatchError extends NetlistError {
  readonly line: string;
  readonly pattern: string;

  constructor(line: string, pattern: string, detail?: string) {
    const what = detail ? `${detail}: ` : "";
    super(`${what}line "${line.trimEnd()}" doesn't match regular expression "${pattern}"`);
    this.line = line;
    this.pattern = pattern;
  }
}

export class UnknownPrefixError extends NetlistError {
  readonly line: string;

  constructor(line: string, known: readonly string[]) {
    super(`Unrecognized command in line "${line.trimEnd()}" (components must start with one of: ${known.join(",")})`);
    this.line = line;
  }
}

export class ReferenceNotFoundError extends NetlistError {
  readonly reference: string;

  constructor(reference: string, message?: string) {
    super(message ?? `"${reference}" not found in netlist`);
    this.reference = reference;
  }
}

export class ReadOnlyViolationError extends NetlistError {
  constructor(what = "Netlist scope") {
    super(`${what} is read-only (loaded from a library file)`);
  }
}

export class AmbiguousInstructionError extends NetlistError {
  readonly instruction: string;

  constructor(instruction: string) {
    super(`The .PARAM instruction "${instruction.trimEnd()}" must be set through setParameter()`);
    this.instruction = instruction;
  }
}
