import { describe, it, expect } from "vitest";
import {
  firstToken,
  isUniqueInstruction,
  leadingToken,
  lineCommand,
  splitLines,
  splitTerminator,
  tryLineCommand,
} from "../netlist/classify.js";
import { UnknownPrefixError } from "../netlist/errors.js";

describe("lineCommand", () => {
  it("returns the upper-cased component prefix", () => {
    expect(lineCommand("r1 a b 1k")).toBe("R");
    expect(lineCommand("  X1 a b AMP")).toBe("X");
  });

  it("returns the directive keyword", () => {
    expect(lineCommand(".tran 1m")).toBe(".TRAN");
    expect(lineCommand("\t.SubCkt AMP a b\n")).toBe(".SUBCKT");
  });

  it("classifies continuations, comments and blank lines", () => {
    expect(lineCommand("+ c d")).toBe("+");
    expect(lineCommand("* comment")).toBe("*");
    expect(lineCommand("; comment")).toBe("*");
    expect(lineCommand("# comment")).toBe("*");
    expect(lineCommand("")).toBe("*");
    expect(lineCommand("   \n")).toBe("*");
  });

  it("throws for an unknown prefix", () => {
    expect(() => lineCommand("Y1 a b")).toThrow(UnknownPrefixError);
    expect(tryLineCommand("Y1 a b")).toBeUndefined();
  });
});

describe("line helpers", () => {
  it("reads the first token", () => {
    expect(leadingToken("  Rload out 0 1k")).toBe("Rload");
    expect(firstToken("  Rload out 0 1k")).toBe("RLOAD");
  });

  it("recognizes analysis directives", () => {
    expect(isUniqueInstruction(".ac dec 10 1 1k")).toBe(true);
    expect(isUniqueInstruction(".TRAN 1m")).toBe(true);
    expect(isUniqueInstruction(".op")).toBe(false);
  });

  it("splits off the terminator", () => {
    expect(splitTerminator(".end\r\n")).toEqual({ body: ".end", eol: "\r\n" });
    expect(splitTerminator(".end")).toEqual({ body: ".end", eol: "" });
  });

  it("keeps every terminator when splitting text", () => {
    const text = "* a\r\nR1 a b 1\n\n.end";
    expect(splitLines(text)).toEqual(["* a\r\n", "R1 a b 1\n", "\n", ".end"]);
    expect(splitLines(text).join("")).toBe(text);
  });
});
