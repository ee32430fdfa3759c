import { describe, it, expect } from "vitest";
import { formatEngineering, parseEngineering } from "../util/engineering.js";

describe("formatEngineering", () => {
  it("uses the kilo suffix", () => {
    expect(formatEngineering(4700)).toBe("4.7k");
    expect(formatEngineering(2200)).toBe("2.2k");
  });

  it("spells mega as Meg", () => {
    expect(formatEngineering(1e6)).toBe("1Meg");
  });

  it("uses milli and nano suffixes", () => {
    expect(formatEngineering(0.0047)).toBe("4.7m");
    expect(formatEngineering(1e-7)).toBe("100n");
  });

  it("leaves values between 1 and 1000 bare", () => {
    expect(formatEngineering(5)).toBe("5");
    expect(formatEngineering(330)).toBe("330");
  });

  it("keeps zero and the sign", () => {
    expect(formatEngineering(0)).toBe("0");
    expect(formatEngineering(-4700)).toBe("-4.7k");
  });
});

describe("parseEngineering", () => {
  it("reads plain and scientific numbers", () => {
    expect(parseEngineering("42")).toBe(42);
    expect(parseEngineering("1e-3")).toBeCloseTo(1e-3);
  });

  it("reads suffixes", () => {
    expect(parseEngineering("4.7k")).toBeCloseTo(4700);
    expect(parseEngineering("10Meg")).toBeCloseTo(1e7);
    expect(parseEngineering("3.3meg")).toBeCloseTo(3.3e6);
    expect(parseEngineering("2.5u")).toBeCloseTo(2.5e-6);
  });

  it("ignores units after the multiplier", () => {
    expect(parseEngineering("100nF")).toBeCloseTo(1e-7);
    expect(parseEngineering("10uH")).toBeCloseTo(1e-5);
  });

  it("reads M as milli", () => {
    expect(parseEngineering("5M")).toBeCloseTo(5e-3);
  });

  it("rejects formulas", () => {
    expect(() => parseEngineering("{R*2}")).toThrow('Cannot read "{R*2}" as a number');
  });
});
