/**
 * Engineering notation as SPICE reads it: f p n u m k Meg g t.
 * Note "M" is milli for SPICE; mega is spelled "Meg".
 */

const NEGATIVE_SUFFIXES = ["f", "p", "n", "u", "m"] as const;
const POSITIVE_SUFFIXES = ["", "k", "Meg", "g", "t"] as const;

const MULTIPLIERS: Record<string, number> = {
  f: 1e-15,
  p: 1e-12,
  n: 1e-9,
  u: 1e-6,
  µ: 1e-6,
  m: 1e-3,
  k: 1e3,
  g: 1e9,
  t: 1e12,
};

const NUMBER_RE = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

/** Six significant digits, trailing zeros dropped (printf "%g" without the exponent form). */
function compact(n: number): string {
  return String(Number(n.toPrecision(6)));
}

export function formatEngineering(value: number): string {
  if (value === 0 || !Number.isFinite(value)) return String(value);

  const abs = Math.abs(value);
  let e = Math.floor(Math.log10(abs) / 3);
  // log10 is not exact at powers of 1000; settle on the exponent giving a mantissa in [1, 1000).
  if (abs / 1000 ** e >= 1000) e += 1;
  else if (abs / 1000 ** e < 1) e -= 1;

  if (e === 0) return compact(value);
  if (e < 0 && e >= -NEGATIVE_SUFFIXES.length) {
    return `${compact(value / 1000 ** e)}${NEGATIVE_SUFFIXES[NEGATIVE_SUFFIXES.length + e]}`;
  }
  if (e > 0 && e < POSITIVE_SUFFIXES.length) {
    return `${compact(value / 1000 ** e)}${POSITIVE_SUFFIXES[e]}`;
  }
  return value.toExponential(6).toUpperCase();
}

/**
 * Parses "4.7k", "10Meg", "100nF" or "1e-3". Everything after the last digit
 * is read as multiplier plus unit; units themselves are ignored.
 */
export function parseEngineering(text: string): number {
  const value = text.trim();
  let x = value.length;
  while (x > 0 && !/[0-9]/.test(value[x - 1])) x--;

  const numeric = value.slice(0, x);
  if (!NUMBER_RE.test(numeric)) {
    throw new Error(`Cannot read "${text}" as a number`);
  }
  const base = Number(numeric);

  const suffix = value.slice(x).toLowerCase();
  if (!suffix) return base;
  if (suffix.startsWith("meg")) return base * 1e6;
  return base * (MULTIPLIERS[suffix[0]] ?? 1);
}
