import fs from "fs-extra";
import type { NetlistEncoding } from "../types.js";

export class EncodingDetectError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EncodingDetectError";
  }
}

const CANDIDATES: ReadonlyArray<{ encoding: NetlistEncoding; decoderLabel?: string }> = [
  { encoding: "utf8", decoderLabel: "utf-8" },
  { encoding: "utf16le", decoderLabel: "utf-16le" },
  // latin1 maps every byte, so it only fails on the expected pattern.
  { encoding: "latin1" },
];

function tryDecode(buf: Buffer, encoding: NetlistEncoding, decoderLabel?: string): string | undefined {
  if (decoderLabel) {
    try {
      new TextDecoder(decoderLabel, { fatal: true }).decode(buf);
    } catch {
      // Not valid in this encoding; the caller moves on to the next candidate.
      return undefined;
    }
  }
  return buf.toString(encoding);
}

/**
 * Trial-decodes the file with each supported encoding and returns the first
 * one whose text matches `expectedPattern` (any line, when the pattern uses
 * the m flag). Text decoded as UTF-8 that carries NUL characters is taken to
 * be UTF-16.
 */
export function detectEncoding(filePath: string, expectedPattern?: RegExp): NetlistEncoding {
  const buf = fs.readFileSync(filePath);
  if (buf.length === 0) throw new EncodingDetectError(`Unable to detect encoding of empty file: ${filePath}`);

  for (const { encoding, decoderLabel } of CANDIDATES) {
    const text = tryDecode(buf, encoding, decoderLabel);
    if (text === undefined) continue;
    if (encoding === "utf8" && text.includes("\u0000")) continue;
    if (expectedPattern && !expectedPattern.test(text)) continue;
    return encoding;
  }

  if (expectedPattern) {
    throw new EncodingDetectError(`Expected pattern ${String(expectedPattern)} not found in file: ${filePath}`);
  }
  throw new EncodingDetectError(`Unable to detect encoding of file: ${filePath}`);
}
