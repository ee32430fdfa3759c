import os from "node:os";
import path from "node:path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { EncodingDetectError, detectEncoding } from "../util/encoding.js";

const PROBE = /^\s*[*.]/m;
let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "netlist-encoding-"));
});

afterEach(async () => {
  await fs.remove(dir);
});

async function write(name: string, data: Buffer): Promise<string> {
  const file = path.join(dir, name);
  await fs.writeFile(file, data);
  return file;
}

describe("detectEncoding", () => {
  it("detects UTF-8", async () => {
    const file = await write("a.net", Buffer.from("* title\nR1 a b 1k\n.end\n", "utf8"));
    expect(detectEncoding(file, PROBE)).toBe("utf8");
  });

  it("detects UTF-16LE without a byte order mark", async () => {
    const file = await write("b.net", Buffer.from("* title\nR1 a b 1k\n.end\n", "utf16le"));
    expect(detectEncoding(file, PROBE)).toBe("utf16le");
  });

  it("falls back to latin1", async () => {
    const file = await write("c.net", Buffer.from("* résistances\nR1 a b 1k\n.end\n", "latin1"));
    expect(detectEncoding(file, PROBE)).toBe("latin1");
  });

  it("works without an expected pattern", async () => {
    const file = await write("d.lib", Buffer.from(".subckt X a\n.ends\n", "utf8"));
    expect(detectEncoding(file)).toBe("utf8");
  });

  it("fails when the pattern matches under no encoding", async () => {
    const file = await write("e.net", Buffer.from("hello\n", "utf8"));
    expect(() => detectEncoding(file, PROBE)).toThrow(EncodingDetectError);
  });

  it("fails on an empty file", async () => {
    const file = await write("f.net", Buffer.alloc(0));
    expect(() => detectEncoding(file)).toThrow(EncodingDetectError);
  });
});
