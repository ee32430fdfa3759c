import os from "node:os";
import path from "node:path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mergeEditConfig, parseEditConfig, readEditConfig } from "../util/editConfig.js";

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "netlist-config-"));
});

afterEach(async () => {
  await fs.remove(dir);
});

describe("parseEditConfig", () => {
  it("normalizes blank strings", () => {
    const cfg = parseEditConfig({
      netlist: "  ",
      output: " out.net ",
      values: { R1: "2k", C1: 1e-9 },
      instructions: [" .op ", ""],
    });
    expect(cfg.netlist).toBeUndefined();
    expect(cfg.output).toBe("out.net");
    expect(cfg.values).toEqual({ R1: "2k", C1: 1e-9 });
    expect(cfg.instructions).toEqual([".op"]);
  });

  it("accepts null to remove a component parameter", () => {
    const cfg = parseEditConfig({ componentParams: { M1: { W: "2u", AD: null } } });
    expect(cfg.componentParams).toEqual({ M1: { W: "2u", AD: null } });
  });

  it("rejects unknown keys", () => {
    expect(() => parseEditConfig({ bogus: 1 })).toThrow(/^Invalid config JSON: <root>: Unrecognized key/);
  });

  it("rejects unsupported encodings", () => {
    expect(() => parseEditConfig({ encoding: "utf32" })).toThrow(
      'Invalid config JSON: encoding: Expected "autodetect" or one of: utf8, utf16le, latin1',
    );
  });
});

describe("readEditConfig", () => {
  it("resolves paths against the config file", async () => {
    const configPath = path.join(dir, "edits.json");
    await fs.writeJson(configPath, { netlist: "amp.net", output: "out/amp2.net", parameters: { gain: 5 } });
    const cfg = await readEditConfig(configPath);
    expect(cfg.netlist).toBe(path.join(dir, "amp.net"));
    expect(cfg.output).toBe(path.join(dir, "out", "amp2.net"));
    expect(cfg.parameters).toEqual({ gain: 5 });
  });

  it("reports a missing file", async () => {
    await expect(readEditConfig(path.join(dir, "none.json"))).rejects.toThrow("Config file not found");
  });
});

describe("mergeEditConfig", () => {
  it("lets explicit CLI values win", () => {
    const merged = mergeEditConfig(
      { netlist: "cli.net", output: "", encoding: "latin1", libraryPath: ["/extra"] },
      { netlist: "cfg.net", output: "cfg_out.net", libraryPaths: ["/base"] },
    );
    expect(merged).toEqual({
      netlist: "cli.net",
      output: "cfg_out.net",
      encoding: "latin1",
      libraryPaths: ["/base", "/extra"],
    });
  });
});
