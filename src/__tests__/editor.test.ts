import os from "node:os";
import path from "node:path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { NetlistEditor } from "../netlist/editor.js";
import { ReadOnlyViolationError, ReferenceNotFoundError, StructuralError } from "../netlist/errors.js";

function makeLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "netlist-editor-"));
});

afterEach(async () => {
  await fs.remove(dir);
});

async function writeNetlist(name: string, text: string): Promise<string> {
  const file = path.join(dir, name);
  await fs.outputFile(file, text, "utf-8");
  return file;
}

describe("NetlistEditor", () => {
  it("edits a file and saves elsewhere, leaving the source alone", async () => {
    const source = "R1 in out 1k\n.end\n";
    const file = await writeNetlist("a.net", source);
    const netlist = new NetlistEditor(file, { logger: makeLogger(), simulatorLibraryPaths: [] });
    expect(netlist.encoding).toBe("utf8");

    netlist.setComponentValue("R1", 4700);
    const out = path.join(dir, "out", "a_edited.net");
    netlist.save(out);

    expect(await fs.readFile(out, "utf-8")).toBe("R1 in out 4.7k\n.end\n");
    expect(await fs.readFile(file, "utf-8")).toBe(source);
  });

  it("keeps text after .end", async () => {
    const text = "* t\nR1 a b 1k\n.end\ntrailing notes\n+ not a continuation target\n";
    const netlist = new NetlistEditor(await writeNetlist("b.net", text), { logger: makeLogger() });
    expect(netlist.serialize()).toBe(text);
  });

  it("requires .end", async () => {
    const file = await writeNetlist("c.net", "* t\nR1 a b 1k\n");
    expect(() => new NetlistEditor(file, { logger: makeLogger() })).toThrow(StructuralError);
  });

  it("throws for a missing file unless asked to start blank", () => {
    const file = path.join(dir, "missing.net");
    expect(() => new NetlistEditor(file, { logger: makeLogger() })).toThrow(`Netlist file not found: ${file}`);

    const blank = new NetlistEditor(file, { createBlank: true, logger: makeLogger() });
    expect(blank.serialize()).toBe("* netlist generated by spice-netlist-editor\n.end\n");
    blank.addInstruction(".op");
    blank.save(file);
    expect(fs.readFileSync(file, "utf-8")).toBe("* netlist generated by spice-netlist-editor\n.op\n.end\n");
  });

  it("uses the configured line terminator for new lines", async () => {
    const file = await writeNetlist("d.net", "R1 a b 1k\r\n.end\r\n");
    const netlist = new NetlistEditor(file, { logger: makeLogger(), lineTerminator: "\r\n" });
    netlist.addInstruction(".op");
    expect(netlist.serialize()).toBe("R1 a b 1k\r\n.op\r\n.end\r\n");
  });

  it("writes back the encoding it read", async () => {
    const file = path.join(dir, "e.net");
    await fs.writeFile(file, Buffer.from("\uFEFF* title\nR1 a b 1k\n.end\n", "utf16le"));
    const netlist = new NetlistEditor(file, { logger: makeLogger() });
    expect(netlist.encoding).toBe("utf16le");

    netlist.setComponentValue("R1", "2k");
    netlist.save(netlist.netlistPath);
    expect((await fs.readFile(file)).toString("utf16le")).toBe("\uFEFF* title\nR1 a b 2k\n.end\n");
  });

  it("reset discards edits", async () => {
    const file = await writeNetlist("f.net", AMP);
    const netlist = new NetlistEditor(file, { logger: makeLogger() });
    netlist.setComponentValue("X1:R1", "2k");
    netlist.reset();
    expect(netlist.serialize()).toBe(AMP);
  });
});

const AMP = ".SUBCKT AMP in out\nR1 in out 1k\n.ENDS AMP\nX1 a b AMP\n.end\n";

describe("library subcircuits", () => {
  it("are read-only but editable through an instance clone", async () => {
    await writeNetlist("models.lib", "* models\n.SUBCKT LIBAMP in out\nR1 in out 10k\n.ENDS LIBAMP\n");
    const file = await writeNetlist("main.net", ".include models.lib\nX1 a b LIBAMP\nX2 c d LIBAMP\n.end\n");
    const netlist = new NetlistEditor(file, { logger: makeLogger(), simulatorLibraryPaths: [] });

    const shared = netlist.getSubcircuit("X1");
    expect(shared.isReadOnly()).toBe(true);
    expect(() => shared.setComponentValue("R1", "1k")).toThrow(ReadOnlyViolationError);

    netlist.setComponentValue("X1:R1", "22k");
    expect(netlist.getComponentValue("X1:R1")).toBe("22k");
    expect(netlist.getComponentValue("X2:R1")).toBe("10k");
    expect(netlist.serialize()).toBe(
      [
        ".include models.lib\n",
        "X1 a b LIBAMP_X1\n",
        "X2 c d LIBAMP\n",
        ".SUBCKT LIBAMP_X1 in out\n",
        "R1 in out 22k\n",
        ".ENDS LIBAMP_X1\n",
        ".end\n",
      ].join(""),
    );
  });

  it("are found through custom library paths and nested includes", async () => {
    const libDir = path.join(dir, "libs");
    await fs.outputFile(path.join(libDir, "top.lib"), '.lib "inner.lib" TT\n');
    await fs.outputFile(path.join(libDir, "inner.lib"), ".subckt DEEP a b\nR1 a b 1\n.ends\n");
    const file = await writeNetlist("g.net", ".lib top.lib\nX1 p q DEEP\n.end\n");

    const netlist = new NetlistEditor(file, { logger: makeLogger(), simulatorLibraryPaths: [], libraryPaths: [libDir] });
    expect(netlist.getComponentValue("X1:R1")).toBe("1");
    expect(netlist.getCustomLibraryPaths()).toEqual([libDir]);
  });

  it("warns about missing libraries", async () => {
    const logger = makeLogger();
    const file = await writeNetlist("h.net", ".inc nolib.lib\nX1 a b GHOST\n.end\n");
    const netlist = new NetlistEditor(file, { logger, simulatorLibraryPaths: [] });
    expect(() => netlist.getComponentValue("X1:R1")).toThrow(ReferenceNotFoundError);
    expect(logger.warn).toHaveBeenCalledWith('Library "nolib.lib" not found in the library search paths');
  });

  it("skips library directories that do not exist", async () => {
    const logger = makeLogger();
    const file = await writeNetlist("i.net", "R1 a b 1\n.end\n");
    const missing = path.join(dir, "nowhere");
    const netlist = new NetlistEditor(file, { logger, libraryPaths: [missing] });
    expect(netlist.getCustomLibraryPaths()).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(`Library path "${missing}" is not a directory; ignored`);
  });
});
