#!/usr/bin/env node
import "dotenv/config";
import path from "node:path";
import { Command } from "commander";
import chalk from "chalk";

import { applyEdits, defaultOutputPath } from "./applyEdits.js";
import { NetlistEditor, type NetlistEditorOptions } from "./netlist/editor.js";
import { collectConnectivity, netlistToDot, writeDiagram, type RenderFormat } from "./netlist/graph.js";
import type { CircuitScope } from "./netlist/circuit.js";
import { mergeEditConfig, readEditConfig, parseEditConfig } from "./util/editConfig.js";
import { errorMessage, type NetlistLogger } from "./util/logger.js";

type CommonOpts = { encoding?: string; libPath?: string[] };

function cliLogger(): NetlistLogger {
  return {
    info: (m) => console.log(chalk.cyan(m)),
    warn: (m) => console.warn(chalk.yellow(m)),
    error: (m) => console.error(chalk.red(m)),
  };
}

function envLibraryPaths(): string[] {
  return (process.env.SPICE_LIB_PATHS ?? "")
    .split(path.delimiter)
    .map((p) => p.trim())
    .filter(Boolean);
}

function envLineTerminator(): string | undefined {
  const eol = (process.env.SPICE_EOL ?? "").trim().toLowerCase();
  if (eol === "crlf") return "\r\n";
  if (eol === "lf") return "\n";
  return undefined;
}

function editorOptions(opts: CommonOpts): NetlistEditorOptions {
  return {
    encoding: opts.encoding ? parseEditConfig({ encoding: opts.encoding }).encoding : undefined,
    logger: cliLogger(),
    libraryPaths: [...envLibraryPaths(), ...(opts.libPath ?? [])],
    lineTerminator: envLineTerminator(),
  };
}

/** "R1=2k" -> ["R1", "2k"] */
function parseAssignment(text: string): [string, string] {
  const eq = text.indexOf("=");
  if (eq <= 0 || eq === text.length - 1) throw new Error(`Expected NAME=VALUE, got "${text}"`);
  return [text.slice(0, eq).trim(), text.slice(eq + 1).trim()];
}

function fail(e: unknown): void {
  console.error(chalk.red(errorMessage(e)));
  process.exitCode = 2;
}

function scopeFor(netlist: NetlistEditor, subckt?: string): CircuitScope {
  if (!subckt) return netlist;
  const scope = netlist.getSubcircuitNamed(subckt) ?? netlist.findSubcircuitInLibraries(subckt);
  if (!scope) throw new Error(`Subcircuit not found: ${subckt}`);
  return scope;
}

const program = new Command();

program
  .name("spice-netlist-editor")
  .description("Query and edit SPICE netlists without disturbing untouched lines.")
  .version("0.1.0");

program
  .command("show")
  .description("List components, parameters and subcircuit definitions.")
  .argument("<netlist>", "SPICE netlist (.net/.cir)")
  .option("--encoding <name>", "utf8 | utf16le | latin1 | autodetect")
  .option("--lib-path <dir...>", "Extra library directories")
  .option("--subckt <name>", "Show a subcircuit definition instead of the top level")
  .action((netlistPath: string, opts: CommonOpts & { subckt?: string }) => {
    try {
      const netlist = new NetlistEditor(netlistPath, editorOptions(opts));
      const scope = scopeFor(netlist, opts.subckt);

      console.log(chalk.cyan(`Components (${netlist.encoding}):`));
      for (const ref of scope.getComponents()) {
        const nodes = scope.getComponentNodes(ref).join(" ");
        const view = scope.getComponent(ref);
        const value = view.entry.hasValue ? view.value : "";
        console.log(`  ${ref.padEnd(10)} ${nodes.padEnd(24)} ${value}`);
      }

      const params = scope.getAllParameterNames();
      if (params.length) {
        console.log(chalk.cyan("Parameters:"));
        for (const name of params) console.log(`  ${name} = ${scope.getParameter(name)}`);
      }

      const subckts = scope.getSubcircuitNames();
      if (subckts.length) {
        console.log(chalk.cyan("Subcircuits:"));
        for (const name of subckts) console.log(`  ${name}`);
      }
    } catch (e: unknown) {
      fail(e);
    }
  });

program
  .command("nodes")
  .description("Print every node name used by the netlist's top-level components.")
  .argument("<netlist>", "SPICE netlist")
  .option("--encoding <name>", "utf8 | utf16le | latin1 | autodetect")
  .option("--subckt <name>", "Use a subcircuit definition instead of the top level")
  .action((netlistPath: string, opts: CommonOpts & { subckt?: string }) => {
    try {
      const netlist = new NetlistEditor(netlistPath, editorOptions(opts));
      for (const node of scopeFor(netlist, opts.subckt).allNodes()) console.log(node);
    } catch (e: unknown) {
      fail(e);
    }
  });

program
  .command("set")
  .description("Set component values (REF=VALUE, REF may be hierarchical like X1:R1) and write the result.")
  .argument("<netlist>", "SPICE netlist")
  .argument("<assignments...>", "REF=VALUE pairs")
  .option("--param <name=value...>", "Set .PARAM values")
  .option("--model <ref=model...>", "Set element models")
  .option("--add <instruction...>", "Add directives (e.g. \".tran 1m\")")
  .option("--remove <instruction...>", "Remove directives (exact text)")
  .option("--output <path>", "Where to write the edited netlist (default <name>_edited<ext>)")
  .option("--encoding <name>", "utf8 | utf16le | latin1 | autodetect")
  .option("--lib-path <dir...>", "Extra library directories")
  .action(
    (
      netlistPath: string,
      assignments: string[],
      opts: CommonOpts & { param?: string[]; model?: string[]; add?: string[]; remove?: string[]; output?: string },
    ) => {
      try {
        const result = applyEdits(
          {
            netlist: netlistPath,
            output: opts.output ?? defaultOutputPath(netlistPath),
            encoding: editorOptions(opts).encoding,
            values: Object.fromEntries(assignments.map(parseAssignment)),
            models: Object.fromEntries((opts.model ?? []).map(parseAssignment)),
            parameters: Object.fromEntries((opts.param ?? []).map(parseAssignment)),
            instructions: opts.add,
            removeInstructions: opts.remove,
            libraryPaths: [...envLibraryPaths(), ...(opts.libPath ?? [])],
            lineTerminator: envLineTerminator(),
          },
          cliLogger(),
        );
        console.log(chalk.green("Done."));
        console.log(`- ${result.outputPath}`);
      } catch (e: unknown) {
        fail(e);
      }
    },
  );

program
  .command("apply")
  .description("Apply the edits listed in a JSON config file.")
  .requiredOption("--config <path>", "JSON edit config")
  .option("--netlist <path>", "Netlist to edit (overrides config)")
  .option("--output <path>", "Output path (overrides config)")
  .option("--encoding <name>", "utf8 | utf16le | latin1 | autodetect")
  .option("--lib-path <dir...>", "Extra library directories")
  .action(async (opts: CommonOpts & { config: string; netlist?: string; output?: string }) => {
    try {
      const cfg = await readEditConfig(opts.config);
      const merged = mergeEditConfig(
        { netlist: opts.netlist, output: opts.output, encoding: opts.encoding, libraryPath: opts.libPath },
        cfg,
      );
      if (!merged.netlist) {
        console.error(chalk.red("Missing required input. Provide \"netlist\" in the config or --netlist <path>."));
        process.exitCode = 2;
        return;
      }

      const result = applyEdits(
        {
          ...merged,
          netlist: merged.netlist,
          libraryPaths: [...envLibraryPaths(), ...(merged.libraryPaths ?? [])],
          lineTerminator: envLineTerminator(),
        },
        cliLogger(),
      );
      const a = result.applied;
      console.log(chalk.green("Done."));
      console.log(
        `values=${a.values} models=${a.models} componentParams=${a.componentParams} parameters=${a.parameters} ` +
          `added=${a.instructionsAdded} removed=${a.instructionsRemoved}`,
      );
      console.log(`- ${result.outputPath}`);
    } catch (e: unknown) {
      fail(e);
    }
  });

program
  .command("graph")
  .description("Write a Graphviz connectivity diagram (component boxes, net ellipses).")
  .argument("<netlist>", "SPICE netlist")
  .option("--out <base>", "Output path without extension (default: next to the netlist)")
  .option("--png", "Render PNG with Graphviz dot", false)
  .option("--svg", "Render SVG with Graphviz dot", false)
  .option("--dpi <n>", "DPI for PNG rendering", "600")
  .option("--subckt <name>", "Diagram a subcircuit definition instead of the top level")
  .option("--encoding <name>", "utf8 | utf16le | latin1 | autodetect")
  .option("--lib-path <dir...>", "Extra library directories")
  .action(
    async (
      netlistPath: string,
      opts: CommonOpts & { out?: string; png: boolean; svg: boolean; dpi: string; subckt?: string },
    ) => {
      try {
        const logger = cliLogger();
        const netlist = new NetlistEditor(netlistPath, editorOptions(opts));
        const dot = netlistToDot(collectConnectivity(scopeFor(netlist, opts.subckt)));

        const ext = path.extname(netlistPath);
        const base = opts.out ?? path.join(path.dirname(netlistPath), path.basename(netlistPath, ext));
        const formats: RenderFormat[] = [];
        if (opts.png) formats.push("png");
        if (opts.svg) formats.push("svg");
        const dpi = Number.parseInt(opts.dpi, 10) || 600;

        const outputs = await writeDiagram(dot, base, formats, logger, dpi);
        console.log(chalk.green("Done."));
        for (const file of [outputs.dot, outputs.png, outputs.svg]) if (file) console.log(`- ${file}`);
      } catch (e: unknown) {
        fail(e);
      }
    },
  );

await program.parseAsync(process.argv);
