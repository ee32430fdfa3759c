import path from "node:path";

import { NetlistEditor, type NetlistEditorOptions } from "./netlist/editor.js";
import type { EditSummary, NetlistEncoding } from "./types.js";
import type { EditConfig } from "./util/editConfig.js";
import { defaultLogger, type NetlistLogger } from "./util/logger.js";

export type ApplyEditsOptions = EditConfig & {
  netlist: string;
  lineTerminator?: string;
  simulatorLibraryPaths?: readonly string[];
};

export type ApplyEditsResult = {
  outputPath: string;
  encoding: NetlistEncoding;
  applied: EditSummary;
};

/** `amp.net` -> `amp_edited.net`, next to the source. */
export function defaultOutputPath(netlistPath: string): string {
  const ext = path.extname(netlistPath);
  return path.join(path.dirname(netlistPath), `${path.basename(netlistPath, ext)}_edited${ext}`);
}

/**
 * Opens the netlist, applies every edit of the config in a fixed order and
 * saves the result. The source file is only overwritten when `output` names it.
 *
 * Order: values, models, component parameters, .PARAM values, exact
 * instruction removals, pattern removals, instruction additions.
 */
export function applyEdits(opts: ApplyEditsOptions, logger: NetlistLogger = defaultLogger()): ApplyEditsResult {
  const editorOptions: NetlistEditorOptions = {
    encoding: opts.encoding,
    logger,
    libraryPaths: opts.libraryPaths,
    lineTerminator: opts.lineTerminator,
    simulatorLibraryPaths: opts.simulatorLibraryPaths,
  };
  const netlist = new NetlistEditor(opts.netlist, editorOptions);
  logger.info(`Loaded ${opts.netlist} (${netlist.encoding})`);

  const applied: EditSummary = {
    values: 0,
    models: 0,
    componentParams: 0,
    parameters: 0,
    instructionsAdded: 0,
    instructionsRemoved: 0,
  };

  for (const [reference, value] of Object.entries(opts.values ?? {})) {
    netlist.setComponentValue(reference, value);
    applied.values++;
  }

  for (const [reference, model] of Object.entries(opts.models ?? {})) {
    netlist.setElementModel(reference, model);
    applied.models++;
  }

  for (const [reference, updates] of Object.entries(opts.componentParams ?? {})) {
    netlist.setComponentParameters(reference, updates);
    applied.componentParams++;
  }

  for (const [name, value] of Object.entries(opts.parameters ?? {})) {
    netlist.setParameter(name, value);
    applied.parameters++;
  }

  for (const instruction of opts.removeInstructions ?? []) {
    if (netlist.removeInstruction(instruction)) applied.instructionsRemoved++;
  }

  for (const pattern of opts.removePatterns ?? []) {
    applied.instructionsRemoved += netlist.removeInstructionsMatching(pattern);
  }

  for (const instruction of opts.instructions ?? []) {
    netlist.addInstruction(instruction);
    applied.instructionsAdded++;
  }

  const outputPath = opts.output ?? defaultOutputPath(opts.netlist);
  netlist.save(outputPath);
  logger.info(`Wrote ${outputPath}`);

  return { outputPath, encoding: netlist.encoding, applied };
}
