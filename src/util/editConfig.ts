import fs from "fs-extra";
import path from "node:path";
import { z } from "zod";
import { NETLIST_ENCODINGS, type NetlistEncoding } from "../types.js";

const ValueSchema = z.union([z.string(), z.number()]);

const EncodingSchema = z
  .string()
  .refine((v): v is NetlistEncoding | "autodetect" => v === "autodetect" || NETLIST_ENCODINGS.some((e) => e === v), {
    message: `Expected "autodetect" or one of: ${NETLIST_ENCODINGS.join(", ")}`,
  });

const EditConfigSchema = z
  .object({
    netlist: z.string().optional(),
    output: z.string().optional(),
    encoding: EncodingSchema.optional(),
    values: z.record(ValueSchema).optional(),
    models: z.record(z.string()).optional(),
    componentParams: z.record(z.record(ValueSchema.nullable())).optional(),
    parameters: z.record(ValueSchema).optional(),
    instructions: z.array(z.string()).optional(),
    removeInstructions: z.array(z.string()).optional(),
    removePatterns: z.array(z.string()).optional(),
    libraryPaths: z.array(z.string()).optional(),
  })
  .strict();

export type EditConfig = z.infer<typeof EditConfigSchema>;

function cleanString(v: unknown): string | undefined {
  if (typeof v !== "string") return undefined;
  const s = v.trim();
  return s ? s : undefined;
}

function cleanList(v: string[] | undefined): string[] | undefined {
  const items = (v ?? []).map(cleanString).filter((s): s is string => s !== undefined);
  return items.length ? items : undefined;
}

/** Validates an already-parsed JSON value. Blank strings become undefined. */
export function parseEditConfig(raw: unknown): EditConfig {
  const parsed = EditConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new Error(`Invalid config JSON: ${msg}`);
  }

  const cfg = parsed.data;
  return {
    netlist: cleanString(cfg.netlist),
    output: cleanString(cfg.output),
    encoding: cfg.encoding,
    values: cfg.values,
    models: cfg.models,
    componentParams: cfg.componentParams,
    parameters: cfg.parameters,
    instructions: cleanList(cfg.instructions),
    removeInstructions: cleanList(cfg.removeInstructions),
    removePatterns: cleanList(cfg.removePatterns),
    libraryPaths: cleanList(cfg.libraryPaths),
  };
}

export async function readEditConfig(configPath: string): Promise<EditConfig> {
  const abs = path.resolve(configPath);
  const ok = await fs.pathExists(abs);
  if (!ok) throw new Error(`Config file not found: ${configPath}`);

  const raw: unknown = await fs.readJson(abs);
  const cfg = parseEditConfig(raw);

  // Paths inside the config are relative to the config file.
  const dir = path.dirname(abs);
  return {
    ...cfg,
    netlist: cfg.netlist ? path.resolve(dir, cfg.netlist) : undefined,
    output: cfg.output ? path.resolve(dir, cfg.output) : undefined,
  };
}

export function mergeEditConfig(
  cli: {
    netlist?: unknown;
    output?: unknown;
    encoding?: unknown;
    libraryPath?: unknown;
  },
  cfg: EditConfig,
): EditConfig {
  // CLI wins when explicitly set
  const merged: EditConfig = {
    ...cfg,
  };

  const netlist = cleanString(cli.netlist);
  if (netlist) merged.netlist = netlist;

  const output = cleanString(cli.output);
  if (output) merged.output = output;

  const encoding = cleanString(cli.encoding);
  if (encoding) merged.encoding = parseEditConfig({ encoding }).encoding;

  if (Array.isArray(cli.libraryPath)) {
    const extra = cli.libraryPath.map(cleanString).filter((s): s is string => s !== undefined);
    if (extra.length) merged.libraryPaths = [...(cfg.libraryPaths ?? []), ...extra];
  }

  return merged;
}
