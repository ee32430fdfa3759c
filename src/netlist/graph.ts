import path from "node:path";
import { execa } from "execa";
import fs from "fs-extra";
import type { NetlistLogger } from "../util/logger.js";
import type { CircuitScope } from "./circuit.js";

export interface Connection {
  reference: string;
  nodes: string[];
}

/** Components of one scope with the nodes they tie together; nested definitions are not descended into. */
export function collectConnectivity(scope: CircuitScope): Connection[] {
  return scope.getComponents().map((reference) => ({ reference, nodes: scope.getComponentNodes(reference) }));
}

export function netlistToDot(connections: Connection[]): string {
  // bipartite graph: components (boxes) and nets (ellipses)
  const nets = new Set<string>();
  for (const c of connections) for (const n of c.nodes) nets.add(n);

  const sanitize = (s: string) => s.replace(/[^a-zA-Z0-9_]/g, "_");
  const label = (s: string) => s.replace(/["\\]/g, "\\$&");

  let dot = "digraph G {\n";
  dot += "  rankdir=LR;\n";
  dot += "  graph [splines=true, overlap=false];\n";
  dot += "  node  [fontsize=10];\n\n";

  dot += "  // Nets\n";
  for (const n of nets) {
    dot += `  net_${sanitize(n)} [label="${label(n)}", shape=ellipse];\n`;
  }
  dot += "\n  // Components\n";
  for (const c of connections) {
    dot += `  comp_${sanitize(c.reference)} [label="${label(c.reference)}", shape=box];\n`;
  }

  dot += "\n  // Edges (net -> component)\n";
  for (const c of connections) {
    for (const n of c.nodes) {
      dot += `  net_${sanitize(n)} -> comp_${sanitize(c.reference)};\n`;
    }
  }

  dot += "}\n";
  return dot;
}

export type RenderFormat = "png" | "svg";

export type DiagramOutputs = { dot: string; png?: string; svg?: string };

function isMissingExecutable(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}

/**
 * Writes `<base>.dot` and renders the requested formats with Graphviz. A
 * missing or failing `dot` binary only costs the rendered files.
 */
export async function writeDiagram(
  dotText: string,
  basePath: string,
  formats: RenderFormat[],
  logger: NetlistLogger,
  dpi = 600,
): Promise<DiagramOutputs> {
  const dotPath = `${basePath}.dot`;
  await fs.outputFile(dotPath, dotText, "utf-8");
  const outputs: DiagramOutputs = { dot: dotPath };

  for (const format of formats) {
    const target = `${basePath}.${format}`;
    const args = format === "png" ? [`-Gdpi=${dpi}`, "-Tpng", dotPath, "-o", target] : ["-Tsvg", dotPath, "-o", target];
    try {
      await execa("dot", args);
      outputs[format] = target;
      logger.info(`Rendered ${path.basename(target)} via Graphviz.`);
    } catch (e: unknown) {
      if (isMissingExecutable(e)) {
        logger.warn(`Graphviz 'dot' not found; wrote ${path.basename(dotPath)} only.`);
        break;
      }
      logger.warn(`Graphviz failed to render ${path.basename(target)}; continuing.`);
    }
  }
  return outputs;
}
