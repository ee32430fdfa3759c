/** Encodings a netlist is read and written with (Node Buffer names). */
export type NetlistEncoding = "utf8" | "utf16le" | "latin1";

export const NETLIST_ENCODINGS: readonly NetlistEncoding[] = ["utf8", "utf16le", "latin1"];

/** Where addComponent puts the new line: before/after an existing reference, or before the end marker. */
export type Placement = { before: string } | { after: string } | undefined;

export interface ComponentSpec {
  reference: string;
  nodes: string[];
  /** Value, formula or model/subcircuit name. */
  value: string | number;
  params?: Record<string, string | number>;
}

export interface EditSummary {
  values: number;
  models: number;
  componentParams: number;
  parameters: number;
  instructionsAdded: number;
  instructionsRemoved: number;
}
