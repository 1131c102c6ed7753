/**
 * Diagram descriptor — the declarative input: what appears in the diagram,
 * never where. Parsed and validated once per generation with zod; the
 * resulting {@link DiagramDescriptor} is frozen and read-only from then on.
 *
 * Only structural problems are rejected here (missing `nodes`, wrong field
 * types, duplicate node ids). Unknown enumerated values are kept or replaced
 * by their documented default and reported as diagnostics, so a slightly-off
 * description still produces a diagram.
 */

import { z } from "zod";
import { type Diagnostic, diagnostic } from "./diagnostics.js";
import { THEME_NAMES, type ThemeName } from "./styles/style_config.js";

export const LAYOUT_NAMES = [
  "linear",
  "horizontal",
  "branching",
  "hierarchical",
  "grid",
  "swimlane",
  "flow",
  "rows",
  "pipeline",
] as const;

export type LayoutName = typeof LAYOUT_NAMES[number];

export const NODE_TYPES = [
  "start",
  "end",
  "process",
  "decision",
  "note",
  "icon",
  "panel",
  "success",
  "data_store",
  "actor",
  "cylinder",
  "cloud",
  "junction",
] as const;

export type NodeType = typeof NODE_TYPES[number];

/** Spellings accepted on the wire for the canonical node types. */
export const NODE_TYPE_ALIASES: Readonly<Record<string, NodeType>> = {
  dark_panel: "panel",
  "data-store": "data_store",
  datastore: "data_store",
};

export const PROCESS_VARIANTS = ["primary", "secondary", "accent", "warning", "danger", "neutral"] as const;

export type ProcessVariant = typeof PROCESS_VARIANTS[number];

export const EDGE_LINE_STYLES = ["solid", "curved", "dashed", "dotted", "bidirectional"] as const;

export type EdgeLineStyle = typeof EDGE_LINE_STYLES[number];

export const DEFAULT_TITLE = "Diagram";
export const DEFAULT_GRID_COLUMNS = 3;

export interface DiagramNode {
  readonly id: string;
  readonly label: string;
  /** Canonical type when recognised; otherwise the raw value, resolved by the mapper's fallback. */
  readonly type: string;
  readonly detail?: string;
  readonly variant?: string;
  readonly icon?: string;
  readonly lane?: string;
  readonly row?: string;
}

export interface DiagramEdge {
  readonly from: string;
  readonly to: string;
  readonly label?: string;
  readonly style?: string;
  readonly color?: string;
}

export interface DiagramGroup {
  readonly id: string;
  readonly label: string;
  readonly members: readonly string[];
  readonly color?: string;
}

export interface DiagramLane {
  readonly id: string;
  readonly label: string;
  readonly color?: string;
}

/** One pipeline step: a single node, or a vertical stack of nodes. */
export type PipelineStep = string | readonly string[];

export interface DiagramDescriptor {
  readonly title: string;
  readonly subtitle?: string;
  readonly layout: LayoutName;
  readonly theme: ThemeName;
  readonly nodes: readonly DiagramNode[];
  readonly edges: readonly DiagramEdge[];
  readonly groups: readonly DiagramGroup[];
  readonly lanes: readonly DiagramLane[];
  readonly gridColumns: number;
  readonly flowColumns?: number;
  readonly pipeline?: readonly PipelineStep[];
}

export class DescriptorError extends Error {
  readonly code = "INVALID_DESCRIPTOR";

  constructor(message: string, readonly issues: readonly string[] = []) {
    super(message);
    this.name = "DescriptorError";
  }
}

const optionalText = z.string().optional();

export const NodeSchema = z.object({
  id: z.string().min(1, "node id must not be empty"),
  label: z.string().optional(),
  type: z.string().optional(),
  detail: optionalText,
  variant: optionalText,
  icon: optionalText,
  lane: optionalText,
  row: z.union([z.string(), z.number()]).optional(),
});

export const EdgeSchema = z
  .object({
    from: optionalText,
    to: optionalText,
    source: optionalText,
    target: optionalText,
    label: optionalText,
    style: optionalText,
    color: optionalText,
  })
  .superRefine((edge, ctx) => {
    if ((edge.from ?? edge.source) === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "edge needs 'from'", path: ["from"] });
    }
    if ((edge.to ?? edge.target) === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "edge needs 'to'", path: ["to"] });
    }
  });

export const GroupSchema = z.object({
  id: z.string().min(1),
  label: optionalText,
  members: z.array(z.string()).optional(),
  color: optionalText,
});

export const LaneSchema = z.object({
  id: z.string().min(1),
  label: optionalText,
  color: optionalText,
});

const columnCount = z.number().int().positive();

/**
 * Wire shape of a descriptor. Unknown top-level fields are stripped.
 * Enumerated fields are plain strings here; defaults are applied in
 * {@link normalizeDescriptor} so substitutions can be reported.
 */
export const DescriptorSchema = z.object({
  title: optionalText,
  subtitle: optionalText,
  layout: optionalText,
  theme: optionalText,
  nodes: z.array(NodeSchema, { required_error: "descriptor must contain a 'nodes' array" }),
  edges: z.array(EdgeSchema).optional(),
  groups: z.array(GroupSchema).optional(),
  lanes: z.array(LaneSchema).optional(),
  grid_columns: columnCount.optional(),
  flow_columns: columnCount.optional(),
  pipeline: z.array(z.union([z.string(), z.array(z.string())])).optional(),
});

export interface ParsedDescriptor {
  descriptor: DiagramDescriptor;
  diagnostics: Diagnostic[];
}

function isLayoutName(value: string): value is LayoutName {
  return LAYOUT_NAMES.some((name) => name === value);
}

function isThemeName(value: string): value is ThemeName {
  return THEME_NAMES.some((name) => name === value);
}

/** Map a wire type to its canonical spelling; unknown values pass through. */
export function canonicalNodeType(type: string | undefined): string {
  if (type === undefined || type.length === 0) return "process";
  return Object.hasOwn(NODE_TYPE_ALIASES, type) ? NODE_TYPE_ALIASES[type] : type;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}

/**
 * Apply defaults to a schema-valid descriptor and freeze it.
 * Rejects duplicate node ids.
 */
function normalizeDescriptor(input: z.output<typeof DescriptorSchema>): ParsedDescriptor {
  const diagnostics: Diagnostic[] = [];

  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const node of input.nodes) {
    if (seen.has(node.id)) duplicates.push(node.id);
    seen.add(node.id);
  }
  if (duplicates.length > 0) {
    const unique = [...new Set(duplicates)];
    throw new DescriptorError(
      `Duplicate node id(s): ${unique.join(", ")}`,
      unique.map((id) => `nodes: duplicate id '${id}'`),
    );
  }

  let layout: LayoutName = "linear";
  if (input.layout !== undefined) {
    const requested = input.layout.trim().toLowerCase();
    if (isLayoutName(requested)) {
      layout = requested;
    } else {
      diagnostics.push(diagnostic("UNKNOWN_LAYOUT", `Unknown layout '${input.layout}', using 'linear'`, input.layout));
    }
  }

  let theme: ThemeName = "light";
  if (input.theme !== undefined) {
    const requested = input.theme.trim().toLowerCase();
    if (isThemeName(requested)) {
      theme = requested;
    } else {
      diagnostics.push(diagnostic("UNKNOWN_THEME", `Unknown theme '${input.theme}', using 'light'`, input.theme));
    }
  }

  const nodes: DiagramNode[] = input.nodes.map((node) =>
    Object.freeze({
      id: node.id,
      label: node.label ?? node.id,
      type: canonicalNodeType(node.type),
      ...(node.detail ? { detail: node.detail } : {}),
      ...(node.variant !== undefined ? { variant: node.variant } : {}),
      ...(node.icon !== undefined ? { icon: node.icon } : {}),
      ...(node.lane !== undefined ? { lane: node.lane } : {}),
      ...(node.row !== undefined ? { row: String(node.row) } : {}),
    })
  );

  const edges: DiagramEdge[] = (input.edges ?? []).map((edge) =>
    Object.freeze({
      from: edge.from ?? edge.source ?? "",
      to: edge.to ?? edge.target ?? "",
      ...(edge.label ? { label: edge.label } : {}),
      ...(edge.style !== undefined ? { style: edge.style } : {}),
      ...(edge.color !== undefined ? { color: edge.color } : {}),
    })
  );

  const groups: DiagramGroup[] = (input.groups ?? []).map((group) =>
    Object.freeze({
      id: group.id,
      label: group.label ?? "",
      members: Object.freeze([...(group.members ?? [])]),
      ...(group.color ? { color: group.color } : {}),
    })
  );

  const lanes: DiagramLane[] = (input.lanes ?? []).map((lane) =>
    Object.freeze({
      id: lane.id,
      label: lane.label ?? lane.id,
      ...(lane.color ? { color: lane.color } : {}),
    })
  );

  const descriptor: DiagramDescriptor = {
    title: input.title ?? DEFAULT_TITLE,
    ...(input.subtitle ? { subtitle: input.subtitle } : {}),
    layout,
    theme,
    nodes: Object.freeze(nodes),
    edges: Object.freeze(edges),
    groups: Object.freeze(groups),
    lanes: Object.freeze(lanes),
    gridColumns: input.grid_columns ?? DEFAULT_GRID_COLUMNS,
    ...(input.flow_columns !== undefined ? { flowColumns: input.flow_columns } : {}),
    ...(input.pipeline !== undefined && input.pipeline.length > 0
      ? { pipeline: Object.freeze(input.pipeline.map((step) => (Array.isArray(step) ? Object.freeze([...step]) : step))) }
      : {}),
  };

  return { descriptor: Object.freeze(descriptor), diagnostics };
}

/**
 * Validate a descriptor object (already parsed from JSON).
 * Throws {@link DescriptorError} on malformed input.
 */
export function parseDescriptor(raw: unknown): ParsedDescriptor {
  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
    throw new DescriptorError("Descriptor must be a JSON object");
  }
  const result = DescriptorSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new DescriptorError(`Invalid diagram descriptor: ${issues[0]}`, issues);
  }
  return normalizeDescriptor(result.data);
}

/** Parse descriptor JSON text. Syntax errors surface as {@link DescriptorError}. */
export function parseDescriptorJson(text: string): ParsedDescriptor {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DescriptorError(`Invalid JSON: ${reason}`);
  }
  return parseDescriptor(raw);
}
