/**
 * Centralized tool definitions: name, description, hasArgs, and input schema
 * for every MCP tool, in a single iterable list.
 *
 * tool_registrations.ts loops over TOOL_DEFINITIONS to call server.registerTool().
 */

import { z } from "zod";
import {
  DescriptorSchema,
  EDGE_LINE_STYLES,
  LAYOUT_NAMES,
  NODE_TYPES,
  PROCESS_VARIANTS,
} from "./descriptor.js";

// ─── Tool Definition Types ───────────────────────────────────

interface ToolDefinitionBase {
  /** UPPER_SNAKE_CASE key for the TOOL_NAMES lookup object */
  key: string;
  /** kebab-case name exposed to MCP clients */
  name: string;
  /** Human-readable description shown to MCP clients */
  description: string;
}

export interface ToolDefinitionWithArgs extends ToolDefinitionBase {
  hasArgs: true;
  inputSchema: z.ZodRawShape;
}

export interface ToolDefinitionWithoutArgs extends ToolDefinitionBase {
  hasArgs: false;
}

export type ToolDefinition = ToolDefinitionWithArgs | ToolDefinitionWithoutArgs;

const fields = DescriptorSchema.shape;

/** Input of `generate-diagram`: the descriptor fields plus output options. */
export const generateDiagramInputSchema = {
  title: fields.title.describe("Diagram title, drawn at the top. Defaults to 'Diagram'; pass an empty string for none."),
  subtitle: fields.subtitle.describe("Optional second line under the title."),
  layout: fields.layout.describe(
    `Placement strategy: ${LAYOUT_NAMES.join(", ")}. Unknown values fall back to 'linear' with a diagnostic.`,
  ),
  theme: fields.theme.describe("'light' (default) or 'dark'."),
  nodes: fields.nodes.describe(
    `Nodes in declaration order. Each needs a unique 'id'. 'type' is one of ${NODE_TYPES.join(", ")} (default process). ` +
      `Process nodes take a 'variant' (${PROCESS_VARIANTS.join(", ")}). 'detail' adds a smaller second line. ` +
      "Icon nodes take an 'icon' image reference. 'lane' (swimlane layout) and 'row' (rows layout) place the node.",
  ),
  edges: fields.edges.describe(
    `Connections by node id ('from'/'to'). Optional 'label', 'style' (${EDGE_LINE_STYLES.join(", ")}) ` +
      "and 'color' (green, orange, blue, red, purple, grey).",
  ),
  groups: fields.groups.describe("Labelled containers drawn around their 'members' (node ids)."),
  lanes: fields.lanes.describe("Swimlane bands, top to bottom. Only used by the swimlane layout."),
  grid_columns: fields.grid_columns.describe("Columns for the grid layout (default 3)."),
  flow_columns: fields.flow_columns.describe("Columns for the flow layout. Derived from the node count when omitted."),
  pipeline: fields.pipeline.describe(
    "Pipeline layout steps, left to right. A step is a node id or an array of ids stacked in one column.",
  ),
  compress: z
    .boolean()
    .optional()
    .describe("Deflate and base64-encode the diagram content, as the draw.io desktop app does when saving."),
} satisfies z.ZodRawShape;

// ─── Tool Definitions ────────────────────────────────────────

export const TOOL_DEFINITIONS: readonly ToolDefinition[] = [
  {
    key: "GENERATE_DIAGRAM",
    name: "generate-diagram",
    description:
      "Generate a complete Draw.io diagram from a declarative description of nodes, edges, groups and lanes. " +
      "Nodes are placed by the chosen layout; no coordinates are needed. The response carries the document in " +
      "`diagram_xml` (save it as a .drawio file), layout statistics, and diagnostics for anything that was " +
      "substituted or ignored (unknown layout, unknown node types, edges to missing nodes).",
    hasArgs: true,
    inputSchema: generateDiagramInputSchema,
  },
  {
    key: "LIST_LAYOUTS",
    name: "list-layouts",
    description: "List the available layout strategies with a one-line description of each.",
    hasArgs: false,
  },
  {
    key: "LIST_NODE_TYPES",
    name: "list-node-types",
    description: "List the node types with their default sizes, and the process variants, edge styles and edge colours.",
    hasArgs: false,
  },
];

export const TOOL_NAMES = {
  GENERATE_DIAGRAM: "generate-diagram",
  LIST_LAYOUTS: "list-layouts",
  LIST_NODE_TYPES: "list-node-types",
} as const;
