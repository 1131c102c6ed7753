/**
 * Diagram generation: descriptor in, draw.io document out.
 *
 *   descriptor → style context → layout strategy → group/lane geometry →
 *   document assembly
 *
 * Pure and synchronous apart from the first read of the shipped style
 * configuration (cached afterwards). Nothing here keeps state between calls.
 */

import { type DiagramDescriptor, type DiagramNode, parseDescriptor } from "./descriptor.js";
import { type Diagnostic, diagnostic } from "./diagnostics.js";
import { DiagramModel } from "./diagram_model.js";
import { deriveGroupGeometry, deriveLaneGeometry, type GroupGeometry, type LaneGeometry, nodeBox } from "./geometry.js";
import { getLayout } from "./layout/index.js";
import { planLanes } from "./layout/swimlane.js";
import type { Box, PositionMap } from "./layout/types.js";
import {
  edgeStyle,
  isEdgeLineStyle,
  isKnownNodeType,
  lookup,
  nodeDimensions,
  nodeStyle,
} from "./styles/node_styles.js";
import { createStyleContext, loadDefaultStyleConfig, type StyleConfig, type StyleContext } from "./styles/style_config.js";
import { escapeHtml } from "./utils.js";

export interface GenerateOptions {
  /** Style configuration to use instead of the shipped `config/styles.json`. */
  styleConfig?: StyleConfig;
  /** Deflate + base64 the diagram content, as draw.io does when saving. */
  compress?: boolean;
  /** Rewrites icon references before they enter a style, e.g. to embed files. */
  resolveIcon?: (reference: string) => string;
}

export type AssembleOptions = Pick<GenerateOptions, "compress" | "resolveIcon">;

export interface DiagramStats {
  layout: string;
  theme: string;
  nodes: number;
  edges: number;
  groups: number;
  lanes: number;
  pageWidth: number;
  pageHeight: number;
}

export interface GenerateResult {
  xml: string;
  diagnostics: Diagnostic[];
  stats: DiagramStats;
  /** Final node positions, in placement order. */
  positions: PositionMap;
}

const LIGHT_GROUP_FILL = "#F8FAFC";
const DARK_GROUP_FILL = "#1E293B";
const DEFAULT_PAGE_BACKGROUND = "#FFFFFF";

/** Height reserved above the content for the title and subtitle. */
export function titleAreaHeight(descriptor: DiagramDescriptor, ctx: StyleContext): number {
  const { titleHeight, subtitleHeight, titleBottomMargin } = ctx.spacing;
  let height = 0;
  if (descriptor.title) height += titleHeight;
  if (descriptor.subtitle) height += subtitleHeight;
  return height > 0 ? height + titleBottomMargin : 0;
}

/** First y coordinate available to the layout. */
export function contentTop(descriptor: DiagramDescriptor, ctx: StyleContext): number {
  return Math.max(ctx.spacing.titleTop + titleAreaHeight(descriptor, ctx), ctx.spacing.contentTopMin);
}

/**
 * Node label as draw.io HTML: the label, and when present a second, smaller
 * line in the theme's detail colour.
 */
export function nodeLabel(node: DiagramNode, ctx: StyleContext): string {
  const label = escapeHtml(node.label);
  if (!node.detail) return label;
  return `${label}<br><font style='font-size:10px;color:${ctx.detailTextColor}'>${escapeHtml(node.detail)}</font>`;
}

/** Fill colour of the group style, used behind icon labels inside groups. */
function groupFill(ctx: StyleContext): string {
  const match = /fillColor=(#[0-9A-Fa-f]{6})/.exec(ctx.styles.group);
  return match ? match[1] : ctx.theme === "dark" ? DARK_GROUP_FILL : LIGHT_GROUP_FILL;
}

/** Replace (or append) one `key=value;` pair of a style string. */
export function withStyleValue(style: string, key: string, value: string): string {
  const pattern = new RegExp(`(^|;)${key}=[^;]*;?`, "g");
  const stripped = style.replace(pattern, "$1");
  const base = stripped === "" || stripped.endsWith(";") ? stripped : `${stripped};`;
  return `${base}${key}=${value};`;
}

function collectDiagnostics(
  descriptor: DiagramDescriptor,
  ctx: StyleContext,
  groups: readonly GroupGeometry[],
): Diagnostic[] {
  const notes: Diagnostic[] = [];
  const nodeIds = new Set(descriptor.nodes.map((node) => node.id));

  if (descriptor.theme === "dark" && ctx.theme !== "dark") {
    notes.push(diagnostic("DARK_THEME_UNAVAILABLE", "Style configuration has no dark theme; using light", "dark"));
  }

  for (const node of descriptor.nodes) {
    if (!isKnownNodeType(node.type)) {
      notes.push(diagnostic("UNKNOWN_NODE_TYPE", `Node '${node.id}' has unknown type '${node.type}'; drawn as process`, node.id));
    }
  }

  descriptor.edges.forEach((edge, index) => {
    for (const end of [edge.from, edge.to]) {
      if (!nodeIds.has(end)) {
        notes.push(diagnostic("EDGE_UNKNOWN_NODE", `Edge ${index} (${edge.from} → ${edge.to}) references unknown node '${end}'`, end));
      }
    }
    if (edge.style !== undefined && !isEdgeLineStyle(edge.style)) {
      notes.push(diagnostic("UNKNOWN_EDGE_STYLE", `Edge ${index} has unknown style '${edge.style}'; drawn solid`, edge.style));
    }
    if (edge.color !== undefined && lookup(ctx.edgeColors, edge.color) === undefined) {
      notes.push(diagnostic("UNKNOWN_EDGE_COLOR", `Edge ${index} has unknown colour '${edge.color}'; default colour kept`, edge.color));
    }
  });

  const placedGroups = new Map(groups.map((geometry) => [geometry.group.id, geometry] as const));
  for (const group of descriptor.groups) {
    const geometry = placedGroups.get(group.id);
    const missing = geometry ? geometry.missing : group.members;
    for (const id of missing) {
      notes.push(diagnostic("GROUP_UNKNOWN_MEMBER", `Group '${group.id}' lists unknown node '${id}'`, id));
    }
    if (!geometry) {
      notes.push(diagnostic("GROUP_EMPTY", `Group '${group.id}' has no placed members and is omitted`, group.id));
    }
  }

  if (descriptor.layout === "pipeline") {
    for (const step of descriptor.pipeline ?? []) {
      for (const id of typeof step === "string" ? [step] : step) {
        if (!nodeIds.has(id)) {
          notes.push(diagnostic("PIPELINE_UNKNOWN_NODE", `Pipeline step references unknown node '${id}'`, id));
        }
      }
    }
  }
  return notes;
}

/**
 * Lay out and serialise a validated descriptor against one style context.
 */
export function assembleDiagram(
  descriptor: DiagramDescriptor,
  ctx: StyleContext,
  options: AssembleOptions = {},
): GenerateResult {
  const { page, spacing, styles } = ctx;
  const top = contentTop(descriptor, ctx);
  const { nodes, edges } = descriptor;
  const nodesById = new Map(nodes.map((node) => [node.id, node] as const));

  const layout = getLayout(descriptor.layout);
  const positions = layout(nodes, edges, {
    style: ctx,
    contentTop: top,
    gridColumns: descriptor.gridColumns,
    lanes: descriptor.lanes,
    ...(descriptor.flowColumns !== undefined ? { flowColumns: descriptor.flowColumns } : {}),
    ...(descriptor.pipeline !== undefined ? { pipeline: descriptor.pipeline } : {}),
  });

  const diagnostics: Diagnostic[] = [];
  for (const node of nodes) {
    if (!positions.has(node.id)) {
      positions.set(node.id, { x: page.contentLeft, y: top });
      diagnostics.push(diagnostic("UNPLACED_NODE", `Layout '${descriptor.layout}' did not place node '${node.id}'`, node.id));
    }
  }

  const lanes: LaneGeometry[] = descriptor.layout === "swimlane"
    ? deriveLaneGeometry(planLanes(nodes, descriptor.lanes, top, ctx), nodes, positions, ctx)
    : [];
  const groups = deriveGroupGeometry(descriptor.groups, nodesById, positions, ctx);
  diagnostics.push(...collectDiagnostics(descriptor, ctx, groups));

  // Canvas extent covers every placed box.
  const boxes: Box[] = [
    ...nodes.flatMap((node) => nodeBox(node, positions, ctx) ?? []),
    ...groups.map((geometry) => geometry.box),
    ...lanes.map((geometry) => geometry.box),
  ];
  const maxX = Math.max(0, ...boxes.map((box) => box.x + box.width));
  const maxY = Math.max(0, ...boxes.map((box) => box.y + box.height));
  const pageWidth = Math.max(page.width, maxX + page.canvasMargin);
  const pageHeight = Math.max(page.minHeight, maxY + page.canvasMargin);

  const reserved = new Set<string>(nodes.map((node) => node.id));
  for (const edge of edges) {
    reserved.add(edge.from);
    reserved.add(edge.to);
  }
  const model = new DiagramModel(reserved);

  if (descriptor.title) {
    model.addVertex({
      id: model.uniqueId("title"),
      value: escapeHtml(descriptor.title),
      style: styles.title,
      x: page.contentLeft,
      y: spacing.titleTop,
      width: page.contentWidth,
      height: spacing.titleHeight,
    });
  }
  if (descriptor.subtitle) {
    model.addVertex({
      id: model.uniqueId("subtitle"),
      value: escapeHtml(descriptor.subtitle),
      style: styles.subtitle,
      x: page.contentLeft,
      y: spacing.titleTop + (descriptor.title ? spacing.titleHeight : 0),
      width: page.contentWidth,
      height: spacing.subtitleHeight,
    });
  }

  // Lanes, then groups, then nodes: later cells draw on top.
  for (const { lane, box } of lanes) {
    model.addVertex({
      id: model.uniqueId(`lane_${lane.id}`),
      value: escapeHtml(lane.label),
      style: lane.color ? withStyleValue(styles.swimlane, "strokeColor", lane.color) : styles.swimlane,
      ...box,
    });
  }

  const iconLabelBackground = new Map<string, string>();
  const fill = groupFill(ctx);
  for (const { group, box, members } of groups) {
    model.addVertex({
      id: model.uniqueId(group.id),
      value: escapeHtml(group.label),
      style: group.color ? withStyleValue(styles.group, "strokeColor", group.color) : styles.group,
      ...box,
    });
    for (const id of members) {
      if (!iconLabelBackground.has(id)) iconLabelBackground.set(id, fill);
    }
  }

  const pageBackground = ctx.background ?? DEFAULT_PAGE_BACKGROUND;
  const { resolveIcon } = options;
  for (const node of nodes) {
    const styled = node.icon !== undefined && resolveIcon ? { ...node, icon: resolveIcon(node.icon) } : node;
    let style = nodeStyle(styled, ctx);
    if (node.type === "icon" && style.includes("labelBackgroundColor=")) {
      style = withStyleValue(style, "labelBackgroundColor", iconLabelBackground.get(node.id) ?? pageBackground);
    }
    const { width, height } = nodeDimensions(node, ctx);
    const point = positions.get(node.id) ?? { x: page.contentLeft, y: top };
    model.addVertex({ id: node.id, value: nodeLabel(node, ctx), style, x: point.x, y: point.y, width, height });
  }

  edges.forEach((edge, index) => {
    model.addEdge({
      id: model.uniqueId(`e${index}`),
      value: edge.label ? escapeHtml(edge.label) : "",
      style: edgeStyle(edge, ctx),
      sourceId: edge.from,
      targetId: edge.to,
    });
  });

  const xml = model.toXml(
    { width: pageWidth, height: pageHeight, ...(ctx.background ? { background: ctx.background } : {}) },
    { compress: options.compress ?? false },
  );

  return {
    xml,
    diagnostics,
    positions,
    stats: {
      layout: descriptor.layout,
      theme: ctx.theme,
      nodes: nodes.length,
      edges: edges.length,
      groups: groups.length,
      lanes: lanes.length,
      pageWidth,
      pageHeight,
    },
  };
}

/**
 * Validate a raw descriptor object and generate its document.
 * Throws `DescriptorError` for malformed input before any layout work.
 */
export function generateDiagram(input: unknown, options: GenerateOptions = {}): GenerateResult {
  const { descriptor, diagnostics } = parseDescriptor(input);
  const config = options.styleConfig ?? loadDefaultStyleConfig();
  const ctx = createStyleContext(config, descriptor.theme);
  const result = assembleDiagram(descriptor, ctx, options);
  return { ...result, diagnostics: [...diagnostics, ...result.diagnostics] };
}
