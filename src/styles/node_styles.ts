/**
 * Dimension & style mapper: box size and draw.io style string for a node,
 * style string for an edge. Pure lookups against a {@link StyleContext}.
 */

import {
  type DiagramEdge,
  type DiagramNode,
  EDGE_LINE_STYLES,
  type EdgeLineStyle,
  NODE_TYPES,
  type NodeType,
  PROCESS_VARIANTS,
  type ProcessVariant,
} from "../descriptor.js";
import type { Size, StyleContext } from "./style_config.js";

/** Node types drawn with a dedicated style key of the same name. */
const FIXED_STYLE_TYPES: ReadonlySet<string> = new Set<NodeType>([
  "start",
  "end",
  "decision",
  "note",
  "panel",
  "success",
  "data_store",
  "actor",
  "junction",
  "cylinder",
  "cloud",
]);

/** Own-property lookup, so names like "constructor" never hit the prototype. */
export function lookup<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}

export function isKnownNodeType(type: string): type is NodeType {
  return NODE_TYPES.some((name) => name === type);
}

export function isProcessVariant(variant: string): variant is ProcessVariant {
  return PROCESS_VARIANTS.some((name) => name === variant);
}

export function isEdgeLineStyle(style: string): style is EdgeLineStyle {
  return EDGE_LINE_STYLES.some((name) => name === style);
}

/**
 * Rendered box size. Unknown types take the process size; a detail line adds
 * `detailExtraHeight`.
 */
export function nodeDimensions(node: DiagramNode, ctx: StyleContext): Size {
  const base = lookup(ctx.dimensions, node.type) ?? ctx.dimensions.process;
  const height = node.detail ? base.height + ctx.detailExtraHeight : base.height;
  return { width: base.width, height };
}

export function iconStyle(icon: string, ctx: StyleContext): string {
  return `${ctx.styles.icon_base}image=${icon};`;
}

/** Variant name actually used for a process node (falls back to "primary"). */
export function resolveVariant(node: DiagramNode, ctx: StyleContext): string {
  const variant = node.variant ?? "primary";
  return isProcessVariant(variant) && Object.hasOwn(ctx.styles, `process_${variant}`) ? variant : "primary";
}

export function nodeStyle(node: DiagramNode, ctx: StyleContext): string {
  if (node.type === "icon") {
    return iconStyle(node.icon ?? "", ctx);
  }
  if (FIXED_STYLE_TYPES.has(node.type)) {
    const fixed = lookup(ctx.styles, node.type);
    if (fixed !== undefined) return fixed;
  }
  return lookup(ctx.styles, `process_${resolveVariant(node, ctx)}`) ?? ctx.styles.process_primary;
}

const STROKE_COLOR = /strokeColor=#[0-9A-Fa-f]+;/g;

/** Resolved line style key; unknown values become "solid". */
export function edgeLineStyle(edge: DiagramEdge): EdgeLineStyle {
  return edge.style !== undefined && isEdgeLineStyle(edge.style) ? edge.style : "solid";
}

/**
 * Edge style string. A palette colour name replaces the stroke colour;
 * unknown names leave the style untouched.
 */
export function edgeStyle(edge: DiagramEdge, ctx: StyleContext): string {
  const base = lookup(ctx.styles, `edge_${edgeLineStyle(edge)}`) ?? ctx.styles.edge_solid;
  const color = edge.color !== undefined ? lookup(ctx.edgeColors, edge.color) : undefined;
  if (color === undefined) return base;
  return `${base.replace(STROKE_COLOR, "")}strokeColor=${color};`;
}
