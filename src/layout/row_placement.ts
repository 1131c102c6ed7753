/**
 * Row placement shared by the horizontal, rows, flow and level-based
 * strategies: nodes left to right with a fixed gap, each vertically centred
 * on the row's tallest node, the whole row centred on the page but never left
 * of the content margin.
 */

import type { DiagramNode } from "../descriptor.js";
import { nodeDimensions } from "../styles/node_styles.js";
import type { Size, StyleContext } from "../styles/style_config.js";
import type { PositionMap } from "./types.js";

/** Height used for a row, step or lane with nothing in it. */
export const EMPTY_ROW_HEIGHT = 56;

export function rowHeight(nodes: readonly DiagramNode[], ctx: StyleContext): number {
  if (nodes.length === 0) return EMPTY_ROW_HEIGHT;
  return Math.max(...nodes.map((node) => nodeDimensions(node, ctx).height));
}

/** Left edge of a span of the given width, centred and clamped to the content margin. */
export function centredStart(span: number, ctx: StyleContext): number {
  return Math.max(ctx.page.contentLeft, Math.floor((ctx.page.width - span) / 2));
}

export function rowSpan(sizes: readonly Size[], gap: number): number {
  const widths = sizes.reduce((sum, size) => sum + size.width, 0);
  return widths + gap * Math.max(sizes.length - 1, 0);
}

/**
 * Place one row with its top edge at `top`, writing into `positions`.
 * Returns the row height.
 */
export function placeRow(
  nodes: readonly DiagramNode[],
  top: number,
  ctx: StyleContext,
  positions: PositionMap,
): number {
  const sizes = nodes.map((node) => nodeDimensions(node, ctx));
  const height = rowHeight(nodes, ctx);
  let x = centredStart(rowSpan(sizes, ctx.spacing.hGap), ctx);

  nodes.forEach((node, i) => {
    const { width, height: h } = sizes[i];
    positions.set(node.id, { x, y: top + Math.floor((height - h) / 2) });
    x += width + ctx.spacing.hGap;
  });
  return height;
}

/**
 * Stack rows top to bottom from `top`, separated by the minimum edge gap.
 */
export function stackRows(
  rows: readonly (readonly DiagramNode[])[],
  top: number,
  ctx: StyleContext,
): PositionMap {
  const positions: PositionMap = new Map();
  let y = top;
  for (const row of rows) {
    y += placeRow(row, y, ctx, positions) + ctx.spacing.minEdgeGap;
  }
  return positions;
}

/** Split a list into consecutive chunks of `size` (the last may be shorter). */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
