/**
 * Multi-row strategies: explicit rows (by row key), automatic wrapping
 * (flow), and a fixed-column grid.
 */

import type { DiagramNode } from "../descriptor.js";
import { nodeDimensions } from "../styles/node_styles.js";
import { chunk, rowHeight, stackRows } from "./row_placement.js";
import type { LayoutStrategy, PositionMap } from "./types.js";

/**
 * Group nodes by row key. Rows appear in first-occurrence order; a node
 * without a key is a row of its own.
 */
export function groupByRowKey(nodes: readonly DiagramNode[]): DiagramNode[][] {
  const rows: DiagramNode[][] = [];
  const rowByKey = new Map<string, DiagramNode[]>();
  for (const node of nodes) {
    if (node.row === undefined) {
      rows.push([node]);
      continue;
    }
    let row = rowByKey.get(node.row);
    if (!row) {
      row = [];
      rowByKey.set(node.row, row);
      rows.push(row);
    }
    row.push(node);
  }
  return rows;
}

export const layoutRows: LayoutStrategy = (nodes, _edges, { style, contentTop }) => {
  return stackRows(groupByRowKey(nodes), contentTop, style);
};

/**
 * Column count for the flow strategy when none is given: close to a 16:9
 * canvas, never fewer than two.
 */
export function flowColumnCount(nodeCount: number, explicit?: number): number {
  if (explicit !== undefined && explicit > 0) return explicit;
  const target = Math.round(Math.sqrt((nodeCount * 16) / 9));
  return Math.max(2, Math.min(nodeCount, target));
}

export const layoutFlow: LayoutStrategy = (nodes, _edges, { style, contentTop, flowColumns }) => {
  const columns = flowColumnCount(nodes.length, flowColumns);
  return stackRows(chunk(nodes, columns), contentTop, style);
};

/**
 * Fixed columns dividing the content width evenly; each node is centred in
 * its cell, each row is as tall as its tallest node.
 */
export const layoutGrid: LayoutStrategy = (nodes, _edges, { style, contentTop, gridColumns }) => {
  const columns = Math.max(1, gridColumns);
  const colWidth = Math.floor(style.page.contentWidth / columns);
  const positions: PositionMap = new Map();
  let y = contentTop;

  for (const row of chunk(nodes, columns)) {
    const height = rowHeight(row, style);
    row.forEach((node, col) => {
      const { width, height: h } = nodeDimensions(node, style);
      const x = style.page.contentLeft + col * colWidth + Math.floor((colWidth - width) / 2);
      positions.set(node.id, { x: Math.max(0, x), y: y + Math.floor((height - h) / 2) });
    });
    y += height + style.spacing.minEdgeGap;
  }
  return positions;
};
