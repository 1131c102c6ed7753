/**
 * Single-line strategies: one vertical column, or one horizontal row.
 */

import { nodeDimensions } from "../styles/node_styles.js";
import { placeRow } from "./row_placement.js";
import type { LayoutStrategy, PositionMap } from "./types.js";

/**
 * One column, each node centred on the page. The gap is measured between box
 * edges, so a tall node pushes everything below it down by its own height.
 */
export const layoutLinear: LayoutStrategy = (nodes, _edges, { style, contentTop }) => {
  const positions: PositionMap = new Map();
  let y = contentTop;
  for (const node of nodes) {
    const { width, height } = nodeDimensions(node, style);
    positions.set(node.id, { x: Math.max(0, Math.floor((style.page.width - width) / 2)), y });
    y += height + style.spacing.minEdgeGap;
  }
  return positions;
};

/** One row, left to right, vertically centred on the tallest node. */
export const layoutHorizontal: LayoutStrategy = (nodes, _edges, { style, contentTop }) => {
  const positions: PositionMap = new Map();
  placeRow(nodes, contentTop, style, positions);
  return positions;
};
