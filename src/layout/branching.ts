/**
 * Branching (alias: hierarchical) strategy: one row per dependency level,
 * levels stacked top to bottom.
 */

import type { DiagramNode } from "../descriptor.js";
import { groupByLevel, LevelGraph } from "./level_graph.js";
import { placeRow } from "./row_placement.js";
import type { LayoutStrategy, PositionMap } from "./types.js";

export const layoutBranching: LayoutStrategy = (nodes, edges, { style, contentTop }) => {
  const ids = nodes.map((node) => node.id);
  const byId = new Map(nodes.map((node) => [node.id, node] as const));
  const { levels } = new LevelGraph(ids, edges).assignLevels();

  const positions: PositionMap = new Map();
  let y = contentTop;
  for (const levelIds of groupByLevel(ids, levels)) {
    const row: DiagramNode[] = levelIds.flatMap((id) => byId.get(id) ?? []);
    if (row.length === 0) {
      y += style.spacing.vGap;
      continue;
    }
    y += placeRow(row, y, style, positions) + style.spacing.minEdgeGap;
  }
  return positions;
};

export const layoutHierarchical: LayoutStrategy = layoutBranching;
