/**
 * Pipeline strategy: steps flow left to right; a step is a single node or a
 * vertical stack of nodes (one visual column).
 *
 * Example: `["n1", ["n2", "n3"], "n4"]` puts n1 alone, n2 above n3 in one
 * column, then n4 alone, all centred on a shared horizontal midline.
 */

import type { DiagramNode, PipelineStep } from "../descriptor.js";
import { nodeDimensions } from "../styles/node_styles.js";
import { centredStart, EMPTY_ROW_HEIGHT } from "./row_placement.js";
import type { LayoutStrategy, PositionMap } from "./types.js";

interface ResolvedStep {
  nodes: DiagramNode[];
  width: number;
  height: number;
}

/**
 * Resolve step entries to nodes. Unknown ids and repeats of an already
 * placed id are dropped, steps left empty disappear, and nodes the sequence
 * never mentions follow as singleton steps in declaration order. Without a
 * sequence every node is its own step.
 */
export function resolvePipelineSteps(
  nodes: readonly DiagramNode[],
  steps: readonly PipelineStep[] | undefined,
): DiagramNode[][] {
  const byId = new Map(nodes.map((node) => [node.id, node] as const));
  const used = new Set<string>();
  const resolved: DiagramNode[][] = [];

  for (const step of steps ?? []) {
    const ids = typeof step === "string" ? [step] : step;
    const members: DiagramNode[] = [];
    for (const id of ids) {
      const node = byId.get(id);
      if (!node || used.has(id)) continue;
      used.add(id);
      members.push(node);
    }
    if (members.length > 0) resolved.push(members);
  }

  for (const node of nodes) {
    if (!used.has(node.id)) resolved.push([node]);
  }
  return resolved;
}

export const layoutPipeline: LayoutStrategy = (nodes, _edges, { style, contentTop, pipeline }) => {
  const { hGap, vGap } = style.spacing;

  const steps: ResolvedStep[] = resolvePipelineSteps(nodes, pipeline).map((members) => {
    const sizes = members.map((node) => nodeDimensions(node, style));
    return {
      nodes: members,
      width: Math.max(...sizes.map((size) => size.width)),
      height: sizes.reduce((sum, size) => sum + size.height, 0) + vGap * (members.length - 1),
    };
  });

  const tallest = steps.length > 0 ? Math.max(...steps.map((step) => step.height)) : EMPTY_ROW_HEIGHT;
  const midY = contentTop + Math.floor(tallest / 2);
  const totalWidth = steps.reduce((sum, step) => sum + step.width, 0) + hGap * Math.max(steps.length - 1, 0);

  const positions: PositionMap = new Map();
  let x = centredStart(totalWidth, style);
  for (const step of steps) {
    let y = midY - Math.floor(step.height / 2);
    for (const node of step.nodes) {
      const { width, height } = nodeDimensions(node, style);
      positions.set(node.id, { x: x + Math.floor((step.width - width) / 2), y });
      y += height + vGap;
    }
    x += step.width + hGap;
  }
  return positions;
};
