/**
 * Group and lane geometry derived from final node positions.
 */

import type { DiagramGroup, DiagramLane, DiagramNode } from "./descriptor.js";
import type { Box, PositionMap } from "./layout/types.js";
import type { LanePlan } from "./layout/swimlane.js";
import { nodeDimensions } from "./styles/node_styles.js";
import type { StyleContext } from "./styles/style_config.js";

export interface GroupGeometry {
  readonly group: DiagramGroup;
  readonly box: Box;
  /** Member ids that contributed to the box, in declaration order. */
  readonly members: readonly string[];
  /** Member ids with no node or no position. */
  readonly missing: readonly string[];
}

export interface LaneGeometry {
  readonly lane: DiagramLane;
  readonly box: Box;
}

/** A node's box, or undefined when the node was not placed. */
export function nodeBox(node: DiagramNode, positions: PositionMap, ctx: StyleContext): Box | undefined {
  const point = positions.get(node.id);
  if (!point) return undefined;
  const { width, height } = nodeDimensions(node, ctx);
  return { x: point.x, y: point.y, width, height };
}

/** Smallest box containing all of `boxes`; undefined for none. */
export function boundingBox(boxes: readonly Box[]): Box | undefined {
  if (boxes.length === 0) return undefined;
  const minX = Math.min(...boxes.map((b) => b.x));
  const minY = Math.min(...boxes.map((b) => b.y));
  const maxX = Math.max(...boxes.map((b) => b.x + b.width));
  const maxY = Math.max(...boxes.map((b) => b.y + b.height));
  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
}

/**
 * Box of one group: the members' bounding box grown by the group padding on
 * every side, plus the label band above. Undefined when no member is placed.
 */
export function groupGeometry(
  group: DiagramGroup,
  nodesById: ReadonlyMap<string, DiagramNode>,
  positions: PositionMap,
  ctx: StyleContext,
): GroupGeometry | undefined {
  const members: string[] = [];
  const missing: string[] = [];
  const boxes: Box[] = [];

  for (const id of group.members) {
    const node = nodesById.get(id);
    const box = node ? nodeBox(node, positions, ctx) : undefined;
    if (box) {
      members.push(id);
      boxes.push(box);
    } else {
      missing.push(id);
    }
  }

  const bounds = boundingBox(boxes);
  if (!bounds) return undefined;

  const pad = ctx.spacing.groupPadding;
  const label = ctx.spacing.groupLabelHeight;
  return {
    group,
    members,
    missing,
    box: {
      x: bounds.x - pad,
      y: bounds.y - pad - label,
      width: bounds.width + 2 * pad,
      height: bounds.height + 2 * pad + label,
    },
  };
}

export function deriveGroupGeometry(
  groups: readonly DiagramGroup[],
  nodesById: ReadonlyMap<string, DiagramNode>,
  positions: PositionMap,
  ctx: StyleContext,
): GroupGeometry[] {
  return groups.flatMap((group) => groupGeometry(group, nodesById, positions, ctx) ?? []);
}

/**
 * Lane bands, top to bottom. All bands share one width: wide enough for the
 * label column and every placed node plus padding.
 */
export function deriveLaneGeometry(
  plans: readonly LanePlan[],
  nodes: readonly DiagramNode[],
  positions: PositionMap,
  ctx: StyleContext,
): LaneGeometry[] {
  const { contentLeft } = ctx.page;
  const pad = ctx.spacing.swimlanePadding;

  let right = contentLeft + ctx.spacing.swimlaneLabelWidth;
  for (const node of nodes) {
    const box = nodeBox(node, positions, ctx);
    if (box) right = Math.max(right, box.x + box.width + pad);
  }
  const width = right - contentLeft + pad;

  return plans.map((plan) => ({
    lane: plan.lane,
    box: { x: contentLeft, y: plan.top, width, height: plan.height },
  }));
}
