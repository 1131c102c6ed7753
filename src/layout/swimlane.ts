/**
 * Swimlane strategy: horizontal bands stacked top to bottom, nodes flowing
 * left to right inside their band.
 */

import type { DiagramLane, DiagramNode } from "../descriptor.js";
import { nodeDimensions } from "../styles/node_styles.js";
import type { StyleContext } from "../styles/style_config.js";
import { rowHeight } from "./row_placement.js";
import type { LayoutStrategy, PositionMap } from "./types.js";

export const DEFAULT_LANE_ID = "default";

export interface LanePlan {
  readonly lane: DiagramLane;
  readonly members: readonly DiagramNode[];
  readonly top: number;
  readonly height: number;
}

export interface LaneMembers {
  lane: DiagramLane;
  members: DiagramNode[];
}

/**
 * Lanes in display order. Declared lanes come first, in declaration order;
 * without declarations they are derived from the nodes' lane ids in
 * first-occurrence order. A node without a lane joins the first lane. A lane
 * id that is used but not declared gets a lane of its own at the end.
 */
export function resolveLanes(
  nodes: readonly DiagramNode[],
  declared: readonly DiagramLane[],
): LaneMembers[] {
  const lanes: LaneMembers[] = declared.map((lane) => ({ lane, members: [] }));
  const byId = new Map(lanes.map((entry) => [entry.lane.id, entry] as const));
  const fallbackId = declared[0]?.id ?? DEFAULT_LANE_ID;

  for (const node of nodes) {
    const laneId = node.lane ?? fallbackId;
    let entry = byId.get(laneId);
    if (!entry) {
      entry = { lane: { id: laneId, label: laneId }, members: [] };
      byId.set(laneId, entry);
      lanes.push(entry);
    }
    entry.members.push(node);
  }
  return lanes;
}

/** Vertical extent of every lane, starting at `top`. */
export function planLanes(
  nodes: readonly DiagramNode[],
  declared: readonly DiagramLane[],
  top: number,
  ctx: StyleContext,
): LanePlan[] {
  const { swimlaneHeader, swimlanePadding } = ctx.spacing;
  const plans: LanePlan[] = [];
  let y = top;
  for (const { lane, members } of resolveLanes(nodes, declared)) {
    const height = swimlaneHeader + rowHeight(members, ctx) + 2 * swimlanePadding;
    plans.push({ lane, members, top: y, height });
    y += height;
  }
  return plans;
}

/**
 * Every node gets a slot as wide as the widest node in the diagram, so
 * columns line up across lanes. Nodes are centred in their slot and
 * vertically centred in the lane body.
 */
export const layoutSwimlane: LayoutStrategy = (nodes, _edges, { style, contentTop, lanes }) => {
  const positions: PositionMap = new Map();
  const slotWidth = Math.max(0, ...nodes.map((node) => nodeDimensions(node, style).width));
  const left = style.page.contentLeft + style.spacing.swimlaneLabelWidth;
  const { swimlaneHeader, swimlanePadding, hGap } = style.spacing;

  for (const plan of planLanes(nodes, lanes, contentTop, style)) {
    const bodyHeight = plan.height - swimlaneHeader - 2 * swimlanePadding;
    plan.members.forEach((node, index) => {
      const { width, height } = nodeDimensions(node, style);
      positions.set(node.id, {
        x: left + index * (slotWidth + hGap) + Math.floor((slotWidth - width) / 2),
        y: plan.top + swimlaneHeader + swimlanePadding + Math.floor((bodyHeight - height) / 2),
      });
    });
  }
  return positions;
};
