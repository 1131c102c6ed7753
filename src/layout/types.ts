/**
 * Layout engine contract. Every strategy is a pure, synchronous function of
 * (nodes, edges, options) to a map of node id → top-left corner. Map
 * insertion order follows placement order, so iterating a result is
 * deterministic.
 */

import type { DiagramEdge, DiagramLane, DiagramNode, PipelineStep } from "../descriptor.js";
import type { StyleContext } from "../styles/style_config.js";

export interface Point {
  readonly x: number;
  readonly y: number;
}

/** A node's resolved size paired with its computed origin. */
export interface Box extends Point {
  readonly width: number;
  readonly height: number;
}

export type PositionMap = Map<string, Point>;

export interface LayoutOptions {
  readonly style: StyleContext;
  /** First y coordinate below the title area. */
  readonly contentTop: number;
  readonly gridColumns: number;
  readonly flowColumns?: number;
  readonly pipeline?: readonly PipelineStep[];
  readonly lanes: readonly DiagramLane[];
}

export type LayoutStrategy = (
  nodes: readonly DiagramNode[],
  edges: readonly DiagramEdge[],
  options: LayoutOptions,
) => PositionMap;
