/**
 * Layout strategy registry.
 */

import type { LayoutName } from "../descriptor.js";
import { layoutBranching, layoutHierarchical } from "./branching.js";
import { layoutHorizontal, layoutLinear } from "./line_layouts.js";
import { layoutPipeline } from "./pipeline.js";
import { layoutFlow, layoutGrid, layoutRows } from "./row_layouts.js";
import { layoutSwimlane } from "./swimlane.js";
import type { LayoutStrategy } from "./types.js";

export const LAYOUTS: Readonly<Record<LayoutName, LayoutStrategy>> = {
  linear: layoutLinear,
  horizontal: layoutHorizontal,
  branching: layoutBranching,
  hierarchical: layoutHierarchical,
  grid: layoutGrid,
  swimlane: layoutSwimlane,
  flow: layoutFlow,
  rows: layoutRows,
  pipeline: layoutPipeline,
};

/** One-line descriptions, surfaced by the `list-layouts` tool and CLI help. */
export const LAYOUT_DESCRIPTIONS: Readonly<Record<LayoutName, string>> = {
  linear: "Single vertical column, each node centred on the page.",
  horizontal: "Single row, left to right, vertically centred on the tallest node.",
  branching: "One row per dependency level computed from the edges; tolerates cycles.",
  hierarchical: "Alias of 'branching'.",
  grid: "Fixed number of columns ('grid_columns', default 3) evenly dividing the content width.",
  swimlane: "Horizontal lanes ('lanes' or each node's 'lane'); nodes flow left to right within a lane.",
  flow: "Rows that wrap automatically ('flow_columns', or about 16:9 when omitted).",
  rows: "Explicit rows: nodes sharing a 'row' value sit side by side; rows stack top to bottom.",
  pipeline: "Left-to-right steps from 'pipeline'; a list entry stacks its nodes in one column.",
};

export function getLayout(name: LayoutName): LayoutStrategy {
  return LAYOUTS[name];
}

export type { Box, LayoutOptions, LayoutStrategy, Point, PositionMap } from "./types.js";
