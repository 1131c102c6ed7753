import { describe, expect, it } from "vitest";
import type { DiagramNode } from "../src/descriptor.js";
import { boundingBox, deriveGroupGeometry, deriveLaneGeometry, groupGeometry, nodeBox } from "../src/geometry.js";
import { planLanes } from "../src/layout/swimlane.js";
import type { PositionMap } from "../src/layout/types.js";
import { node, styleContext } from "./helpers.js";

const ctx = styleContext();

function byId(nodes: DiagramNode[]): Map<string, DiagramNode> {
  return new Map(nodes.map((n) => [n.id, n] as const));
}

describe("nodeBox", () => {
  it("combines position and size", () => {
    const positions: PositionMap = new Map([["a", { x: 10, y: 20 }]]);
    expect(nodeBox(node("a", "decision"), positions, ctx)).toEqual({ x: 10, y: 20, width: 180, height: 100 });
    expect(nodeBox(node("b"), positions, ctx)).toBeUndefined();
  });
});

describe("boundingBox", () => {
  it("covers every box", () => {
    expect(boundingBox([
      { x: 10, y: 10, width: 10, height: 10 },
      { x: 50, y: 0, width: 5, height: 40 },
    ])).toEqual({ x: 10, y: 0, width: 45, height: 40 });
    expect(boundingBox([])).toBeUndefined();
  });
});

describe("groupGeometry", () => {
  const nodes = [node("a"), node("b", "start")];
  const positions: PositionMap = new Map([
    ["a", { x: 470, y: 100 }],
    ["b", { x: 520, y: 216 }],
  ]);

  it("pads the members' bounds and adds the label band", () => {
    const geometry = groupGeometry({ id: "g", label: "G", members: ["a", "b"] }, byId(nodes), positions, ctx);
    expect(geometry?.box).toEqual({ x: 446, y: 52, width: 308, height: 244 });
    expect(geometry?.members).toEqual(["a", "b"]);
    expect(geometry?.missing).toEqual([]);
  });

  it("ignores a missing member", () => {
    const geometry = groupGeometry({ id: "g", label: "G", members: ["a", "missing"] }, byId(nodes), positions, ctx);
    expect(geometry?.box).toEqual({ x: 446, y: 52, width: 308, height: 128 });
    expect(geometry?.missing).toEqual(["missing"]);
  });

  it("omits a group without placed members", () => {
    const groups = [
      { id: "empty", label: "", members: ["missing"] },
      { id: "g", label: "G", members: ["b"] },
    ];
    expect(deriveGroupGeometry(groups, byId(nodes), positions, ctx).map((g) => g.group.id)).toEqual(["g"]);
  });
});

describe("deriveLaneGeometry", () => {
  it("gives every lane the same width", () => {
    const nodes = [node("a", "process", { lane: "one" }), node("b", "start", { lane: "two" })];
    const plans = planLanes(nodes, [], 100, ctx);
    const positions: PositionMap = new Map([
      ["a", { x: 180, y: 176 }],
      ["b", { x: 230, y: 352 }],
    ]);
    const lanes = deriveLaneGeometry(plans, nodes, positions, ctx);
    // right edge: a at 180 + 260 + 32 = 472; width = 472 - 40 + 32
    expect(lanes.map((lane) => lane.box)).toEqual([
      { x: 40, y: 100, width: 464, height: 164 },
      { x: 40, y: 264, width: 464, height: 164 },
    ]);
  });

  it("is at least as wide as the label column", () => {
    const plans = planLanes([], [{ id: "only", label: "Only" }], 100, ctx);
    const [lane] = deriveLaneGeometry(plans, [], new Map(), ctx);
    expect(lane.box).toEqual({ x: 40, y: 100, width: 172, height: 164 });
  });
});
