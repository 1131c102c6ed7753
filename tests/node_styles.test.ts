import { describe, expect, it } from "vitest";
import {
  edgeLineStyle,
  edgeStyle,
  iconStyle,
  lookup,
  nodeDimensions,
  nodeStyle,
  resolveVariant,
} from "../src/styles/node_styles.js";
import { node, styleContext } from "./helpers.js";

const ctx = styleContext();

describe("nodeDimensions", () => {
  it("looks sizes up by type", () => {
    expect(nodeDimensions(node("a", "decision"), ctx)).toEqual({ width: 180, height: 100 });
    expect(nodeDimensions(node("a", "junction"), ctx)).toEqual({ width: 24, height: 24 });
  });

  it("adds the detail height", () => {
    expect(nodeDimensions(node("a", "process", { detail: "more" }), ctx)).toEqual({ width: 260, height: 80 });
  });

  it("uses the process size for unknown types", () => {
    expect(nodeDimensions(node("a", "hexagon"), ctx)).toEqual({ width: 260, height: 56 });
    expect(nodeDimensions(node("a", "constructor"), ctx)).toEqual({ width: 260, height: 56 });
  });
});

describe("nodeStyle", () => {
  it("maps fixed types to their style", () => {
    expect(nodeStyle(node("a", "start"), ctx)).toBe(ctx.styles.start);
    expect(nodeStyle(node("a", "data_store"), ctx)).toBe(ctx.styles.data_store);
  });

  it("builds an image style for icons", () => {
    expect(nodeStyle(node("a", "icon", { icon: "img/db.svg" }), ctx)).toBe(`${ctx.styles.icon_base}image=img/db.svg;`);
    expect(iconStyle("x.png", ctx).endsWith("image=x.png;")).toBe(true);
  });

  it("uses the process variant", () => {
    expect(nodeStyle(node("a", "process", { variant: "danger" }), ctx)).toBe(ctx.styles.process_danger);
  });

  it("falls back to primary for unknown variants and types", () => {
    expect(resolveVariant(node("a", "process", { variant: "loud" }), ctx)).toBe("primary");
    expect(nodeStyle(node("a", "process", { variant: "loud" }), ctx)).toBe(ctx.styles.process_primary);
    expect(nodeStyle(node("a", "hexagon"), ctx)).toBe(ctx.styles.process_primary);
  });

  it("follows the theme", () => {
    const dark = styleContext("dark");
    expect(nodeStyle(node("a", "end"), dark)).toBe(dark.styles.end);
    expect(nodeStyle(node("a", "end"), dark)).not.toBe(ctx.styles.end);
  });
});

describe("edgeStyle", () => {
  it("defaults to solid", () => {
    expect(edgeLineStyle({ from: "a", to: "b" })).toBe("solid");
    expect(edgeLineStyle({ from: "a", to: "b", style: "wavy" })).toBe("solid");
    expect(edgeStyle({ from: "a", to: "b" }, ctx)).toBe(ctx.styles.edge_solid);
  });

  it("selects the line style", () => {
    expect(edgeStyle({ from: "a", to: "b", style: "dotted" }, ctx)).toBe(ctx.styles.edge_dotted);
  });

  it("replaces the stroke colour with a palette colour", () => {
    const style = edgeStyle({ from: "a", to: "b", style: "dashed", color: "red" }, ctx);
    expect(style).toBe(
      "edgeStyle=orthogonalEdgeStyle;rounded=1;orthogonalLoop=1;jettySize=auto;html=1;dashed=1;strokeWidth=1.5;" +
        "endArrow=blockThin;endFill=1;fontSize=11;fontColor=#334155;labelBackgroundColor=#FFFFFF;strokeColor=#DC2626;",
    );
  });

  it("ignores unknown colour names", () => {
    expect(edgeStyle({ from: "a", to: "b", color: "mauve" }, ctx)).toBe(ctx.styles.edge_solid);
    expect(edgeStyle({ from: "a", to: "b", color: "toString" }, ctx)).toBe(ctx.styles.edge_solid);
  });

  it("uses the dark palette in the dark theme", () => {
    const dark = styleContext("dark");
    expect(edgeStyle({ from: "a", to: "b", color: "green" }, dark).endsWith("strokeColor=#4ADE80;")).toBe(true);
  });
});

describe("lookup", () => {
  it("only sees own properties", () => {
    expect(lookup({ a: 1 }, "a")).toBe(1);
    expect(lookup({ a: 1 }, "hasOwnProperty")).toBeUndefined();
  });
});
