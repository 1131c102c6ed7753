import { describe, expect, it } from "vitest";
import { DiagramModel } from "../src/diagram_model.js";

function sampleModel(): DiagramModel {
  const model = new DiagramModel();
  model.addVertex({ id: "a", value: "A & B", style: "rounded=1;", x: 1, y: 2, width: 3, height: 4 });
  model.addEdge({ id: "e0", value: "", style: "s;", sourceId: "a", targetId: "b" });
  return model;
}

const GRAPH_MODEL = [
  `<mxGraphModel dx="800" dy="400" grid="1" gridSize="10" guides="1" tooltips="1" connect="1" arrows="1" fold="1" page="1" pageScale="1" pageWidth="1200" pageHeight="800" math="0" shadow="0">`,
  "<root>",
  `<mxCell id="0"/>`,
  `<mxCell id="1" parent="0"/>`,
  `<mxCell id="a" value="A &amp; B" style="rounded=1;" vertex="1" parent="1"><mxGeometry x="1" y="2" width="3" height="4" as="geometry"/></mxCell>`,
  `<mxCell id="e0" value="" style="s;" edge="1" parent="1" source="a" target="b"><mxGeometry relative="1" as="geometry"/></mxCell>`,
  "</root>",
  "</mxGraphModel>",
].join("\n");

describe("DiagramModel", () => {
  it("renders the mxfile document", () => {
    expect(sampleModel().toXml({ width: 1200, height: 800 })).toBe(
      [
        `<?xml version="1.0" encoding="UTF-8"?>`,
        `<mxfile host="drawio-layout-generator">`,
        `<diagram id="page-1" name="Page-1">`,
        GRAPH_MODEL,
        `</diagram>`,
        `</mxfile>`,
        "",
      ].join("\n"),
    );
  });

  it("adds the page background when given", () => {
    const xml = sampleModel().toXml({ width: 1200, height: 800, background: "#0F172A" });
    expect(xml).toContain(`math="0" shadow="0" background="#0F172A">`);
  });

  it("compresses the graph model the way draw.io does", () => {
    const xml = sampleModel().toXml({ width: 1200, height: 800 }, { compress: true });
    const match = /<diagram id="page-1" name="Page-1">([^<]+)<\/diagram>/.exec(xml);
    expect(match).not.toBeNull();
    expect(DiagramModel.decompressXml(match?.[1] ?? "")).toBe(GRAPH_MODEL);
  });

  it("renames structural ids around reserved ones", () => {
    const model = new DiagramModel(["0", "title"]);
    expect(model.uniqueId("title")).toBe("title-2");
    expect(model.uniqueId("title")).toBe("title-3");
    const xml = model.toXml({ width: 10, height: 10 });
    expect(xml).toContain(`<mxCell id="0-2"/>\n<mxCell id="1" parent="0-2"/>`);
  });
});
