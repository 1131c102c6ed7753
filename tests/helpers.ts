/**
 * Shared fixtures for the test suite.
 */
import { XMLParser } from "fast-xml-parser";
import type { DiagramNode } from "../src/descriptor.js";
import type { LayoutOptions } from "../src/layout/types.js";
import { createStyleContext, loadDefaultStyleConfig, type StyleContext, type ThemeName } from "../src/styles/style_config.js";

export function styleContext(theme: ThemeName = "light"): StyleContext {
  return createStyleContext(loadDefaultStyleConfig(), theme);
}

export function node(id: string, type = "process", extra: Partial<DiagramNode> = {}): DiagramNode {
  return { id, label: id, type, ...extra };
}

export function layoutOptions(overrides: Partial<LayoutOptions> = {}): LayoutOptions {
  return {
    style: styleContext(),
    contentTop: 100,
    gridColumns: 3,
    lanes: [],
    ...overrides,
  };
}

export interface ParsedCell {
  id: string;
  value?: string;
  style?: string;
  vertex?: string;
  edge?: string;
  parent?: string;
  source?: string;
  target?: string;
  mxGeometry?: { x?: string; y?: string; width?: string; height?: string; relative?: string };
}

export interface ParsedDocument {
  graphModel: Record<string, string>;
  cells: ParsedCell[];
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "",
  parseAttributeValue: false,
  isArray: (name) => name === "mxCell",
});

/** Parse an uncompressed draw.io document into its graph model attributes and cells. */
export function parseDocument(xml: string): ParsedDocument {
  const doc = parser.parse(xml);
  const model = doc.mxfile.diagram.mxGraphModel;
  const { root, ...attributes } = model;
  return { graphModel: attributes, cells: root.mxCell };
}

export function cellById(doc: ParsedDocument, id: string): ParsedCell | undefined {
  return doc.cells.find((cell) => cell.id === id);
}
