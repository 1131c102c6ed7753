/**
 * Draw.io document model: an ordered list of cells rendered to the
 * `mxfile` XML that draw.io opens directly.
 *
 * Cells render in insertion order, which is also z-order (later cells draw
 * on top). Compression uses `node:zlib` raw deflate and `Buffer` base64, the
 * same encoding draw.io's `Graph.compress` produces.
 */

import { deflateRawSync, inflateRawSync } from "node:zlib";
import { escapeXml } from "./utils.js";

export interface Cell {
  id: string;
  type: "vertex" | "edge";
  /** Label; for `html=1` styles this is HTML text, escaped again on render. */
  value: string;
  style: string;
  x?: number;
  y?: number;
  width?: number;
  height?: number;
  sourceId?: string;
  targetId?: string;
}

export interface PageSettings {
  width: number;
  height: number;
  /** Canvas background colour; omitted for the default white page. */
  background?: string;
}

export const DOCUMENT_HOST = "drawio-layout-generator";

export class DiagramModel {
  private readonly cells: Cell[] = [];
  private readonly takenIds = new Set<string>();
  private readonly rootId: string;
  private readonly layerId: string;

  /**
   * @param reservedIds ids that later cells will use verbatim (node ids);
   *   structural cells are renamed around them.
   */
  constructor(reservedIds: Iterable<string> = []) {
    for (const id of reservedIds) this.takenIds.add(id);
    this.rootId = this.uniqueId("0");
    this.layerId = this.uniqueId("1");
  }

  /**
   * Claim `preferred`, or the first free `preferred-2`, `preferred-3`, ...
   */
  uniqueId(preferred: string): string {
    let id = preferred;
    for (let n = 2; this.takenIds.has(id); n++) {
      id = `${preferred}-${n}`;
    }
    this.takenIds.add(id);
    return id;
  }

  addVertex(params: {
    id: string;
    value: string;
    style: string;
    x: number;
    y: number;
    width: number;
    height: number;
  }): Cell {
    const cell: Cell = { ...params, type: "vertex" };
    this.takenIds.add(cell.id);
    this.cells.push(cell);
    return cell;
  }

  addEdge(params: {
    id: string;
    value: string;
    style: string;
    sourceId: string;
    targetId: string;
  }): Cell {
    const cell: Cell = { ...params, type: "edge" };
    this.takenIds.add(cell.id);
    this.cells.push(cell);
    return cell;
  }

  /**
   * Render the full `mxfile` document.
   */
  toXml(page: PageSettings, options?: { compress?: boolean }): string {
    const compress = options?.compress ?? false;
    const background = page.background ? ` background="${escapeXml(page.background)}"` : "";
    const graphModelXml = [
      `<mxGraphModel dx="800" dy="400" grid="1" gridSize="10" guides="1" tooltips="1" connect="1" arrows="1" fold="1" page="1" pageScale="1" pageWidth="${page.width}" pageHeight="${page.height}" math="0" shadow="0"${background}>`,
      "<root>",
      `<mxCell id="${escapeXml(this.rootId)}"/>`,
      `<mxCell id="${escapeXml(this.layerId)}" parent="${escapeXml(this.rootId)}"/>`,
      ...this.cells.map((cell) => this.renderCell(cell)),
      "</root>",
      "</mxGraphModel>",
    ].join("\n");
    const diagramContent = compress ? DiagramModel.compressXml(graphModelXml) : `\n${graphModelXml}\n`;

    return [
      `<?xml version="1.0" encoding="UTF-8"?>`,
      `<mxfile host="${DOCUMENT_HOST}">`,
      `<diagram id="page-1" name="Page-1">${diagramContent}</diagram>`,
      `</mxfile>`,
      "",
    ].join("\n");
  }

  private renderCell(cell: Cell): string {
    const head = `<mxCell id="${escapeXml(cell.id)}" value="${escapeXml(cell.value)}" style="${escapeXml(cell.style)}"`;
    const parent = `parent="${escapeXml(this.layerId)}"`;
    if (cell.type === "vertex") {
      return `${head} vertex="1" ${parent}><mxGeometry x="${cell.x ?? 0}" y="${cell.y ?? 0}" width="${cell.width ?? 0}" height="${cell.height ?? 0}" as="geometry"/></mxCell>`;
    }
    const sourceAttr = cell.sourceId !== undefined ? ` source="${escapeXml(cell.sourceId)}"` : "";
    const targetAttr = cell.targetId !== undefined ? ` target="${escapeXml(cell.targetId)}"` : "";
    return `${head} edge="1" ${parent}${sourceAttr}${targetAttr}><mxGeometry relative="1" as="geometry"/></mxCell>`;
  }

  /**
   * Compress an XML string using the Draw.io format:
   * encodeURIComponent(xml) → deflateRaw → base64.
   */
  static compressXml(xml: string): string {
    const deflated = deflateRawSync(Buffer.from(encodeURIComponent(xml), "utf-8"));
    return deflated.toString("base64");
  }

  /**
   * Reverse of {@link compressXml}: base64 → inflateRaw → decodeURIComponent.
   */
  static decompressXml(compressed: string): string {
    const inflated = inflateRawSync(Buffer.from(compressed, "base64"));
    return decodeURIComponent(inflated.toString("utf-8"));
  }
}
