/**
 * Tests for MCP tool registration.
 * Verifies TOOL_NAMES, TOOL_DEFINITIONS and that registerTools wires every
 * tool to the server with the right handler shape.
 */
import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { createToolHandlerFactory } from "../src/tool_handler.js";
import { registerTools, TOOL_DEFINITIONS, TOOL_NAMES } from "../src/tool_registrations.js";
import { createHandlers } from "../src/tools.js";

describe("TOOL_NAMES", () => {
  it("matches the definitions", () => {
    expect(Object.keys(TOOL_NAMES)).toHaveLength(TOOL_DEFINITIONS.length);
    for (const def of TOOL_DEFINITIONS) {
      expect(Object.entries(TOOL_NAMES)).toContainEqual([def.key, def.name]);
    }
  });

  it("uses kebab-case names", () => {
    for (const name of Object.values(TOOL_NAMES)) {
      expect(name).toMatch(/^[a-z]+(-[a-z]+)*$/);
    }
  });
});

describe("TOOL_DEFINITIONS", () => {
  it("gives only generate-diagram an input schema", () => {
    expect(TOOL_DEFINITIONS.filter((def) => def.hasArgs).map((def) => def.name)).toEqual(["generate-diagram"]);
  });

  it("accepts a descriptor with output options", () => {
    const def = TOOL_DEFINITIONS.find((candidate) => candidate.name === "generate-diagram");
    if (def === undefined || !def.hasArgs) throw new Error("generate-diagram has no input schema");
    const schema = z.object(def.inputSchema);
    expect(schema.safeParse({ nodes: [{ id: "a" }], compress: true }).success).toBe(true);
    expect(schema.safeParse({ nodes: [{ id: "a" }], compress: "yes" }).success).toBe(false);
    expect(schema.safeParse({ edges: [] }).success).toBe(false);
  });
});

describe("registerTools", () => {
  it("registers every tool once", async () => {
    const registerTool = vi.fn();
    const create = createToolHandlerFactory(createHandlers(), { debug: () => {} });
    registerTools({ registerTool }, create);

    expect(registerTool.mock.calls.map((call) => call[0])).toEqual([
      "generate-diagram",
      "list-layouts",
      "list-node-types",
    ]);
    const [, generateMeta] = registerTool.mock.calls[0];
    expect(Object.keys(generateMeta)).toEqual(["description", "inputSchema"]);
    const [, listMeta, listHandler] = registerTool.mock.calls[1];
    expect(Object.keys(listMeta)).toEqual(["description"]);

    const result = await listHandler({ requestId: 1 });
    expect(result.isError).toBeUndefined();
  });
});
