import { describe, expect, it } from "vitest";
import { basename } from "node:path";
import { errorMessage, esmDirname, escapeHtml, escapeXml, readRelativeFile, resolveRelativePath } from "../src/utils.js";

describe("escapeXml", () => {
  it("escapes the five XML specials", () => {
    expect(escapeXml(`a&b<c>d"e'f`)).toBe("a&amp;b&lt;c&gt;d&quot;e&apos;f");
  });

  it("leaves plain text alone", () => {
    expect(escapeXml("plain text")).toBe("plain text");
  });
});

describe("escapeHtml", () => {
  it("escapes ampersands first and keeps quotes", () => {
    expect(escapeHtml(`<b>"R&D"</b>`)).toBe(`&lt;b&gt;"R&amp;D"&lt;/b&gt;`);
  });
});

describe("paths", () => {
  it("resolves beside the calling module", () => {
    expect(basename(esmDirname(import.meta.url))).toBe("tests");
    expect(resolveRelativePath(import.meta.url, "..", "config", "styles.json").endsWith("config/styles.json")).toBe(true);
  });

  it("reads a file relative to the calling module", () => {
    expect(readRelativeFile(import.meta.url, "..", "config", "instructions.md").length).toBeGreaterThan(0);
  });
});

describe("errorMessage", () => {
  it("uses the message of an Error and stringifies anything else", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage(42)).toBe("42");
  });
});
