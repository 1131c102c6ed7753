import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, describe, expect, it } from "vitest";
import {
  createStyleContext,
  DEFAULT_STYLE_CONFIG_PATH,
  loadDefaultStyleConfig,
  loadStyleConfig,
  parseStyleConfig,
  resetDefaultStyleConfig,
  type StyleConfig,
  StyleConfigError,
} from "../src/styles/style_config.js";

function withoutDark(config: StyleConfig): StyleConfig {
  const { dark: _dark, ...rest } = config;
  return rest;
}

describe("loadDefaultStyleConfig", () => {
  it("loads the shipped configuration", () => {
    const config = loadDefaultStyleConfig();
    expect(config.page.width).toBe(1200);
    expect(config.spacing.min_edge_gap).toBe(60);
    expect(config.dimensions.process).toEqual([260, 56]);
  });

  it("caches until reset", () => {
    const first = loadDefaultStyleConfig();
    expect(loadDefaultStyleConfig()).toBe(first);
    resetDefaultStyleConfig();
    const second = loadDefaultStyleConfig();
    expect(second).not.toBe(first);
    expect(second).toEqual(first);
  });

  it("resolves the shipped file beside the package root", () => {
    expect(DEFAULT_STYLE_CONFIG_PATH.endsWith(join("config", "styles.json"))).toBe(true);
  });
});

describe("parseStyleConfig", () => {
  it("names the first failing path", () => {
    const config = structuredClone(loadDefaultStyleConfig());
    const broken = { ...config, spacing: { ...config.spacing, h_gap: "wide" } };
    expect(() => parseStyleConfig(broken, "custom.json")).toThrowError(
      /^Invalid style configuration in custom\.json at spacing\.h_gap: /,
    );
  });

  it("rejects a style table without a required key", () => {
    const config = structuredClone(loadDefaultStyleConfig());
    const { edge_solid: _edge, ...styles } = config.styles;
    expect(() => parseStyleConfig({ ...config, styles })).toThrowError(
      "Invalid style configuration in <inline> at styles: missing edge_solid",
    );
  });

  it("checks the dark style table too", () => {
    const config = structuredClone(loadDefaultStyleConfig());
    const dark = config.dark;
    expect(dark).toBeDefined();
    if (!dark) return;
    const { title: _title, ...styles } = dark.styles;
    expect(() => parseStyleConfig({ ...config, dark: { ...dark, styles } })).toThrowError(
      "Invalid style configuration in <inline> at dark.styles: missing title",
    );
  });

  it("rejects content_right left of content_left", () => {
    const config = structuredClone(loadDefaultStyleConfig());
    const page = { ...config.page, content_left: 600, content_right: 500 };
    expect(() => parseStyleConfig({ ...config, page })).toThrowError(StyleConfigError);
  });
});

describe("loadStyleConfig", () => {
  const dir = mkdtempSync(join(tmpdir(), "style-config-"));
  afterAll(() => rmSync(dir, { recursive: true, force: true }));

  it("reports a missing file", () => {
    const path = join(dir, "absent.json");
    expect(() => loadStyleConfig(path)).toThrowError(`Cannot read style configuration ${path}`);
  });

  it("reports invalid JSON", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ not json");
    try {
      loadStyleConfig(path);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(StyleConfigError);
      if (error instanceof StyleConfigError) {
        expect(error.code).toBe("STYLE_CONFIG_INVALID");
        expect(error.path).toBe(path);
        expect(error.message.startsWith(`Style configuration ${path} is not valid JSON`)).toBe(true);
      }
    }
  });

  it("loads a valid custom file", () => {
    const config = structuredClone(loadDefaultStyleConfig());
    const path = join(dir, "custom.json");
    writeFileSync(path, JSON.stringify({ ...config, page: { ...config.page, width: 1600 } }));
    expect(loadStyleConfig(path).page.width).toBe(1600);
  });
});

describe("createStyleContext", () => {
  it("converts the light theme to camelCase geometry", () => {
    const ctx = createStyleContext(loadDefaultStyleConfig());
    expect(ctx.theme).toBe("light");
    expect(ctx.page).toEqual({
      width: 1200,
      contentLeft: 40,
      contentRight: 1160,
      contentWidth: 1120,
      minHeight: 800,
      canvasMargin: 200,
    });
    expect(ctx.spacing.swimlaneLabelWidth).toBe(140);
    expect(ctx.dimensions.decision).toEqual({ width: 180, height: 100 });
    expect(ctx.dimensions.detail_extra_height).toBeUndefined();
    expect(ctx.detailExtraHeight).toBe(24);
    expect(ctx.detailTextColor).toBe("#64748B");
    expect(ctx.edgeColors.green).toBe("#16A34A");
    expect(ctx.background).toBeUndefined();
  });

  it("swaps the whole theme for dark", () => {
    const config = loadDefaultStyleConfig();
    const light = createStyleContext(config, "light");
    const dark = createStyleContext(config, "dark");
    expect(dark.theme).toBe("dark");
    expect(dark.background).toBe("#0F172A");
    expect(dark.detailTextColor).toBe("#94A3B8");
    expect(dark.edgeColors.green).toBe("#4ADE80");
    for (const key of Object.keys(light.styles)) {
      expect(dark.styles[key], key).not.toBe(light.styles[key]);
    }
  });

  it("leaves the light context untouched after a dark one is built", () => {
    const config = loadDefaultStyleConfig();
    const before = createStyleContext(config, "light");
    createStyleContext(config, "dark");
    expect(createStyleContext(config, "light")).toEqual(before);
  });

  it("falls back to light when the configuration has no dark section", () => {
    const ctx = createStyleContext(withoutDark(loadDefaultStyleConfig()), "dark");
    expect(ctx.theme).toBe("light");
    expect(ctx.background).toBeUndefined();
  });

  it("freezes the context", () => {
    const ctx = createStyleContext(loadDefaultStyleConfig());
    expect(Object.isFrozen(ctx)).toBe(true);
    expect(Object.isFrozen(ctx.styles)).toBe(true);
    expect(Object.isFrozen(ctx.page)).toBe(true);
  });
});
