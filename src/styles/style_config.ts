/**
 * Style configuration — page geometry, spacing, node dimensions, style
 * strings and edge colours, loaded from `config/styles.json`.
 *
 * The raw file uses snake_case keys (it is meant to be edited by hand); it is
 * validated with zod and then folded into a frozen {@link StyleContext} for one
 * theme. Nothing downstream reads the raw configuration or swaps it in place:
 * the context is passed explicitly through the mapper, the layout engine and
 * the assembler.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { errorMessage, resolveRelativePath } from "../utils.js";

export type ThemeName = "light" | "dark";

export const THEME_NAMES: readonly ThemeName[] = ["light", "dark"] as const;

const nonNegative = z.number().finite().nonnegative();
const size = z.tuple([z.number().positive(), z.number().positive()]);
const styleTable = z.record(z.string(), z.string());
const edgePalette = z.record(z.string(), z.string());

const StyleConfigSchema = z.object({
  page: z.object({
    width: z.number().positive(),
    content_left: nonNegative,
    content_right: z.number().positive(),
    min_height: nonNegative,
    canvas_margin: nonNegative,
  }),
  spacing: z.object({
    v_gap: nonNegative,
    h_gap: nonNegative,
    group_padding: nonNegative,
    min_edge_gap: nonNegative,
    title_bottom_margin: nonNegative,
    group_label_height: nonNegative,
    swimlane_header: nonNegative,
    swimlane_padding: nonNegative,
    swimlane_label_width: nonNegative,
    content_top_min: nonNegative,
    title_top: nonNegative,
    title_height: nonNegative,
    subtitle_height: nonNegative,
  }),
  dimensions: z
    .object({ detail_extra_height: nonNegative, process: size })
    .catchall(size.or(nonNegative)),
  colors: z.object({
    detail_text: z.string(),
    edges: edgePalette,
  }),
  styles: styleTable,
  dark: z
    .object({
      background: z.string(),
      colors: z.object({
        detail_text: z.string(),
        edges: edgePalette,
      }),
      styles: styleTable,
    })
    .optional(),
}).refine((cfg) => cfg.page.content_right > cfg.page.content_left, {
  message: "page.content_right must be greater than page.content_left",
  path: ["page", "content_right"],
});

export type StyleConfig = z.infer<typeof StyleConfigSchema>;

export interface Size {
  readonly width: number;
  readonly height: number;
}

export interface PageGeometry {
  readonly width: number;
  readonly contentLeft: number;
  readonly contentRight: number;
  readonly contentWidth: number;
  readonly minHeight: number;
  readonly canvasMargin: number;
}

export interface Spacing {
  readonly vGap: number;
  readonly hGap: number;
  readonly groupPadding: number;
  readonly minEdgeGap: number;
  readonly titleBottomMargin: number;
  readonly groupLabelHeight: number;
  readonly swimlaneHeader: number;
  readonly swimlanePadding: number;
  readonly swimlaneLabelWidth: number;
  readonly contentTopMin: number;
  readonly titleTop: number;
  readonly titleHeight: number;
  readonly subtitleHeight: number;
}

/**
 * Everything the mapper, layout engine and assembler need for one theme.
 * Built once per generation and never mutated.
 */
export interface StyleContext {
  readonly theme: ThemeName;
  readonly page: PageGeometry;
  readonly spacing: Spacing;
  readonly dimensions: Readonly<Record<string, Size>>;
  readonly detailExtraHeight: number;
  readonly styles: Readonly<Record<string, string>>;
  readonly edgeColors: Readonly<Record<string, string>>;
  readonly detailTextColor: string;
  /** Document background; only set for the dark theme. */
  readonly background?: string;
}

export class StyleConfigError extends Error {
  readonly code = "STYLE_CONFIG_INVALID";

  constructor(message: string, readonly path?: string) {
    super(message);
    this.name = "StyleConfigError";
  }
}

/** Style keys every configuration must define, per theme. */
export const REQUIRED_STYLE_KEYS: readonly string[] = [
  "title",
  "subtitle",
  "group",
  "swimlane",
  "icon_base",
  "process_primary",
  "edge_solid",
] as const;

/**
 * Validate an already-parsed configuration object.
 * Throws {@link StyleConfigError} naming the first failing path.
 */
export function parseStyleConfig(raw: unknown, source = "<inline>"): StyleConfig {
  const result = StyleConfigSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.join(".") || "(root)";
    throw new StyleConfigError(`Invalid style configuration in ${source} at ${where}: ${issue.message}`, source);
  }

  const config = result.data;
  const tables: Array<[string, Record<string, string>]> = [["styles", config.styles]];
  if (config.dark) tables.push(["dark.styles", config.dark.styles]);
  for (const [name, table] of tables) {
    const missing = REQUIRED_STYLE_KEYS.filter((key) => !(key in table));
    if (missing.length > 0) {
      throw new StyleConfigError(`Invalid style configuration in ${source} at ${name}: missing ${missing.join(", ")}`, source);
    }
  }
  return config;
}

/** Read and validate a style configuration file. */
export function loadStyleConfig(path: string): StyleConfig {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (error) {
    throw new StyleConfigError(`Cannot read style configuration ${path}: ${errorMessage(error)}`, path);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new StyleConfigError(`Style configuration ${path} is not valid JSON: ${errorMessage(error)}`, path);
  }
  return parseStyleConfig(raw, path);
}

/** Path of the configuration shipped with the package. */
export const DEFAULT_STYLE_CONFIG_PATH = resolveRelativePath(import.meta.url, "..", "..", "config", "styles.json");

let defaultConfig: StyleConfig | undefined;

/** The shipped configuration, read once and cached. */
export function loadDefaultStyleConfig(): StyleConfig {
  defaultConfig ??= loadStyleConfig(DEFAULT_STYLE_CONFIG_PATH);
  return defaultConfig;
}

/** Drop the cached default configuration (tests only). */
export function resetDefaultStyleConfig(): void {
  defaultConfig = undefined;
}

function toSizeTable(dimensions: StyleConfig["dimensions"]): Record<string, Size> {
  const table: Record<string, Size> = {};
  for (const [key, value] of Object.entries(dimensions)) {
    if (Array.isArray(value)) {
      table[key] = Object.freeze({ width: value[0], height: value[1] });
    }
  }
  return table;
}

/**
 * Fold a configuration into the immutable context for one theme.
 *
 * The dark theme replaces the style table, the edge palette and the detail
 * colour together. Returns the light context when the configuration has no
 * `dark` section; callers compare `context.theme` with what they asked for.
 */
export function createStyleContext(config: StyleConfig, theme: ThemeName = "light"): StyleContext {
  const dark = theme === "dark" ? config.dark : undefined;
  const { page, spacing } = config;

  const context: StyleContext = {
    theme: dark ? "dark" : "light",
    page: Object.freeze({
      width: page.width,
      contentLeft: page.content_left,
      contentRight: page.content_right,
      contentWidth: page.content_right - page.content_left,
      minHeight: page.min_height,
      canvasMargin: page.canvas_margin,
    }),
    spacing: Object.freeze({
      vGap: spacing.v_gap,
      hGap: spacing.h_gap,
      groupPadding: spacing.group_padding,
      minEdgeGap: spacing.min_edge_gap,
      titleBottomMargin: spacing.title_bottom_margin,
      groupLabelHeight: spacing.group_label_height,
      swimlaneHeader: spacing.swimlane_header,
      swimlanePadding: spacing.swimlane_padding,
      swimlaneLabelWidth: spacing.swimlane_label_width,
      contentTopMin: spacing.content_top_min,
      titleTop: spacing.title_top,
      titleHeight: spacing.title_height,
      subtitleHeight: spacing.subtitle_height,
    }),
    dimensions: Object.freeze(toSizeTable(config.dimensions)),
    detailExtraHeight: config.dimensions.detail_extra_height,
    styles: Object.freeze({ ...(dark ? dark.styles : config.styles) }),
    edgeColors: Object.freeze({ ...(dark ? dark.colors.edges : config.colors.edges) }),
    detailTextColor: dark ? dark.colors.detail_text : config.colors.detail_text,
    ...(dark ? { background: dark.background } : {}),
  };
  return Object.freeze(context);
}
