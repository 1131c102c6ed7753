/**
 * Shared utility functions.
 *
 * Small, reusable helpers that appear in multiple modules.
 * Keeps path-resolution and escaping boilerplate out of business-logic files.
 */

import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

/**
 * ESM equivalent of the CommonJS `__dirname` global.
 *
 * Usage:
 * ```ts
 * const __dirname = esmDirname(import.meta.url);
 * ```
 *
 * @param importMetaUrl — pass `import.meta.url` from the calling module.
 */
export function esmDirname(importMetaUrl: string): string {
  return dirname(fileURLToPath(importMetaUrl));
}

/**
 * Resolve a path relative to the calling module's directory.
 *
 * Sources live in `src/` and compiled output in `dist/`, both one level below
 * the package root, so `resolveRelativePath(import.meta.url, "..", "config")`
 * reaches the same directory from either.
 */
export function resolveRelativePath(importMetaUrl: string, ...pathSegments: string[]): string {
  return resolve(esmDirname(importMetaUrl), ...pathSegments);
}

/**
 * Read a UTF-8 text file resolved relative to the calling module's directory.
 *
 * @param importMetaUrl — pass `import.meta.url` from the calling module.
 * @param pathSegments  — path segments joined via `resolve` (same API as `path.join`).
 */
export function readRelativeFile(importMetaUrl: string, ...pathSegments: string[]): string {
  return readFileSync(resolveRelativePath(importMetaUrl, ...pathSegments), "utf-8");
}

/** Lookup map for single-pass XML attribute escaping */
const XML_ESCAPE_MAP: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;",
};

/** Escape a string for use inside a double-quoted XML attribute. */
export function escapeXml(str: string): string {
  return str.replace(/[&<>"']/g, (ch) => XML_ESCAPE_MAP[ch] ?? ch);
}

/**
 * Escape text that draw.io will interpret as HTML (cells styled with `html=1`).
 * Quotes are left alone: the result is escaped again by `escapeXml` when it
 * lands in an attribute.
 */
export function escapeHtml(str: string): string {
  return str.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/** Render an unknown thrown value as a message string. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
