/**
 * Icon embedding: turns `file:///` icon references into self-contained data
 * references so a diagram can be shared without its icon files.
 *
 * SVG is URL-encoded as text; other images are base64. Neither form contains
 * a `;`, which would end the value inside a draw.io style string.
 */

import { copyFileSync, readFileSync, writeFileSync } from "node:fs";
import { extname, resolve } from "node:path";
import type { Logger } from "../loggers/console_logger.js";
import { errorMessage } from "../utils.js";

const FILE_PREFIX = "file:///";
const FILE_REFERENCE = /image=(file:\/\/\/[^;"]+)/g;

const MIME_TYPES: Readonly<Record<string, string>> = {
  ".svg": "image/svg+xml",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".webp": "image/webp",
  ".bmp": "image/bmp",
  ".ico": "image/x-icon",
};

export class IconEmbedError extends Error {
  readonly code = "ICON_EMBED_FAILED";

  constructor(message: string) {
    super(message);
    this.name = "IconEmbedError";
  }
}

export type FileReader = (path: string) => Buffer;

export interface EmbedOptions {
  readFile?: FileReader;
  logger?: Pick<Logger, "warn" | "debug">;
}

export interface EmbedReport {
  xml: string;
  /** Paths embedded, in document order. */
  embedded: string[];
  /** Paths left as references because they could not be read. */
  missing: string[];
}

export function mimeTypeFor(path: string): string {
  return MIME_TYPES[extname(path).toLowerCase()] ?? "image/png";
}

/** Data reference for an image's bytes. */
export function iconDataUri(path: string, bytes: Buffer): string {
  const mime = mimeTypeFor(path);
  if (mime === "image/svg+xml") {
    return `data:${mime},${encodeURIComponent(bytes.toString("utf-8"))}`;
  }
  return `data:${mime},${bytes.toString("base64")}`;
}

/**
 * Local path named by a `file:///` reference. The rest of the reference is
 * taken as a literal path, so `%`, `#` and `?` stay part of the file name.
 */
export function fileReferencePath(reference: string): string {
  return reference.slice("file://".length);
}

/**
 * Resolve one icon reference. Anything that is not a `file:///` reference is
 * returned as is; a file that cannot be read leaves the reference unchanged
 * and logs a warning.
 */
export function resolveIconReference(reference: string, options: EmbedOptions = {}): string {
  if (!reference.startsWith(FILE_PREFIX)) return reference;
  const readFile: FileReader = options.readFile ?? ((file) => readFileSync(file));
  const path = fileReferencePath(reference);
  try {
    return iconDataUri(path, readFile(path));
  } catch (error) {
    options.logger?.warn(`Icon not found, keeping reference: ${path} (${errorMessage(error)})`);
    return reference;
  }
}

/** Replace every `image=file:///...` reference in a draw.io document. */
export function embedIconsInXml(xml: string, options: EmbedOptions = {}): EmbedReport {
  const embedded: string[] = [];
  const missing: string[] = [];
  const result = xml.replace(FILE_REFERENCE, (match, reference: string) => {
    const resolved = resolveIconReference(reference, options);
    const path = fileReferencePath(reference);
    if (resolved === reference) {
      missing.push(path);
      return match;
    }
    embedded.push(path);
    options.logger?.debug(`Embedded ${path} (${mimeTypeFor(path)}, ${resolved.length} chars)`);
    return `image=${resolved}`;
  });
  return { xml: result, embedded, missing };
}

/**
 * Embed icons in a `.drawio` file. Without `outputPath` the file is rewritten
 * in place after copying it to `<file>.bak`.
 */
export function embedIconsInFile(
  inputPath: string,
  outputPath?: string,
  options: EmbedOptions = {},
): EmbedReport & { outputPath: string; backupPath?: string } {
  const input = resolve(inputPath);
  let xml: string;
  try {
    xml = readFileSync(input, "utf-8");
  } catch (error) {
    throw new IconEmbedError(`Cannot read ${input}: ${errorMessage(error)}`);
  }

  const report = embedIconsInXml(xml, options);
  const output = outputPath ? resolve(outputPath) : input;
  let backupPath: string | undefined;
  if (report.embedded.length > 0) {
    if (output === input) {
      backupPath = `${input}.bak`;
      copyFileSync(input, backupPath);
    }
    writeFileSync(output, report.xml, "utf-8");
  } else if (output !== input) {
    writeFileSync(output, xml, "utf-8");
  }
  return backupPath ? { ...report, outputPath: output, backupPath } : { ...report, outputPath: output };
}
