/**
 * File-oriented command line: `generate`, `embed-icons` and `render`.
 *
 * `runCli` never exits the process; it returns the exit code so the bin
 * entry (cli.ts) stays a one-liner and the commands can be tested with
 * in-memory streams and a fake process runner.
 */

import { readFileSync, writeFileSync } from "node:fs";
import { resolve } from "node:path";
import minimist from "minimist";
import { flagValues, parseThemeName, VERSION } from "./config.js";
import { parseDescriptorJson } from "./descriptor.js";
import { embedIconsInFile, resolveIconReference } from "./assets/icon_embedder.js";
import { DEFAULT_BORDER, DEFAULT_SCALE, type ProcessRunner, renderDiagram } from "./assets/renderer.js";
import { assembleDiagram } from "./generator.js";
import { create_logger, type Logger } from "./loggers/console_logger.js";
import { createStyleContext, loadDefaultStyleConfig, loadStyleConfig } from "./styles/style_config.js";
import { errorMessage } from "./utils.js";

export interface CliIo {
  /** Command results (the written path). */
  out: (line: string) => void;
  /** `Error: ...` lines. */
  err: (line: string) => void;
  readStdin: () => Promise<string>;
  logger: Logger;
  runner?: ProcessRunner;
}

export const USAGE = `drawio-layout (${VERSION})

Usage:
  drawio-layout generate [descriptor.json] --output <file.drawio> [options]
  drawio-layout embed-icons <file.drawio> [--output <file.drawio>]
  drawio-layout render <file.drawio> [--output <file.png>] [--scale <n>] [--border <n>]

generate options:
  --output, -o <path>      Output .drawio file (required)
  --theme <light|dark>     Override the descriptor's theme
  --compress               Deflate + base64 the diagram content
  --embed-icons            Embed file:/// icon references as data
  --style-config <path>    Style configuration JSON (default: shipped config/styles.json)

The descriptor is read from stdin when no file (or "-") is given.
STYLE_CONFIG_PATH is used when --style-config is not given.`;

async function readProcessStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

export function processIo(): CliIo {
  return {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
    readStdin: readProcessStdin,
    logger: create_logger(),
  };
}

/** Thrown for bad command-line usage; printed like any other error. */
export class UsageError extends Error {
  readonly code = "USAGE";

  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function lastFlag(value: unknown): string | undefined {
  const last = flagValues(value)?.at(-1);
  return last === "" ? undefined : last;
}

function numberFlag(value: unknown, name: string, fallback: number): number {
  const raw = lastFlag(value);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new UsageError(`--${name} must be a positive number, got "${raw}"`);
  }
  return parsed;
}

function positional(args: minimist.ParsedArgs, index: number): string | undefined {
  const value: unknown = args._[index];
  return value === undefined ? undefined : String(value);
}

async function runGenerate(argv: string[], io: CliIo, env: Record<string, string | undefined>): Promise<number> {
  const args = minimist(argv, {
    string: ["output", "theme", "style-config"],
    boolean: ["compress", "embed-icons"],
    alias: { o: "output" },
  });

  const output = lastFlag(args.output);
  if (output === undefined) {
    throw new UsageError("generate needs --output <file.drawio>");
  }
  const themeOverride = lastFlag(args.theme);
  const theme = themeOverride !== undefined ? parseThemeName(themeOverride) : undefined;
  if (theme instanceof Error) throw new UsageError(theme.message);

  const input = positional(args, 0);
  const text = input === undefined || input === "-" ? await io.readStdin() : readInputFile(input);
  const parsed = parseDescriptorJson(text);
  const descriptor = theme !== undefined ? { ...parsed.descriptor, theme } : parsed.descriptor;

  const styleConfigPath = lastFlag(args["style-config"]) ?? (env.STYLE_CONFIG_PATH?.trim() || undefined);
  const config = styleConfigPath ? loadStyleConfig(styleConfigPath) : loadDefaultStyleConfig();
  const ctx = createStyleContext(config, descriptor.theme);

  const embedIcons = args["embed-icons"] === true;
  const result = assembleDiagram(descriptor, ctx, {
    compress: args.compress === true,
    ...(embedIcons ? { resolveIcon: (reference: string) => resolveIconReference(reference, { logger: io.logger }) } : {}),
  });

  for (const note of [...parsed.diagnostics, ...result.diagnostics]) {
    io.logger.warn(`${note.code}: ${note.message}`);
  }

  const outputPath = resolve(output);
  writeFileSync(outputPath, result.xml, "utf-8");
  io.out(`Generated: ${outputPath} (${result.stats.nodes} nodes, ${result.stats.edges} edges)`);
  return 0;
}

function readInputFile(path: string): string {
  try {
    return readFileSync(path, "utf-8");
  } catch (error) {
    throw new UsageError(`file not found: ${path} (${errorMessage(error)})`);
  }
}

function runEmbedIcons(argv: string[], io: CliIo): number {
  const args = minimist(argv, { string: ["output"], alias: { o: "output" } });
  const input = positional(args, 0);
  if (input === undefined) {
    throw new UsageError("embed-icons needs a .drawio file");
  }
  const report = embedIconsInFile(input, lastFlag(args.output), { logger: io.logger });
  if (report.backupPath) {
    io.logger.info(`Backup written to ${report.backupPath}`);
  }
  io.out(`Embedded ${report.embedded.length} icon(s) into ${report.outputPath}`);
  return 0;
}

async function runRender(argv: string[], io: CliIo): Promise<number> {
  const args = minimist(argv, { string: ["output", "scale", "border"], alias: { o: "output" } });
  const input = positional(args, 0);
  if (input === undefined) {
    throw new UsageError("render needs a .drawio file");
  }
  const output = lastFlag(args.output);
  const options = {
    scale: numberFlag(args.scale, "scale", DEFAULT_SCALE),
    border: numberFlag(args.border, "border", DEFAULT_BORDER),
    ...(output !== undefined ? { output } : {}),
  };
  const rendered = io.runner ? await renderDiagram(input, options, io.runner) : await renderDiagram(input, options);
  io.out(`Rendered: ${rendered}`);
  return 0;
}

/**
 * Run one CLI invocation. Every failure is reported as `Error: <message>`
 * with exit code 1; nothing is written for a malformed descriptor.
 */
export async function runCli(
  argv: readonly string[],
  io: CliIo = processIo(),
  env: Record<string, string | undefined> = process.env,
): Promise<number> {
  const [command, ...rest] = argv;
  if (command === undefined || command === "--help" || command === "-h" || command === "help") {
    io.out(USAGE);
    return command === undefined ? 1 : 0;
  }
  if (command === "--version") {
    io.out(VERSION);
    return 0;
  }

  try {
    switch (command) {
      case "generate":
        return await runGenerate(rest, io, env);
      case "embed-icons":
        return runEmbedIcons(rest, io);
      case "render":
        return await runRender(rest, io);
      default:
        throw new UsageError(`unknown command "${command}". Commands: generate, embed-icons, render`);
    }
  } catch (error) {
    io.err(`Error: ${errorMessage(error)}`);
    return 1;
  }
}
