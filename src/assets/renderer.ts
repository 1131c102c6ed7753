/**
 * Headless rendering through the draw.io desktop CLI.
 *
 * Linux without a display needs `xvfb-run`; it is used when it is on PATH.
 * The process runner is injectable so the command handling can be tested
 * without either binary.
 */

import { execFile } from "node:child_process";
import { accessSync, constants, existsSync } from "node:fs";
import { delimiter, join, parse, resolve } from "node:path";

export const DRAWIO_BINARY = "drawio";
export const XVFB_BINARY = "xvfb-run";
export const DEFAULT_SCALE = 2;
export const DEFAULT_BORDER = 20;
export const RENDER_TIMEOUT_MS = 60_000;

export type RenderErrorCode = "INPUT_NOT_FOUND" | "BINARY_NOT_FOUND" | "TIMEOUT" | "EXIT_NONZERO";

export class RenderError extends Error {
  constructor(
    message: string,
    readonly code: RenderErrorCode,
    readonly exitCode?: number,
    readonly stderr?: string,
  ) {
    super(message);
    this.name = "RenderError";
  }
}

export interface RunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface ProcessRunner {
  /** Whether an executable is on PATH. */
  which(command: string): boolean;
  run(command: readonly string[], timeoutMs: number): Promise<RunResult>;
}

export interface RenderOptions {
  output?: string;
  scale?: number;
  border?: number;
  timeoutMs?: number;
}

/** `<input without extension>.png` beside the input unless given. */
export function defaultRenderOutputPath(inputPath: string, explicit?: string): string {
  if (explicit !== undefined) return resolve(explicit);
  const { dir, name } = parse(resolve(inputPath));
  return join(dir, `${name}.png`);
}

export function buildRenderCommand(
  inputPath: string,
  outputPath: string,
  xvfbAvailable: boolean,
  scale: number = DEFAULT_SCALE,
  border: number = DEFAULT_BORDER,
): string[] {
  const drawio = [
    DRAWIO_BINARY,
    "--export",
    "--format",
    "png",
    "--scale",
    String(scale),
    "--border",
    String(border),
    "--output",
    outputPath,
    inputPath,
  ];
  return xvfbAvailable ? [XVFB_BINARY, "-a", ...drawio] : drawio;
}

function isExecutable(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

const DEFAULT_PATHEXT = ".COM;.EXE;.BAT;.CMD";

/** File names a PATH entry may hold for `command`; Windows adds each PATHEXT suffix. */
export function executableCandidates(
  command: string,
  platform: NodeJS.Platform = process.platform,
  pathext: string | undefined = process.env.PATHEXT,
): string[] {
  if (platform !== "win32") return [command];
  const extensions = (pathext ?? DEFAULT_PATHEXT).split(";").filter((ext) => ext.length > 0);
  return [command, ...extensions.map((ext) => `${command}${ext.toLowerCase()}`)];
}

export const nodeProcessRunner: ProcessRunner = {
  which(command) {
    const dirs = (process.env.PATH ?? "").split(delimiter).filter((dir) => dir.length > 0);
    const names = executableCandidates(command);
    return dirs.some((dir) => names.some((name) => isExecutable(join(dir, name))));
  },
  run(command, timeoutMs) {
    const [file, ...args] = command;
    return new Promise((resolveRun, rejectRun) => {
      execFile(file, args, { timeout: timeoutMs, encoding: "utf-8" }, (error, stdout, stderr) => {
        if (!error) {
          resolveRun({ exitCode: 0, stdout, stderr, timedOut: false });
          return;
        }
        if (error.killed) {
          resolveRun({ exitCode: -1, stdout, stderr, timedOut: true });
          return;
        }
        if (typeof error.code === "number") {
          resolveRun({ exitCode: error.code, stdout, stderr, timedOut: false });
          return;
        }
        rejectRun(new RenderError(`Cannot start ${file}: ${error.message}`, "BINARY_NOT_FOUND"));
      });
    });
  },
};

/**
 * Render a `.drawio` file to PNG and return the absolute output path.
 */
export async function renderDiagram(
  inputPath: string,
  options: RenderOptions = {},
  runner: ProcessRunner = nodeProcessRunner,
): Promise<string> {
  const input = resolve(inputPath);
  if (!existsSync(input)) {
    throw new RenderError(`Input file not found: ${input}`, "INPUT_NOT_FOUND");
  }
  if (!runner.which(DRAWIO_BINARY)) {
    throw new RenderError(
      `'${DRAWIO_BINARY}' not found on PATH. Install the draw.io desktop app (snap install drawio, or the AppImage from the drawio-desktop releases).`,
      "BINARY_NOT_FOUND",
    );
  }

  const output = defaultRenderOutputPath(input, options.output);
  const command = buildRenderCommand(
    input,
    output,
    runner.which(XVFB_BINARY),
    options.scale ?? DEFAULT_SCALE,
    options.border ?? DEFAULT_BORDER,
  );
  const timeoutMs = options.timeoutMs ?? RENDER_TIMEOUT_MS;
  const result = await runner.run(command, timeoutMs);

  if (result.timedOut) {
    throw new RenderError(`drawio render timed out after ${Math.round(timeoutMs / 1000)} seconds`, "TIMEOUT");
  }
  if (result.exitCode !== 0) {
    throw new RenderError(`drawio exited with code ${result.exitCode}`, "EXIT_NONZERO", result.exitCode, result.stderr);
  }
  return output;
}
