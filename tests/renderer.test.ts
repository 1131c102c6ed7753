import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  buildRenderCommand,
  defaultRenderOutputPath,
  executableCandidates,
  type ProcessRunner,
  RenderError,
  renderDiagram,
  type RunResult,
} from "../src/assets/renderer.js";

function fakeRunner(onPath: string[], result: Partial<RunResult> = {}) {
  const run = vi.fn((_command: readonly string[], _timeoutMs: number) =>
    Promise.resolve({ exitCode: 0, stdout: "", stderr: "", timedOut: false, ...result })
  );
  const runner: ProcessRunner = { which: (command) => onPath.includes(command), run };
  return { runner, run };
}

async function renderError(promise: Promise<string>): Promise<RenderError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof RenderError) return error;
    throw error;
  }
  throw new Error("expected a RenderError");
}

describe("defaultRenderOutputPath", () => {
  it("swaps the extension for .png", () => {
    expect(defaultRenderOutputPath("/work/flow.drawio")).toBe("/work/flow.png");
  });

  it("resolves an explicit path", () => {
    expect(defaultRenderOutputPath("/work/flow.drawio", "/tmp/x.png")).toBe("/tmp/x.png");
  });
});

describe("buildRenderCommand", () => {
  it("builds the export command", () => {
    expect(buildRenderCommand("in.drawio", "out.png", false)).toEqual([
      "drawio", "--export", "--format", "png", "--scale", "2", "--border", "20", "--output", "out.png", "in.drawio",
    ]);
  });

  it("wraps the command in xvfb-run when available", () => {
    expect(buildRenderCommand("in.drawio", "out.png", true, 1, 0).slice(0, 8)).toEqual([
      "xvfb-run", "-a", "drawio", "--export", "--format", "png", "--scale", "1",
    ]);
  });
});

describe("executableCandidates", () => {
  it("looks for the bare name outside Windows", () => {
    expect(executableCandidates("drawio", "linux", ".EXE")).toEqual(["drawio"]);
  });

  it("adds each PATHEXT suffix on Windows", () => {
    expect(executableCandidates("drawio", "win32", ".EXE;.CMD;")).toEqual(["drawio", "drawio.exe", "drawio.cmd"]);
  });

  it("falls back to the usual suffixes without PATHEXT", () => {
    expect(executableCandidates("drawio", "win32", undefined)).toEqual([
      "drawio", "drawio.com", "drawio.exe", "drawio.bat", "drawio.cmd",
    ]);
  });
});

describe("renderDiagram", () => {
  let dir: string;
  let input: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "render-"));
    input = join(dir, "d.drawio");
    writeFileSync(input, "<mxfile/>");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("runs drawio and returns the output path", async () => {
    const { runner, run } = fakeRunner(["drawio"]);
    await expect(renderDiagram(input, { scale: 3 }, runner)).resolves.toBe(join(dir, "d.png"));
    expect(run).toHaveBeenCalledWith(buildRenderCommand(input, join(dir, "d.png"), false, 3, 20), 60_000);
  });

  it("uses xvfb-run when it is on PATH", async () => {
    const { runner, run } = fakeRunner(["drawio", "xvfb-run"]);
    await renderDiagram(input, {}, runner);
    expect(run.mock.calls[0][0][0]).toBe("xvfb-run");
  });

  it("fails for a missing input", async () => {
    const { runner, run } = fakeRunner(["drawio"]);
    const error = await renderError(renderDiagram(join(dir, "missing.drawio"), {}, runner));
    expect(error.code).toBe("INPUT_NOT_FOUND");
    expect(run).not.toHaveBeenCalled();
  });

  it("fails when drawio is not installed", async () => {
    const { runner } = fakeRunner([]);
    expect((await renderError(renderDiagram(input, {}, runner))).code).toBe("BINARY_NOT_FOUND");
  });

  it("reports a timeout", async () => {
    const { runner } = fakeRunner(["drawio"], { timedOut: true, exitCode: -1 });
    const error = await renderError(renderDiagram(input, { timeoutMs: 5000 }, runner));
    expect(error.code).toBe("TIMEOUT");
    expect(error.message).toBe("drawio render timed out after 5 seconds");
  });

  it("reports a non-zero exit with its stderr", async () => {
    const { runner } = fakeRunner(["drawio"], { exitCode: 3, stderr: "bad file" });
    const error = await renderError(renderDiagram(input, {}, runner));
    expect(error.code).toBe("EXIT_NONZERO");
    expect(error.message).toBe("drawio exited with code 3");
    expect(error.exitCode).toBe(3);
    expect(error.stderr).toBe("bad file");
  });
});
