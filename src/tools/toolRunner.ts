import { promises as fs } from "fs";
import path from "path";
import { ConfigurationError } from "../core/errors.js";
import type { RunState, ToolId, ToolRunResult } from "../core/scan.js";
import { LocalProcessRunner } from "../execution/backends/localProcess.js";
import type { ProcessResult, ProcessRunner } from "../execution/backends/types.js";
import { createScratchDir } from "../execution/workspace.js";
import type { ToolRegistry } from "./registry.js";
import type { OutputFormat, ToolCommand } from "./types.js";

export interface ResolvedTarget {
  /** Absolute path of the file or directory under analysis. */
  target: string;
  /** Directory tools run in: the target itself, or the directory holding a file target. */
  cwd: string;
  isDirectory: boolean;
}

export async function resolveTarget(target: string): Promise<ResolvedTarget> {
  const abs = path.resolve(target);
  const stat = await fs.stat(abs).catch(() => {
    throw new ConfigurationError(`target does not exist: ${target}`);
  });
  if (stat.isDirectory()) return { target: abs, cwd: abs, isDirectory: true };
  if (stat.isFile()) return { target: abs, cwd: path.dirname(abs), isDirectory: false };
  throw new ConfigurationError(`target is neither a file nor a directory: ${target}`);
}

export function assertTimeout(timeoutMs: number): void {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigurationError(`timeout must be a positive number of milliseconds, got ${timeoutMs}`);
  }
}

function tryParseJson(text: string): unknown {
  if (!text.trim()) return null;
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return null;
  }
}

async function readStepJson(format: OutputFormat, step: ToolCommand, res: ProcessResult): Promise<unknown> {
  if (format !== "json") return null;
  if (!step.outputFile) return tryParseJson(res.stdout);
  try {
    return tryParseJson(await fs.readFile(step.outputFile, "utf8"));
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
}

export interface ToolRunnerOptions {
  processRunner?: ProcessRunner;
  /** Vulture's `--min-confidence`. */
  minConfidence?: number;
  /** Parent of the per-run scratch directories (default: the OS temp dir). */
  scratchRoot?: string;
}

/** Runs one registered tool against a target and captures its raw output. Exit codes are never retried. */
export class ToolRunner {
  private readonly processRunner: ProcessRunner;
  private readonly minConfidence: number;

  constructor(
    private readonly registry: ToolRegistry,
    private readonly opts: ToolRunnerOptions = {}
  ) {
    this.processRunner = opts.processRunner ?? new LocalProcessRunner();
    this.minConfidence = opts.minConfidence ?? 50;
  }

  async run(toolId: ToolId | string, target: string, timeoutMs: number): Promise<ToolRunResult> {
    const tool = this.registry.get(toolId);
    assertTimeout(timeoutMs);
    const resolved = await resolveTarget(target);

    const scratch = await createScratchDir(tool.toolId, this.opts.scratchRoot);
    try {
      const steps = tool.plan({
        target: resolved.target,
        cwd: resolved.cwd,
        scratchDir: scratch.dir,
        minConfidence: this.minConfidence
      });
      if (!steps.length) throw new Error(`tool:${tool.toolId}: empty command plan`);

      const deadline = performance.now() + timeoutMs;
      const results: ProcessResult[] = [];
      const payloads: Record<string, unknown> = {};
      let state: RunState = "completed";

      for (const step of steps) {
        const remaining = Math.max(1, Math.round(deadline - performance.now()));
        const res = await this.processRunner.execute({ argv: step.argv, cwd: step.cwd, env: step.env, timeoutMs: remaining });
        results.push(res);
        if (res.state !== "exited") {
          state = res.state;
          break;
        }
        payloads[step.label] = await readStepJson(tool.output, step, res);
      }

      const first = results[0];
      const last = results[results.length - 1];
      if (!first || !last) throw new Error(`tool:${tool.toolId}: no step was executed`);

      const durationMs = results.reduce((sum, r) => sum + r.durationMs, 0);
      const single = steps.length === 1 ? steps[0] : undefined;
      const parsedJson = single ? (payloads[single.label] ?? null) : payloads;

      return {
        toolId: tool.toolId,
        command: results.map((_, i) => [...(steps[i]?.argv ?? [])]),
        cwd: resolved.cwd,
        state,
        exitCode: state === "completed" ? Math.max(...results.map((r) => r.exitCode)) : last.exitCode,
        durationMs: state === "timed_out" ? Math.min(durationMs, timeoutMs) : durationMs,
        stdout: results.map((r) => r.stdout).join(""),
        stderr: results.map((r) => r.stderr).join(""),
        parsedJson,
        startedAt: first.startedAt,
        finishedAt: last.finishedAt
      };
    } finally {
      await scratch.dispose();
    }
  }
}
