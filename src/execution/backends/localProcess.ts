import { spawn, type ChildProcess } from "child_process";
import { constants as osConstants } from "os";
import { LAUNCH_FAILED_EXIT_CODE, TIMED_OUT_EXIT_CODE } from "../../core/scan.js";
import type { ProcessResult, ProcessRunner, ProcessSpec } from "./types.js";

const MAX_CAPTURE_BYTES = 1024 * 1024;
const isWindows = process.platform === "win32";

interface CaptureState {
  chunks: Buffer[];
  bytes: number;
  truncated: boolean;
}

function newCapture(): CaptureState {
  return { chunks: [], bytes: 0, truncated: false };
}

function appendLimited(state: CaptureState, chunk: Buffer): void {
  if (state.truncated) return;
  const next = state.bytes + chunk.byteLength;
  if (next > MAX_CAPTURE_BYTES) {
    const keep = Math.max(0, MAX_CAPTURE_BYTES - state.bytes);
    if (keep > 0) state.chunks.push(chunk.subarray(0, keep));
    state.bytes = MAX_CAPTURE_BYTES;
    state.truncated = true;
    return;
  }
  state.chunks.push(chunk);
  state.bytes = next;
}

function captured(state: CaptureState, stream: "stdout" | "stderr"): string {
  return Buffer.concat(state.chunks).toString("utf8") + (state.truncated ? `\n[${stream} truncated]\n` : "");
}

function signalExitCode(signal: NodeJS.Signals | null): number {
  if (!signal) return 0;
  const num = osConstants.signals[signal];
  return typeof num === "number" ? 128 + num : 1;
}

function killTree(child: ChildProcess): void {
  if (!isWindows && child.pid !== undefined) {
    try {
      process.kill(-child.pid, "SIGKILL");
      return;
    } catch {
      // group already gone; fall through to the direct kill
    }
  }
  child.kill("SIGKILL");
}

/** Runs one argv directly (no shell) with stdin closed and bounded output capture. */
export class LocalProcessRunner implements ProcessRunner {
  async execute(spec: ProcessSpec): Promise<ProcessResult> {
    const [command, ...args] = spec.argv;
    if (!command) throw new Error("process argv must be non-empty");

    const startedAt = new Date().toISOString();
    const t0 = performance.now();
    const stdout = newCapture();
    const stderr = newCapture();

    const finish = (state: ProcessResult["state"], exitCode: number, extraStderr = ""): ProcessResult => {
      const elapsed = Math.round(performance.now() - t0);
      return {
        state,
        exitCode,
        stdout: captured(stdout, "stdout"),
        stderr: captured(stderr, "stderr") + extraStderr,
        startedAt,
        finishedAt: new Date().toISOString(),
        durationMs: state === "timed_out" ? Math.min(elapsed, spec.timeoutMs) : elapsed
      };
    };

    let child: ChildProcess;
    try {
      child = spawn(command, args, {
        cwd: spec.cwd,
        env: { ...process.env, ...spec.env },
        stdio: ["ignore", "pipe", "pipe"],
        detached: !isWindows,
        windowsHide: true
      });
    } catch (err) {
      return finish("launch_failed", LAUNCH_FAILED_EXIT_CODE, `failed to launch ${command}: ${String(err)}\n`);
    }

    child.stdout?.on("data", (chunk: Buffer) => appendLimited(stdout, chunk));
    child.stderr?.on("data", (chunk: Buffer) => appendLimited(stderr, chunk));

    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      killTree(child);
    }, Math.max(0, spec.timeoutMs));

    try {
      return await new Promise<ProcessResult>((resolve) => {
        let settled = false;
        child.once("error", (err) => {
          if (settled) return;
          settled = true;
          resolve(finish("launch_failed", LAUNCH_FAILED_EXIT_CODE, `failed to launch ${command}: ${err.message}\n`));
        });
        child.once("close", (code, signal) => {
          if (settled) return;
          settled = true;
          if (timedOut) {
            resolve(finish("timed_out", TIMED_OUT_EXIT_CODE, `\n[timeout after ${spec.timeoutMs}ms]\n`));
            return;
          }
          resolve(finish("exited", code ?? signalExitCode(signal)));
        });
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
