export interface ProcessSpec {
  argv: string[];
  cwd: string;
  env?: Record<string, string>;
  /** Wall-clock budget; the process (group) is killed with SIGKILL when it runs out. */
  timeoutMs: number;
}

export type ProcessState = "exited" | "timed_out" | "launch_failed";

export interface ProcessResult {
  state: ProcessState;
  exitCode: number;
  stdout: string;
  stderr: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

export interface ProcessRunner {
  execute(spec: ProcessSpec): Promise<ProcessResult>;
}
