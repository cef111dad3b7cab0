import path from "path";
import { ParseError } from "../core/errors.js";
import { newScanId } from "../core/ids.js";
import type { FindingRow, ScanMetadata, ToolRunResult } from "../core/scan.js";
import type { ToolRegistry } from "../tools/registry.js";

export interface ConvertOrigin {
  /** Project label stored on every row; defaults to the base name of `projectPath`. */
  root?: string;
  /** Defaults to the run's working directory. */
  projectPath?: string;
  /** Scanned file or directory; defaults to the run's working directory. */
  target?: string;
}

export interface ConvertedScan {
  scan: ScanMetadata;
  rows: FindingRow[];
  skippedLines: number;
}

export function formatCommand(command: readonly string[][]): string {
  return command.map((argv) => argv.join(" ")).join("\n");
}

function firstLine(text: string): string {
  return text.split(/\r?\n/).find((l) => l.trim().length > 0)?.trim() ?? "";
}

function appendParseError(stderr: string, message: string): string {
  return `${stderr}${stderr && !stderr.endsWith("\n") ? "\n" : ""}[parse error] ${message}\n`;
}

export class ResultConverter {
  constructor(
    private readonly registry: ToolRegistry,
    private readonly opts: { minConfidence?: number } = {}
  ) {}

  convert(run: ToolRunResult, origin: ConvertOrigin = {}): ConvertedScan {
    const tool = this.registry.get(run.toolId);
    const projectPath = path.resolve(origin.projectPath ?? run.cwd);
    const root = origin.root ?? path.basename(projectPath);

    const failures: string[] = [];
    let stderr = run.stderr;
    let rows: FindingRow[] = [];
    let skippedLines = 0;

    if (run.state === "timed_out") {
      failures.push(`timed out after ${run.durationMs}ms`);
    } else if (run.state === "launch_failed") {
      const reason = firstLine(run.stderr);
      failures.push(reason ? `launch failed: ${reason}` : "launch failed");
    } else {
      if (!tool.successExitCodes.includes(run.exitCode)) failures.push(`exit code ${run.exitCode}`);
      try {
        const out = tool.parse(run, {
          root,
          cwd: run.cwd,
          target: path.resolve(origin.target ?? run.cwd),
          minConfidence: this.opts.minConfidence ?? 50
        });
        rows = out.rows;
        skippedLines = out.skippedLines;
        for (const message of out.parseErrors ?? []) {
          failures.push(`parse error: ${message}`);
          stderr = appendParseError(stderr, message);
        }
      } catch (err) {
        if (!(err instanceof ParseError)) throw err;
        failures.push(`parse error: ${err.message}`);
        stderr = appendParseError(stderr, err.message);
      }
    }

    const scan: ScanMetadata = {
      scanId: newScanId(),
      toolId: tool.toolId,
      kind: tool.kind,
      root,
      projectPath,
      scanTimestamp: run.startedAt,
      command: formatCommand(run.command),
      exitCode: run.exitCode,
      durationMs: run.durationMs,
      state: run.state,
      stderr,
      failure: failures.length ? failures.join("; ") : null,
      findingCount: rows.length
    };

    return { scan, rows, skippedLines };
  }
}
