import { promises as fs } from "fs";
import path from "path";
import type { ResultConverter } from "../convert/resultConverter.js";
import { ConfigurationError, PersistenceError } from "../core/errors.js";
import type { ScanId } from "../core/ids.js";
import type { InvocationState, ToolId, ToolKind } from "../core/scan.js";
import type { PersistenceGateway } from "../store/persistenceGateway.js";
import type { ToolRegistry } from "../tools/registry.js";
import { assertTimeout, type ToolRunner } from "../tools/toolRunner.js";
import { discoverProjects } from "./discovery.js";
import { runBounded } from "./workerPool.js";

export interface AuditRequest {
  /** Project directory (or a single file), or a directory of projects when `multi` is set. */
  root: string;
  toolIds?: readonly string[];
  jobs?: number;
  multi?: boolean;
  stopOnError?: boolean;
  timeoutMs?: number;
}

export interface ToolOutcome {
  toolId: ToolId;
  kind: ToolKind;
  state: InvocationState;
  exitCode: number | null;
  failed: boolean;
  failure: string | null;
  scanId: ScanId | null;
  submitted: number;
  newlyPersisted: number;
  skippedLines: number;
  durationMs: number;
}

export interface ProjectSummary {
  root: string;
  projectPath: string;
  outcomes: ToolOutcome[];
  issueCount: number;
}

export interface AuditSummary {
  projects: ProjectSummary[];
  /** A failure happened with stop-on-error set. */
  fatal: boolean;
}

export interface AuditDefaults {
  jobs: number;
  timeoutMs: number;
  tools: readonly ToolId[];
  excludeDirs: readonly string[];
  countMetricsAsIssues: boolean;
}

export interface OrchestratorDeps {
  registry: ToolRegistry;
  runner: ToolRunner;
  converter: ResultConverter;
  gateway: PersistenceGateway;
  defaults?: Partial<AuditDefaults>;
  log?: (line: string) => void;
}

const FALLBACK_DEFAULTS: Omit<AuditDefaults, "tools"> = {
  jobs: 4,
  timeoutMs: 300_000,
  excludeDirs: [],
  countMetricsAsIssues: false
};

function stderrLog(line: string): void {
  process.stderr.write(`${line}\n`);
}

interface Plan {
  toolIds: ToolId[];
  jobs: number;
  timeoutMs: number;
  stopOnError: boolean;
  projects: Array<{ projectPath: string; target: string }>;
}

export class Orchestrator {
  private readonly defaults: AuditDefaults;
  private readonly log: (line: string) => void;

  constructor(private readonly deps: OrchestratorDeps) {
    this.defaults = { ...FALLBACK_DEFAULTS, tools: deps.registry.ids(), ...deps.defaults };
    this.log = deps.log ?? stderrLog;
  }

  /** Throws ConfigurationError before anything is launched; per-tool failures end up in the summary. */
  async audit(req: AuditRequest): Promise<AuditSummary> {
    const plan = await this.plan(req);
    const summary: AuditSummary = { projects: [], fatal: false };
    let stopped = false;

    for (const project of plan.projects) {
      const result = await this.auditProject(plan, project, () => stopped);
      if (result.failedUnderStop) {
        stopped = true;
        summary.fatal = true;
      }
      summary.projects.push(result.summary);
    }

    return summary;
  }

  private async plan(req: AuditRequest): Promise<Plan> {
    const toolIds = this.deps.registry.resolve(req.toolIds?.length ? req.toolIds : this.defaults.tools);

    const jobs = req.jobs ?? this.defaults.jobs;
    if (!Number.isInteger(jobs) || jobs < 1) {
      throw new ConfigurationError(`jobs must be a positive integer, got ${jobs}`);
    }
    const timeoutMs = req.timeoutMs ?? this.defaults.timeoutMs;
    assertTimeout(timeoutMs);

    const rootPath = path.resolve(req.root);
    const stat = await fs.stat(rootPath).catch(() => {
      throw new ConfigurationError(`audit root does not exist: ${req.root}`);
    });

    let projects: Plan["projects"];
    if (req.multi) {
      if (!stat.isDirectory()) throw new ConfigurationError(`workspace root must be a directory: ${req.root}`);
      const dirs = await discoverProjects(rootPath, this.defaults.excludeDirs);
      if (!dirs.length) this.log(`[warn] no projects found under ${rootPath}`);
      projects = dirs.map((dir) => ({ projectPath: dir, target: dir }));
    } else if (stat.isDirectory()) {
      projects = [{ projectPath: rootPath, target: rootPath }];
    } else if (stat.isFile()) {
      projects = [{ projectPath: path.dirname(rootPath), target: rootPath }];
    } else {
      throw new ConfigurationError(`audit root is neither a file nor a directory: ${req.root}`);
    }

    return { toolIds, jobs, timeoutMs, stopOnError: req.stopOnError ?? false, projects };
  }

  private async auditProject(
    plan: Plan,
    project: Plan["projects"][number],
    stoppedBefore: () => boolean
  ): Promise<{ summary: ProjectSummary; failedUnderStop: boolean }> {
    const root = path.basename(project.projectPath);
    const outcomes = plan.toolIds.map((toolId): ToolOutcome => ({
      toolId,
      kind: this.deps.registry.get(toolId).kind,
      state: "pending",
      exitCode: null,
      failed: false,
      failure: null,
      scanId: null,
      submitted: 0,
      newlyPersisted: 0,
      skippedLines: 0,
      durationMs: 0
    }));

    let failedUnderStop = false;
    const shouldStop = (): boolean => stoppedBefore() || failedUnderStop;

    const started = await runBounded(
      outcomes,
      plan.jobs,
      async (outcome) => {
        await this.invoke(plan, project, root, outcome);
        if (outcome.failed && plan.stopOnError) failedUnderStop = true;
      },
      shouldStop
    );

    for (const [i, outcome] of outcomes.entries()) {
      if (!started[i]?.started) {
        outcome.state = "skipped";
        this.log(`[skip] ${outcome.toolId} ${root}`);
      }
    }

    const issueCount = outcomes
      .filter((o) => o.kind !== "complexity" || this.defaults.countMetricsAsIssues)
      .reduce((sum, o) => sum + o.submitted, 0);

    return { summary: { root, projectPath: project.projectPath, outcomes, issueCount }, failedUnderStop };
  }

  private async invoke(plan: Plan, project: Plan["projects"][number], root: string, outcome: ToolOutcome): Promise<void> {
    outcome.state = "running";
    this.log(`[run] ${outcome.toolId} ${root}`);

    const run = await this.deps.runner.run(outcome.toolId, project.target, plan.timeoutMs);
    const converted = this.deps.converter.convert(run, { root, projectPath: project.projectPath, target: project.target });

    outcome.state = run.state;
    outcome.exitCode = run.exitCode;
    outcome.durationMs = run.durationMs;
    outcome.scanId = converted.scan.scanId;
    outcome.submitted = converted.rows.length;
    outcome.skippedLines = converted.skippedLines;

    const failures = converted.scan.failure ? [converted.scan.failure] : [];
    let persistFailed = false;
    try {
      const persisted = await this.deps.gateway.persist(converted.scan, converted.rows);
      outcome.newlyPersisted = persisted.newlyPersisted;
    } catch (err) {
      if (!(err instanceof PersistenceError)) throw err;
      persistFailed = true;
      outcome.scanId = null;
      failures.push(err.message);
    }

    outcome.failure = failures.length ? failures.join("; ") : null;
    outcome.failed =
      run.state !== "completed" || !this.deps.registry.isSuccessExit(outcome.toolId, run.exitCode) || persistFailed;

    if (outcome.failed) {
      this.log(`[warn] ${outcome.toolId} ${root}: ${outcome.failure ?? run.state}`);
    } else {
      this.log(
        `[ok] ${outcome.toolId} ${root}: ${outcome.submitted} finding(s), ${outcome.newlyPersisted} new, exit ${run.exitCode}, ${run.durationMs}ms`
      );
    }
  }
}
