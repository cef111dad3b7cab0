import { mkdir, mkdtemp, readFile, rm } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createAuditApp } from "../src/app.js";
import { assertKnownOptions, lastFlag, parseArgs } from "../src/cli/args.js";
import { runCli, type CliIo } from "../src/cli/commands.js";
import { AuditConfig } from "../src/config/auditConfig.js";
import { ConfigurationError } from "../src/core/errors.js";
import type { ProcessResult, ProcessRunner, ProcessSpec } from "../src/execution/backends/types.js";

class CannedRunner implements ProcessRunner {
  async execute(spec: ProcessSpec): Promise<ProcessResult> {
    const base = { startedAt: "2026-01-02T03:04:05.000Z", finishedAt: "2026-01-02T03:04:05.020Z", durationMs: 20, stderr: "" };
    switch (spec.argv[0]) {
      case "bandit":
        return {
          ...base,
          state: "exited",
          exitCode: 1,
          stdout: JSON.stringify({
            results: [{ filename: "app.py", line_number: 3, issue_text: "Use of assert detected.", test_id: "B101", test_name: "assert_used" }]
          })
        };
      case "eslint":
        return { ...base, state: "exited", exitCode: 0, stdout: "[]" };
      default:
        return { ...base, state: "launch_failed", exitCode: -1, stdout: "", stderr: "failed to launch\n" };
    }
  }
}

interface CapturedIo extends CliIo {
  out: string[];
  err: string[];
}

function captureIo(): CapturedIo {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
    createApp: () =>
      createAuditApp({
        env: { databaseUrl: null, echoSql: false, autoSchema: true, configPath: "config/auditor.yaml" },
        config: AuditConfig.defaults(),
        processRunner: new CannedRunner(),
        log: () => undefined
      })
  };
}

describe("parseArgs", () => {
  it("splits positionals, repeatable options and switches", () => {
    const args = parseArgs(["proj", "--tool", "bandit", "--multi", "--tool", "eslint", "--jobs", "2"], ["multi"]);
    expect(args.positionals).toEqual(["proj"]);
    expect(args.flags.get("tool")).toEqual(["bandit", "eslint"]);
    expect(lastFlag(args, "jobs")).toBe("2");
    expect([...args.switches]).toEqual(["multi"]);
  });

  it("rejects options without a value and unknown options", () => {
    expect(() => parseArgs(["--jobs"], [])).toThrow("missing value for --jobs");
    expect(() => parseArgs(["--jobs", "--multi"], ["multi"])).toThrow(ConfigurationError);
    expect(() => assertKnownOptions(parseArgs(["--verbose", "1"], []), ["jobs"])).toThrow("unknown option: --verbose");
  });
});

describe("runCli", () => {
  let tmpDir: string;
  let projectDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "cli-test-"));
    projectDir = path.join(tmpDir, "svc");
    await mkdir(projectDir);
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("prints usage", async () => {
    const io = captureIo();
    expect(await runCli([], io)).toBe(1);
    expect(await runCli(["help"], io)).toBe(0);
    expect(io.out[0]?.startsWith("usage:\n")).toBe(true);
  });

  it("reports bad invocations on stderr", async () => {
    const io = captureIo();
    expect(await runCli(["frob"], io)).toBe(1);
    expect(await runCli(["audit", projectDir, "--jobs", "0"], io)).toBe(1);
    expect(await runCli(["audit", projectDir, "--verbose", "1"], io)).toBe(1);
    expect(await runCli(["audit", path.join(tmpDir, "missing")], io)).toBe(1);
    expect(io.err.map((e) => e.split("\n")[0])).toEqual([
      "error: unknown command: frob",
      "error: --jobs must be a positive number, got 0",
      "error: unknown option: --verbose",
      `error: audit root does not exist: ${path.join(tmpDir, "missing")}`
    ]);
  });

  it("audits a project and prints one line per tool", async () => {
    const io = captureIo();
    expect(await runCli(["audit", projectDir, "--tool", "bandit", "--tool", "eslint"], io)).toBe(0);
    expect(io.out.join("")).toBe(
      [
        `svc (${projectDir})`,
        "  bandit   completed     exit=1 rows=1 new=1",
        "  eslint   completed     exit=0 rows=0 new=0",
        "  issues: 1",
        ""
      ].join("\n")
    );
  });

  it("exits non-zero when stop-on-error halts an audit", async () => {
    const io = captureIo();
    expect(await runCli(["audit", projectDir, "--tool", "mypy", "--tool", "eslint", "--jobs", "1", "--stop-on-error"], io)).toBe(1);
    const text = io.out.join("");
    expect(text).toContain("  mypy     launch_failed exit=-1 rows=0 new=0  launch failed: failed to launch\n");
    expect(text).toContain("  eslint   skipped       exit=- rows=0 new=0\n");
    expect(text.endsWith("stopped on first failure\n")).toBe(true);
  });

  it("runs a single tool and saves the raw result", async () => {
    const io = captureIo();
    const jsonOut = path.join(tmpDir, "out", "bandit.json");
    expect(await runCli(["run-tool", "bandit", projectDir, "--json-out", jsonOut], io)).toBe(0);
    expect(io.out).toEqual([
      `bandit completed exit=1 duration=20ms cwd=${projectDir}\n`,
      "  $ bandit -r . -f json -q\n",
      `wrote ${jsonOut}\n`
    ]);
    const saved: unknown = JSON.parse(await readFile(jsonOut, "utf8"));
    expect(saved).toMatchObject({ toolId: "bandit", state: "completed", exitCode: 1, command: [["bandit", "-r", ".", "-f", "json", "-q"]] });

    expect(await runCli(["run-tool", "mypy", projectDir], io)).toBe(1);
  });

  it("exports the findings database", async () => {
    const io = captureIo();
    const output = path.join(tmpDir, "export.json");
    expect(await runCli(["export", "--output-path", output], io)).toBe(0);
    expect(io.out).toEqual([`wrote 0 finding(s) to ${output}\n`]);
    expect(io.err).toEqual(["warning: DATABASE_URL is not set; exporting from a fresh in-memory database, which holds no earlier audits\n"]);
    const saved: unknown = JSON.parse(await readFile(output, "utf8"));
    expect(saved).toMatchObject({ export_version: 1, roots: [], findings: [] });
  });
});
