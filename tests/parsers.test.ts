import { describe, it, expect } from "vitest";

import { ParseError } from "../src/core/errors.js";
import { banditTool } from "../src/tools/builtin/bandit.js";
import { eslintTool } from "../src/tools/builtin/eslint.js";
import { mypyTool } from "../src/tools/builtin/mypy.js";
import { aggregateCc, radonTool } from "../src/tools/builtin/radon.js";
import { parseCweId, semgrepTool } from "../src/tools/builtin/semgrep.js";
import { symbolKindOf, vultureTool } from "../src/tools/builtin/vulture.js";
import { relativePath } from "../src/tools/parsing.js";
import { parseCtx, runResult } from "./helpers.js";

describe("relativePath", () => {
  it("normalizes tool paths to project-relative POSIX form", () => {
    expect(relativePath("./a/b.py", parseCtx)).toBe("a/b.py");
    expect(relativePath("/work/proj/x.py", parseCtx)).toBe("x.py");
    expect(relativePath("a\\b.py", parseCtx)).toBe("a/b.py");
  });

  it("uses the file's own name for a single-file target", () => {
    const ctx = { ...parseCtx, target: "/work/proj/main.py" };
    expect(relativePath("main.py", ctx)).toBe("main.py");
    expect(relativePath("/work/proj/main.py", ctx)).toBe("main.py");
  });
});

describe("bandit", () => {
  const payload = {
    errors: [],
    results: [
      {
        filename: "./app/db.py",
        line_number: 12,
        line_range: [12, 14],
        col_offset: 4,
        end_col_offset: 30,
        issue_text: "Possible SQL injection vector through string-based query construction.",
        issue_severity: "MEDIUM",
        issue_confidence: "LOW",
        issue_cwe: { id: 89, link: "https://cwe.mitre.org/data/definitions/89.html" },
        test_id: "B608",
        test_name: "hardcoded_sql_expressions",
        code: "12 query = 'SELECT * FROM t WHERE id = %s' % uid\n"
      },
      {
        filename: "/work/proj/app/util.py",
        line_number: 3,
        issue_text: "Consider possible security implications associated with pickle module.",
        issue_severity: "LOW",
        issue_confidence: "HIGH",
        test_id: "B403",
        test_name: "import_pickle"
      },
      { bogus: true }
    ]
  };

  it("maps each result to a security row", () => {
    const out = banditTool.parse(runResult("bandit", { exitCode: 1, parsedJson: payload }), parseCtx);
    expect(out.skippedLines).toBe(1);
    expect(out.rows).toHaveLength(2);
    expect(out.rows[0]).toEqual({
      kind: "security",
      toolId: "bandit",
      root: "proj",
      filePath: "app/db.py",
      line: 12,
      endLine: 14,
      column: 4,
      endColumn: 30,
      message: "Possible SQL injection vector through string-based query construction.",
      rule: "B608:hardcoded_sql_expressions",
      severity: "MEDIUM",
      confidence: "LOW",
      code: "12 query = 'SELECT * FROM t WHERE id = %s' % uid\n",
      cweId: 89
    });
    expect(out.rows[1]).toMatchObject({
      filePath: "app/util.py",
      line: 3,
      endLine: 3,
      column: null,
      rule: "B403:import_pickle",
      code: null,
      cweId: null
    });
  });

  it("rejects a payload without a results array", () => {
    expect(() => banditTool.parse(runResult("bandit", { parsedJson: { errors: [] } }), parseCtx)).toThrow(ParseError);
    expect(() => banditTool.parse(runResult("bandit", { parsedJson: null }), parseCtx)).toThrow("bandit: no JSON payload");
  });
});

describe("semgrep", () => {
  it("maps results and extracts the CWE number", () => {
    const parsedJson = {
      errors: [],
      results: [
        {
          check_id: "python.lang.security.audit.eval-detected",
          path: "src/run.py",
          start: { line: 8, col: 5, offset: 100 },
          end: { line: 8, col: 20, offset: 115 },
          extra: {
            message: "Detected use of eval().",
            severity: "ERROR",
            lines: "eval(expr)",
            metadata: {
              confidence: "MEDIUM",
              cwe: ["CWE-95: Improper Neutralization of Directives in Dynamically Evaluated Code"]
            }
          }
        }
      ]
    };
    const out = semgrepTool.parse(runResult("semgrep", { parsedJson }), parseCtx);
    expect(out.rows).toEqual([
      {
        kind: "security",
        toolId: "semgrep",
        root: "proj",
        filePath: "src/run.py",
        line: 8,
        endLine: 8,
        column: 5,
        endColumn: 20,
        message: "Detected use of eval().",
        rule: "python.lang.security.audit.eval-detected",
        severity: "error",
        confidence: "MEDIUM",
        code: "eval(expr)",
        cweId: 95
      }
    ]);
  });

  it("parses CWE identifiers", () => {
    expect(parseCweId("CWE-79: Cross-site Scripting")).toBe(79);
    expect(parseCweId(["CWE-22: Path Traversal", "CWE-23"])).toBe(22);
    expect(parseCweId([])).toBeNull();
    expect(parseCweId(undefined)).toBeNull();
  });
});

describe("mypy", () => {
  it("reads one finding per JSON line and counts the lines it cannot use", () => {
    const stdout = [
      JSON.stringify({
        file: "pkg/mod.py",
        line: 4,
        column: 10,
        message: "Incompatible return value type",
        hint: null,
        code: "return-value",
        severity: "error"
      }),
      "",
      "not json",
      JSON.stringify({
        file: "pkg/mod.py",
        line: 9,
        column: 0,
        message: 'Name "x" is not defined',
        hint: 'Did you mean "y"?',
        code: "name-defined",
        severity: "error"
      }),
      JSON.stringify({ file: "pkg/other.py" })
    ].join("\n");

    const out = mypyTool.parse(runResult("mypy", { exitCode: 1, stdout }), parseCtx);
    expect(out.skippedLines).toBe(2);
    expect(out.rows).toHaveLength(2);
    expect(out.rows[0]).toEqual({
      kind: "type-check",
      toolId: "mypy",
      root: "proj",
      filePath: "pkg/mod.py",
      line: 4,
      endLine: null,
      column: 10,
      endColumn: null,
      message: "Incompatible return value type",
      rule: "return-value",
      severity: "error",
      hint: null
    });
    expect(out.rows[1]).toMatchObject({ line: 9, column: 0, rule: "name-defined", hint: 'Did you mean "y"?' });
  });
});

describe("radon", () => {
  const parsedJson = {
    cc: {
      "pkg/a.py": [
        { type: "function", name: "f", lineno: 1, endline: 5, col_offset: 0, complexity: 3, rank: "A" },
        { type: "method", name: "g", lineno: 7, col_offset: 4, complexity: 12, rank: "C" }
      ],
      "pkg/empty.py": [],
      "pkg/bad.py": { error: "invalid syntax (<unknown>, line 2)" }
    },
    mi: { "pkg/a.py": { mi: 71.5, rank: "A" } },
    hal: {
      "pkg/a.py": {
        total: { h1: 2, h2: 4, volume: 38.5, difficulty: 2.5, effort: 96.25, time: 5.35, bugs: 0.013 },
        functions: {}
      }
    },
    raw: { "pkg/a.py": { loc: 20, lloc: 12, sloc: 15, comments: 2, multi: 0, blank: 3, single_comments: 2 } }
  };

  it("produces one row per file and metric", () => {
    const out = radonTool.parse(runResult("radon", { parsedJson }), parseCtx);
    expect(out.skippedLines).toBe(1);
    expect(out.rows.map((r) => [r.metric, r.filePath, r.score, r.rank])).toEqual([
      ["cc", "pkg/a.py", 12, "C"],
      ["mi", "pkg/a.py", 71.5, "A"],
      ["hal", "pkg/a.py", 38.5, null],
      ["raw", "pkg/a.py", 15, null]
    ]);

    const cc = out.rows[0];
    expect(cc?.details).toEqual({
      blocks: [
        { name: "f", type: "function", lineno: 1, complexity: 3, rank: "A" },
        { name: "g", type: "method", lineno: 7, complexity: 12, rank: "C" }
      ],
      total: 15,
      max: 12,
      avg: 7.5,
      worst_rank: "C",
      rank_counts: { A: 1, C: 1 }
    });
    expect(out.rows[2]?.details).toEqual({ volume: 38.5, difficulty: 2.5, effort: 96.25, time: 5.35, bugs: 0.013 });
    expect(out.rows[3]?.details).toEqual({ loc: 20, lloc: 12, sloc: 15, comments: 2, multi: 0, blank: 3, single_comments: 2 });
  });

  it("keeps the other categories when some produced no JSON", () => {
    const out = radonTool.parse(
      runResult("radon", { parsedJson: { cc: null, mi: { "m.py": { mi: 100, rank: "A" } }, hal: null } }),
      parseCtx
    );
    expect(out.rows).toHaveLength(1);
    expect(out.rows[0]).toMatchObject({ metric: "mi", filePath: "m.py", score: 100 });
    expect(out.parseErrors).toEqual(["radon cc: no JSON", "radon hal: no JSON"]);
  });

  it("fails when the payload is not an object or holds no category", () => {
    expect(() => radonTool.parse(runResult("radon", { parsedJson: 42 }), parseCtx)).toThrow(ParseError);
    expect(() =>
      radonTool.parse(runResult("radon", { parsedJson: { cc: null, mi: null, hal: null, raw: null } }), parseCtx)
    ).toThrow("radon: no metric category produced JSON");
  });

  it("aggregates an empty block list to zeros", () => {
    expect(aggregateCc([])).toEqual({ blocks: 0, total: 0, max: 0, avg: 0, worstRank: "A", rankCounts: {} });
  });
});

describe("vulture", () => {
  const stdout = [
    "pkg/a.py:3: unused import 'os' (90% confidence)",
    "pkg/a.py:10: unused function 'helper' (60% confidence)",
    "pkg/b.py:7: unused variable 'tmp' (40% confidence)",
    "garbage line",
    ""
  ].join("\n");

  it("drops findings below the confidence threshold", () => {
    const out = vultureTool.parse(runResult("vulture", { exitCode: 3, stdout }), parseCtx);
    expect(out.skippedLines).toBe(1);
    expect(out.rows.map((r) => [r.filePath, r.line, r.confidence])).toEqual([
      ["pkg/a.py", 3, 90],
      ["pkg/a.py", 10, 60]
    ]);
    expect(out.rows[1]).toEqual({
      kind: "dead-code",
      toolId: "vulture",
      root: "proj",
      filePath: "pkg/a.py",
      line: 10,
      endLine: 10,
      column: null,
      endColumn: null,
      message: "unused function 'helper'",
      rule: "unused-function",
      confidence: 60,
      symbolKind: "unused-function"
    });
  });

  it("keeps everything at a threshold of zero", () => {
    const out = vultureTool.parse(runResult("vulture", { stdout }), { ...parseCtx, minConfidence: 0 });
    expect(out.rows).toHaveLength(3);
  });

  it("derives the symbol kind from the message", () => {
    expect(symbolKindOf("unused import 'os'")).toBe("unused-import");
    expect(symbolKindOf("unreachable code after 'return'")).toBe("unreachable-code");
    expect(symbolKindOf("")).toBeNull();
  });
});

describe("eslint", () => {
  it("maps each message of each file", () => {
    const parsedJson = [
      {
        filePath: "/work/proj/web/app.js",
        messages: [
          {
            ruleId: "no-unused-vars",
            severity: 2,
            message: "'x' is assigned a value but never used.",
            line: 3,
            column: 7,
            endLine: 3,
            endColumn: 8
          },
          { ruleId: "semi", severity: 1, message: "Missing semicolon.", line: 5, column: 20, fix: { range: [90, 90], text: ";" } }
        ],
        errorCount: 1,
        warningCount: 1
      },
      {
        filePath: "/work/proj/web/broken.js",
        messages: [{ ruleId: null, fatal: true, severity: 2, message: "Parsing error: Unexpected token", line: 1, column: 1 }]
      },
      { filePath: "/work/proj/web/clean.js", messages: [] }
    ];

    const out = eslintTool.parse(runResult("eslint", { exitCode: 1, parsedJson }), parseCtx);
    expect(out.rows).toHaveLength(3);
    expect(out.rows[0]).toEqual({
      kind: "lint",
      toolId: "eslint",
      root: "proj",
      filePath: "web/app.js",
      line: 3,
      endLine: 3,
      column: 7,
      endColumn: 8,
      message: "'x' is assigned a value but never used.",
      rule: "no-unused-vars",
      severity: "error",
      fatal: false,
      fixable: false
    });
    expect(out.rows[1]).toMatchObject({ rule: "semi", severity: "warning", fixable: true, endLine: null });
    expect(out.rows[2]).toMatchObject({ filePath: "web/broken.js", rule: null, severity: "error", fatal: true });
  });

  it("rejects a payload that is not an array", () => {
    expect(() => eslintTool.parse(runResult("eslint", { parsedJson: {} }), parseCtx)).toThrow(ParseError);
  });
});

describe("command plans", () => {
  const dirCtx = { target: "/work/proj", cwd: "/work/proj", scratchDir: "/tmp/scratch", minConfidence: 60 };
  const fileCtx = { ...dirCtx, target: "/work/proj/app.py" };

  it("scans the working directory or the named file", () => {
    expect(mypyTool.plan(dirCtx).map((s) => s.argv)).toEqual([["mypy", "--output", "json", "."]]);
    expect(banditTool.plan(fileCtx).map((s) => s.argv)).toEqual([["bandit", "-r", "app.py", "-f", "json", "-q"]]);
    expect(eslintTool.plan(fileCtx).map((s) => [s.argv, s.cwd])).toEqual([[["eslint", "-f", "json", "app.py"], "/work/proj"]]);
  });

  it("passes the confidence threshold to vulture", () => {
    expect(vultureTool.plan(dirCtx)[0]?.argv).toEqual(["vulture", ".", "--min-confidence", "60"]);
  });

  it("has semgrep write its JSON into the scratch directory", () => {
    expect(semgrepTool.plan(dirCtx)).toEqual([
      {
        label: "semgrep",
        argv: ["semgrep", "scan", "--config", "p/ci", "--json", "--quiet", "--output", "/tmp/scratch/semgrep.json", "."],
        cwd: "/work/proj",
        env: { SEMGREP_SEND_METRICS: "off" },
        outputFile: "/tmp/scratch/semgrep.json"
      }
    ]);
  });

  it("runs one radon step per metric", () => {
    expect(radonTool.plan(dirCtx).map((s) => [s.label, s.argv.slice(1)])).toEqual([
      ["cc", ["cc", "-s", "-j", "."]],
      ["mi", ["mi", "-j", "."]],
      ["hal", ["hal", "-j", "."]],
      ["raw", ["raw", "-j", "."]]
    ]);
  });
});
