import type { ToolTable } from "../types.js";
import { banditTool } from "./bandit.js";
import { eslintTool } from "./eslint.js";
import { mypyTool } from "./mypy.js";
import { radonTool } from "./radon.js";
import { semgrepTool } from "./semgrep.js";
import { vultureTool } from "./vulture.js";

export const builtinTools: ToolTable = {
  bandit: banditTool,
  semgrep: semgrepTool,
  mypy: mypyTool,
  radon: radonTool,
  vulture: vultureTool,
  eslint: eslintTool
};
