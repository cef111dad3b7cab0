import { promises as fs } from "fs";
import path from "path";

export const DEFAULT_EXCLUDED_DIRS: readonly string[] = [
  ".git",
  ".hg",
  ".svn",
  "node_modules",
  ".venv",
  "venv",
  "__pycache__",
  "dist",
  "build",
  ".mypy_cache",
  ".ruff_cache",
  ".tox"
];

function byNameCaseInsensitive(a: string, b: string): number {
  const la = a.toLowerCase();
  const lb = b.toLowerCase();
  if (la !== lb) return la < lb ? -1 : 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Immediate subdirectories of `workspaceRoot` that are projects, as absolute paths. */
export async function discoverProjects(workspaceRoot: string, extraExcludes: readonly string[] = []): Promise<string[]> {
  const excluded = new Set([...DEFAULT_EXCLUDED_DIRS, ...extraExcludes]);
  const entries = await fs.readdir(workspaceRoot, { withFileTypes: true });
  return entries
    .filter((e) => e.isDirectory() && !excluded.has(e.name))
    .map((e) => e.name)
    .sort(byNameCaseInsensitive)
    .map((name) => path.join(path.resolve(workspaceRoot), name));
}
