import { promises as fs } from "fs";
import os from "os";
import path from "path";

export interface ScratchDir {
  dir: string;
  dispose(): Promise<void>;
}

export function safeJoin(baseDir: string, name: string): string {
  const joined = path.join(baseDir, name);
  const rel = path.relative(baseDir, joined);
  if (rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new Error(`unsafe scratch path: ${name}`);
  }
  return joined;
}

/** Per-run temp directory for files a tool writes besides its stdout. */
export async function createScratchDir(label: string, parentDir: string = os.tmpdir()): Promise<ScratchDir> {
  const dir = await fs.mkdtemp(path.join(parentDir, `staticaudit-${label}-`));
  return {
    dir,
    dispose: () => fs.rm(dir, { recursive: true, force: true })
  };
}
