import { readdir } from "node:fs/promises";
import type { SystemContext } from "../types";
import { logger } from "../logger";

export interface CollectOptions {
  maxFiles: number;
  shell: string;
  cwd?: string;
}

async function listVisibleFiles(dir: string, maxFiles: number): Promise<string[]> {
  if (maxFiles <= 0) return [];
  try {
    const entries = await readdir(dir);
    return entries
      .filter((name) => name.trim() !== "" && !name.startsWith("."))
      .sort()
      .slice(0, maxFiles);
  } catch (error) {
    // A listing is a hint for the model, not a requirement.
    logger.debug({ dir, err: error }, "could not list working directory");
    return [];
  }
}

export async function collectSystemContext(options: CollectOptions): Promise<SystemContext> {
  const workingDir = options.cwd ?? process.cwd();
  return {
    workingDir,
    files: await listVisibleFiles(workingDir, options.maxFiles),
    shell: options.shell,
    os: process.platform,
    arch: process.arch,
  };
}
