import { rm } from "node:fs/promises";
import path from "node:path";
import { stagingDirFor, swapDirectory, writeFileTree } from "../fs/atomic.js";
import { isSafeRelativePath, safePath } from "../fs/security.js";
import type { HistorySnapshot } from "../types/history.js";

/** Pushes a merged snapshot to a deployment target. Must stop when `signal` aborts. */
export interface Deployer {
  deploy(target: string, snapshot: HistorySnapshot, signal: AbortSignal): Promise<void>;
}

export class DeployError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DeployError";
  }
}

function addGeneration(files: Map<string, string>, prefix: string, entries: HistorySnapshot["entries"]): string[] {
  const keys = Object.keys(entries).sort();
  for (const key of keys) {
    const entry = entries[key];
    files.set(`${prefix}reports/${key}.jsonl`, entry.document);
    for (const [rel, badge] of Object.entries(entry.badges)) {
      if (!isSafeRelativePath(rel)) throw new DeployError(`Unsafe badge path for ${key}: ${rel}`);
      files.set(`${prefix}badges/${rel}`, JSON.stringify(badge));
    }
  }
  return keys;
}

/** Site content for one snapshot: relative path → file content. */
export function siteFiles(target: string, snapshot: HistorySnapshot): Map<string, string> {
  const files = new Map<string, string>();
  const keys = addGeneration(files, "", snapshot.entries);
  const previousKeys = snapshot.previous ? addGeneration(files, "previous/", snapshot.previous.entries) : [];

  files.set(
    "index.json",
    JSON.stringify({ target, name: snapshot.name, keys, previous_keys: previousKeys }, null, 2) + "\n",
  );
  return files;
}

/**
 * Static-site deployer: renders the snapshot into `<siteDir>/<target>/` through a staging
 * directory and swaps it into place, so a cancelled deploy leaves the previous site intact.
 */
export class DirectoryDeployer implements Deployer {
  private readonly siteDir: string;

  constructor(siteDir: string) {
    this.siteDir = path.resolve(siteDir);
  }

  async deploy(target: string, snapshot: HistorySnapshot, signal: AbortSignal): Promise<void> {
    const dir = safePath(this.siteDir, target);
    const staging = stagingDirFor(dir);
    try {
      await writeFileTree(staging, siteFiles(target, snapshot), { signal, last: ["index.json"] });
      await swapDirectory(staging, dir, signal);
    } finally {
      await rm(staging, { recursive: true, force: true });
    }
  }

  targetDir(target: string): string {
    return safePath(this.siteDir, target);
  }
}
