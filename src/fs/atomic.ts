import { randomBytes } from "node:crypto";
import { mkdir, open, readdir, rename, rm, stat, unlink, writeFile, type FileHandle } from "node:fs/promises";
import { basename, dirname, join } from "node:path";

function uniqueSuffix(): string {
  return `${process.pid}-${Date.now()}-${randomBytes(3).toString("hex")}`;
}

/** Write a file through a fsynced temp file and a rename, so readers never see a partial file. */
export async function atomicWriteFile(path: string, payload: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.tmp.${uniqueSuffix()}`;

  let fh: FileHandle | null = null;
  try {
    fh = await open(tmp, "w");
    await fh.writeFile(payload, "utf8");
    await fh.sync();
    await fh.close();
    fh = null;

    await rename(tmp, path);
  } catch (e) {
    if (fh) await fh.close().catch(() => undefined);
    await unlink(tmp).catch(() => undefined);
    throw e;
  }
}

export async function atomicWriteJson(path: string, data: unknown): Promise<void> {
  await atomicWriteFile(path, JSON.stringify(data, null, 2) + "\n");
}

/**
 * Write `files` (relative path → content) under `dir`, checking `signal` between files.
 * `last` paths are written after everything else, e.g. a manifest that marks the tree complete.
 */
export async function writeFileTree(
  dir: string,
  files: Map<string, string>,
  opts: { signal?: AbortSignal; last?: string[] } = {},
): Promise<void> {
  const last = new Set(opts.last ?? []);
  const ordered = [...files.keys()].sort((a, b) => Number(last.has(a)) - Number(last.has(b)) || a.localeCompare(b));

  for (const rel of ordered) {
    opts.signal?.throwIfAborted();
    const full = join(dir, rel);
    await mkdir(dirname(full), { recursive: true });
    await writeFile(full, files.get(rel) ?? "", "utf8");
  }
}

export function stagingDirFor(target: string): string {
  return join(dirname(target), `.staging-${basename(target)}-${uniqueSuffix()}`);
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (e) {
    if (isNotFound(e)) return false;
    throw e;
  }
}

export function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/**
 * Move a fully written `staging` directory to `target`.
 * The old target is parked as `.retired-*` until the new one is in place; `signal` is
 * checked right before the first rename, which is the commit point.
 */
export async function swapDirectory(staging: string, target: string, signal?: AbortSignal): Promise<void> {
  await mkdir(dirname(target), { recursive: true });
  signal?.throwIfAborted();

  let retired: string | null = null;
  if (await exists(target)) {
    retired = join(dirname(target), `.retired-${basename(target)}-${uniqueSuffix()}`);
    await rename(target, retired);
  }

  try {
    await rename(staging, target);
  } catch (e) {
    if (retired) await rename(retired, target);
    throw e;
  }

  if (retired) await rm(retired, { recursive: true, force: true });
}

/** A `.retired-*` copy younger than this may belong to a swap that is still running. */
export const RETIRED_GRACE_MS = 60000;

/** The time a retired copy was parked, from the suffix `swapDirectory` gives it. */
function retiredAt(suffix: string): number | null {
  const m = /^\d+-(\d+)-[0-9a-f]+$/.exec(suffix);
  return m ? Number(m[1]) : null;
}

/**
 * Restore the newest `.retired-*` copy when a swap was interrupted between its two renames.
 * Copies parked less than `graceMs` ago are left alone and reported as `pending`.
 */
export async function recoverInterruptedSwap(
  target: string,
  opts: { graceMs?: number; now?: number } = {},
): Promise<"restored" | "pending" | null> {
  if (await exists(target)) return null;

  const parent = dirname(target);
  const prefix = `.retired-${basename(target)}-`;
  let names: string[];
  try {
    names = (await readdir(parent)).filter((n) => n.startsWith(prefix));
  } catch (e) {
    if (isNotFound(e)) return null;
    throw e;
  }

  const now = opts.now ?? Date.now();
  const graceMs = opts.graceMs ?? RETIRED_GRACE_MS;
  let newest: { name: string; at: number } | null = null;
  let pending = false;
  for (const name of names) {
    const at = retiredAt(name.slice(prefix.length));
    if (at === null) continue;
    if (now - at < graceMs) {
      pending = true;
      continue;
    }
    if (!newest || at > newest.at) newest = { name, at };
  }

  if (pending) return "pending";
  if (!newest) return null;
  await rename(join(parent, newest.name), target);
  return "restored";
}
