import { mkdir, open, readFile, stat, unlink, utimes, type FileHandle } from "node:fs/promises";
import path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { atomicWriteJson, isNotFound } from "../fs/atomic.js";
import { sanitizePathComponent } from "../fs/security.js";
import { isRecord } from "../report/parse.js";
import { errorMessage } from "./deadline.js";

export const STALE_LEASE_AGE_MS = 300000; // 5 minutes without a heartbeat
export const DEFAULT_LEASE_POLL_MS = 250;

export type LeaseRecord = { holder: string; pid: number; acquired_at: string };
export type CancelRequest = { requested_by: string; requested_at: string };

export class LeaseTimeoutError extends Error {
  constructor(
    readonly target: string,
    readonly heldBy: string | null,
  ) {
    super(`Timed out waiting for publish lease on ${target}${heldBy ? ` (held by ${heldBy})` : ""}`);
    this.name = "LeaseTimeoutError";
  }
}

export type AcquireOptions = {
  timeoutMs: number;
  pollMs?: number;
  staleAgeMs?: number;
  signal?: AbortSignal;
};

async function readJson(p: string): Promise<unknown> {
  try {
    return JSON.parse(await readFile(p, "utf8"));
  } catch (e) {
    if (isNotFound(e) || e instanceof SyntaxError) return null;
    throw e;
  }
}

async function readLease(p: string): Promise<LeaseRecord | null> {
  const data = await readJson(p);
  if (!isRecord(data) || typeof data.holder !== "string" || typeof data.pid !== "number") return null;
  return { holder: data.holder, pid: data.pid, acquired_at: typeof data.acquired_at === "string" ? data.acquired_at : "" };
}

async function readCancel(p: string): Promise<CancelRequest | null> {
  const data = await readJson(p);
  if (!isRecord(data) || typeof data.requested_by !== "string") return null;
  return { requested_by: data.requested_by, requested_at: typeof data.requested_at === "string" ? data.requested_at : "" };
}

function processAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    // EPERM: the process exists but belongs to someone else
    return e instanceof Error && "code" in e && e.code === "EPERM";
  }
}

async function unlinkIfPresent(p: string): Promise<void> {
  try {
    await unlink(p);
  } catch (e) {
    if (!isNotFound(e)) throw e;
  }
}

/**
 * Cross-process publish lease for one deployment target.
 *
 * `<dir>/<target>.lease` names the holder; a newcomer that finds it held writes
 * `<dir>/<target>.cancel` naming itself and waits, and withdraws the request if it gives up. The holder's watcher sees the request,
 * aborts its publish and releases. Leases of dead processes, or without a heartbeat for
 * `staleAgeMs`, are reclaimed.
 */
export class FileLease {
  private watcher: NodeJS.Timeout | null = null;
  private cancelSeen = false;

  private constructor(
    readonly target: string,
    readonly holder: string,
    private readonly leasePath: string,
    private readonly cancelPath: string,
  ) {}

  static async acquire(dir: string, target: string, holder: string, opts: AcquireOptions): Promise<FileLease> {
    const name = sanitizePathComponent(target);
    const leasePath = path.join(dir, `${name}.lease`);
    const cancelPath = path.join(dir, `${name}.cancel`);
    const pollMs = opts.pollMs ?? DEFAULT_LEASE_POLL_MS;
    const staleAgeMs = opts.staleAgeMs ?? STALE_LEASE_AGE_MS;
    const deadline = Date.now() + opts.timeoutMs;
    let requested = false;

    await mkdir(dir, { recursive: true });

    try {
      for (;;) {
        opts.signal?.throwIfAborted();

        const acquiredAt = await FileLease.tryCreate(leasePath, holder);
        if (acquiredAt) {
          // requests older than this lease were aimed at an earlier holder
          const pending = await readCancel(cancelPath);
          if (pending && (pending.requested_by === holder || pending.requested_at < acquiredAt)) {
            await unlinkIfPresent(cancelPath);
          }
          requested = false;
          return new FileLease(target, holder, leasePath, cancelPath);
        }

        const current = await readLease(leasePath);
        if (await FileLease.reclaimable(leasePath, current, staleAgeMs)) {
          console.warn(`[publish] Reclaiming abandoned lease on ${target}${current ? ` (holder: ${current.holder})` : ""}`);
          await unlinkIfPresent(leasePath);
          continue;
        }

        // a new holder may have cleared our request along with stale ones
        if (!(await readCancel(cancelPath))) {
          const request: CancelRequest = { requested_by: holder, requested_at: new Date().toISOString() };
          await atomicWriteJson(cancelPath, request);
          requested = true;
        }

        if (Date.now() >= deadline) throw new LeaseTimeoutError(target, current?.holder ?? null);
        await sleep(pollMs, undefined, { signal: opts.signal });
      }
    } finally {
      if (requested) await FileLease.withdraw(cancelPath, holder);
    }
  }

  /** Create the lease file exclusively; returns its `acquired_at`, or null when it is held. */
  private static async tryCreate(leasePath: string, holder: string): Promise<string | null> {
    let fh: FileHandle;
    try {
      fh = await open(leasePath, "wx");
    } catch (e) {
      if (e instanceof Error && "code" in e && e.code === "EEXIST") return null;
      throw e;
    }
    const record: LeaseRecord = { holder, pid: process.pid, acquired_at: new Date().toISOString() };
    try {
      await fh.writeFile(JSON.stringify(record) + "\n", "utf8");
      await fh.sync();
    } finally {
      await fh.close();
    }
    return record.acquired_at;
  }

  /** Remove our own cancel request; one written by another waiter stays. */
  private static async withdraw(cancelPath: string, holder: string): Promise<void> {
    const pending = await readCancel(cancelPath);
    if (pending?.requested_by === holder) await unlinkIfPresent(cancelPath);
  }

  private static async reclaimable(leasePath: string, current: LeaseRecord | null, staleAgeMs: number): Promise<boolean> {
    let mtimeMs: number;
    try {
      mtimeMs = (await stat(leasePath)).mtimeMs;
    } catch (e) {
      if (isNotFound(e)) return false;
      throw e;
    }
    if (Date.now() - mtimeMs > staleAgeMs) return true;
    return current !== null && !processAlive(current.pid);
  }

  /** Poll for cancel requests from other holders and keep the lease's heartbeat fresh. */
  watch(onCancel: (requestedBy: string) => void, pollMs: number = DEFAULT_LEASE_POLL_MS): void {
    if (this.watcher) return;
    const tick = async (): Promise<void> => {
      const now = new Date();
      await utimes(this.leasePath, now, now).catch((e: unknown) => {
        if (!isNotFound(e)) throw e;
      });
      const request = await readCancel(this.cancelPath);
      if (request && request.requested_by !== this.holder && !this.cancelSeen) {
        this.cancelSeen = true;
        onCancel(request.requested_by);
      }
    };
    this.watcher = setInterval(() => {
      tick().catch((e: unknown) => console.warn(`[publish] Lease watch failed for ${this.target}: ${errorMessage(e)}`));
    }, pollMs);
    this.watcher.unref();
  }

  async release(): Promise<void> {
    if (this.watcher) {
      clearInterval(this.watcher);
      this.watcher = null;
    }

    const current = await readLease(this.leasePath);
    if (current?.holder === this.holder) {
      await unlinkIfPresent(this.leasePath);
    } else if (current) {
      console.warn(`[publish] Lease on ${this.target} was taken by ${current.holder}; not releasing`);
    }
  }
}
