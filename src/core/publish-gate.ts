import { FileLease, LeaseTimeoutError } from "./lease.js";
import { toError } from "./deadline.js";

export class PublishSupersededError extends Error {
  constructor(
    readonly target: string,
    readonly supersededBy: string,
  ) {
    super(`Publish to ${target} superseded by ${supersededBy}`);
    this.name = "PublishSupersededError";
  }
}

export class PublishCancelTimeoutError extends Error {
  constructor(
    readonly target: string,
    readonly holder: string | null,
    readonly timeoutMs: number,
  ) {
    super(
      `Publish to ${target} still in progress${holder ? ` (${holder})` : ""} after ${timeoutMs}ms cancel timeout`,
    );
    this.name = "PublishCancelTimeoutError";
  }
}

export type PublishOutcome<T> =
  | { status: "published"; value: T }
  | { status: "superseded"; supersededBy: string }
  | { status: "failed"; error: Error };

export type PublishGateOptions = {
  /** How long a newcomer waits for the publish it cancelled to wind down. */
  cancelTimeoutMs: number;
  /** Enables the cross-process lease when set. */
  lockDir?: string;
  pollMs?: number;
  staleLeaseMs?: number;
};

type ActivePublish = {
  runId: string;
  controller: AbortController;
  settled: Promise<void>;
};

/** `holder` is running (or taking the lease); `newest` is the latest claimant, which may still be waiting. */
type TargetSlot = {
  holder: ActivePublish | null;
  newest: ActivePublish | null;
};

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Resolves true once `p` settles, false on timeout or when `signal` aborts first. */
async function settlesWithin(p: Promise<void>, ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) return false;
  let stop: (value: false) => void = () => undefined;
  const interrupted = new Promise<false>((resolve) => {
    stop = resolve;
  });
  const timer = setTimeout(() => stop(false), Math.max(0, ms));
  const onAbort = (): void => stop(false);
  signal.addEventListener("abort", onAbort, { once: true });
  try {
    return await Promise.race([p.then(() => true), interrupted]);
  } finally {
    clearTimeout(timer);
    signal.removeEventListener("abort", onAbort);
  }
}

function supersession(signal: AbortSignal): { status: "superseded"; supersededBy: string } | null {
  if (!signal.aborted || !(signal.reason instanceof PublishSupersededError)) return null;
  return { status: "superseded", supersededBy: signal.reason.supersededBy };
}

/**
 * Single-flight, latest-wins gate per deployment target.
 *
 * A new publish cancels the one holding the slot (and any older claimant still waiting),
 * then waits for the holder to settle before starting. A caller that is itself superseded
 * while waiting never runs. When the holder ignores cancellation past `cancelTimeoutMs`
 * it keeps the slot and the waiting caller fails.
 */
export class PublishGate {
  private readonly slots = new Map<string, TargetSlot>();

  constructor(private readonly opts: PublishGateOptions) {}

  private slotFor(target: string): TargetSlot {
    let slot = this.slots.get(target);
    if (!slot) {
      slot = { holder: null, newest: null };
      this.slots.set(target, slot);
    }
    return slot;
  }

  activeRun(target: string): string | null {
    return this.slots.get(target)?.holder?.runId ?? null;
  }

  /**
   * Run `fn` as the publish of `runId` to `target`. `fn` receives a signal that aborts
   * when a newer run supersedes this one or when `opts.signal` aborts.
   */
  async run<T>(
    target: string,
    runId: string,
    fn: (signal: AbortSignal) => Promise<T>,
    opts: { signal?: AbortSignal } = {},
  ): Promise<PublishOutcome<T>> {
    opts.signal?.throwIfAborted();
    const controller = new AbortController();
    const onParentAbort = (): void => controller.abort(opts.signal?.reason);
    opts.signal?.addEventListener("abort", onParentAbort, { once: true });
    const done = deferred();
    const entry: ActivePublish = { runId, controller, settled: done.promise };

    const slot = this.slotFor(target);
    for (const other of [slot.holder, slot.newest]) {
      other?.controller.abort(new PublishSupersededError(target, runId));
    }
    slot.newest = entry;

    try {
      const deadline = Date.now() + this.opts.cancelTimeoutMs;
      while (slot.holder) {
        const holder = slot.holder;
        const settled = await settlesWithin(holder.settled, deadline - Date.now(), controller.signal);
        const superseded = supersession(controller.signal);
        if (superseded) return superseded;
        controller.signal.throwIfAborted();
        if (!settled) {
          return {
            status: "failed",
            error: new PublishCancelTimeoutError(target, holder.runId, this.opts.cancelTimeoutMs),
          };
        }
      }
      const cancelledEarly = supersession(controller.signal);
      if (cancelledEarly) return cancelledEarly;
      controller.signal.throwIfAborted();
      slot.holder = entry;

      let lease: FileLease | null = null;
      if (this.opts.lockDir) {
        try {
          lease = await FileLease.acquire(this.opts.lockDir, target, runId, {
            timeoutMs: this.opts.cancelTimeoutMs,
            pollMs: this.opts.pollMs,
            staleAgeMs: this.opts.staleLeaseMs,
            signal: controller.signal,
          });
        } catch (e) {
          const cancelled = supersession(controller.signal);
          if (cancelled) return cancelled;
          if (e instanceof LeaseTimeoutError) {
            return {
              status: "failed",
              error: new PublishCancelTimeoutError(target, e.heldBy, this.opts.cancelTimeoutMs),
            };
          }
          return { status: "failed", error: toError(e) };
        }
        lease.watch((by) => controller.abort(new PublishSupersededError(target, by)), this.opts.pollMs);
      }

      try {
        const value = await fn(controller.signal);
        return { status: "published", value };
      } catch (e) {
        return supersession(controller.signal) ?? { status: "failed", error: toError(e) };
      } finally {
        if (lease) await lease.release();
      }
    } finally {
      opts.signal?.removeEventListener("abort", onParentAbort);
      if (slot.holder === entry) slot.holder = null;
      if (slot.newest === entry) slot.newest = null;
      if (!slot.holder && !slot.newest && this.slots.get(target) === slot) this.slots.delete(target);
      done.resolve();
    }
  }
}
