import type { Deployer } from "../src/adapter/deployer.js";
import type { ExecuteOptions, TestExecutor } from "../src/adapter/executor.js";
import type { FetchResult, HistoryStore } from "../src/history/store.js";
import type { HistorySnapshot } from "../src/types/history.js";

export type Behaviour = (signal: AbortSignal) => Promise<string>;

/** Executor whose output per matrix key is scripted by the test. */
export class FakeExecutor implements TestExecutor {
  readonly calls: Array<{ subjects: string[]; suiteUrl: string; key: string }> = [];

  constructor(private readonly behaviour: Record<string, Behaviour>) {}

  async run(subjects: string[], suiteUrl: string, opts: ExecuteOptions): Promise<string> {
    this.calls.push({ subjects, suiteUrl, key: opts.key });
    const behave = this.behaviour[opts.key];
    if (!behave) throw new Error(`unexpected key ${opts.key}`);
    return behave(opts.signal);
  }
}

export const never: Behaviour = () => new Promise<string>(() => undefined);

/** Resolves once `signal` aborts, rejecting with its reason. */
export function untilAborted(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_, reject) => {
    const fail = (): void => reject(signal.reason instanceof Error ? signal.reason : new Error("aborted"));
    if (signal.aborted) fail();
    else signal.addEventListener("abort", fail, { once: true });
  });
}

/** In-memory history store; `published` records every committed snapshot. */
export class MemoryHistoryStore implements HistoryStore {
  readonly published: HistorySnapshot[] = [];

  constructor(private current: HistorySnapshot | null = null) {}

  async fetch(): Promise<FetchResult> {
    return { snapshot: this.current, diagnostics: [] };
  }

  async publish(_name: string, snapshot: HistorySnapshot, opts: { signal?: AbortSignal } = {}): Promise<void> {
    opts.signal?.throwIfAborted();
    this.current = snapshot;
    this.published.push(snapshot);
  }

  get snapshot(): HistorySnapshot | null {
    return this.current;
  }
}

/** Deployer that records what it deployed; `hold` keeps a deploy open until it is aborted. */
export class RecordingDeployer implements Deployer {
  readonly deployed: Array<{ target: string; snapshot: HistorySnapshot }> = [];
  hold: ((snapshot: HistorySnapshot) => boolean) | null = null;
  readonly started: HistorySnapshot[] = [];

  async deploy(target: string, snapshot: HistorySnapshot, signal: AbortSignal): Promise<void> {
    this.started.push(snapshot);
    if (this.hold?.(snapshot)) await untilAborted(signal);
    signal.throwIfAborted();
    this.deployed.push({ target, snapshot });
  }
}

/** Poll until `predicate` holds. */
export async function waitFor(predicate: () => boolean, timeoutMs = 5000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error("waitFor timed out");
    await new Promise((r) => setTimeout(r, 5));
  }
}
