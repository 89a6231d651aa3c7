import type { TestExecutor } from "../adapter/executor.js";
import type { Summarizer } from "../adapter/summarizer.js";
import type { MatrixKey } from "../types/history.js";
import type { CellOutcome } from "../types/run.js";
import { DeadlineError, errorMessage, withDeadline } from "./deadline.js";

export type MatrixRunOptions = {
  keys: readonly MatrixKey[];
  subjects: readonly string[];
  /** Suite location template; `{key}` is replaced per cell. */
  suiteUrl: string;
  executor: TestExecutor;
  summarizer: Summarizer;
  executionTimeoutMs: number;
  summarizeTimeoutMs: number;
  signal?: AbortSignal;
  onCellDone?: (outcome: CellOutcome) => void;
};

export function suiteUrlFor(template: string, key: MatrixKey): string {
  return template.replace(/\{key\}/g, key);
}

async function runCell(key: MatrixKey, opts: MatrixRunOptions): Promise<CellOutcome> {
  const started = Date.now();

  let document: string;
  try {
    document = await withDeadline(
      (signal) => opts.executor.run([...opts.subjects], suiteUrlFor(opts.suiteUrl, key), { key, signal }),
      { timeoutMs: opts.executionTimeoutMs, label: `suite run for ${key}`, signal: opts.signal },
    );
  } catch (e) {
    return {
      key,
      status: "execution_failed",
      reason: errorMessage(e),
      timedOut: e instanceof DeadlineError,
      durationMs: Date.now() - started,
    };
  }

  try {
    const summary = await withDeadline(() => opts.summarizer.summarize(document), {
      timeoutMs: opts.summarizeTimeoutMs,
      label: `summary of ${key}`,
      signal: opts.signal,
    });
    return {
      key,
      status: "succeeded",
      document,
      badges: summary.badges,
      summaryText: summary.text,
      durationMs: Date.now() - started,
    };
  } catch (e) {
    return { key, status: "summarize_failed", reason: errorMessage(e), durationMs: Date.now() - started };
  }
}

/**
 * Run every matrix cell concurrently and wait for all of them.
 *
 * A failing cell never cancels or alters its siblings; outcomes come back in key order.
 */
export async function runMatrix(opts: MatrixRunOptions): Promise<CellOutcome[]> {
  const settled = await Promise.allSettled(
    opts.keys.map(async (key) => {
      const outcome = await runCell(key, opts);
      opts.onCellDone?.(outcome);
      return outcome;
    }),
  );

  return settled.map((s, i): CellOutcome => {
    if (s.status === "fulfilled") return s.value;
    return { key: opts.keys[i], status: "execution_failed", reason: errorMessage(s.reason), timedOut: false, durationMs: 0 };
  });
}
