export class DeadlineError extends Error {
  constructor(
    readonly label: string,
    readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "DeadlineError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

/**
 * Run `fn` with an abort signal that fires after `timeoutMs` or when `signal` aborts.
 * The returned promise settles at the deadline even if `fn` ignores its signal.
 *
 * @throws DeadlineError when the deadline passes first
 */
export async function withDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  opts: { timeoutMs: number; label: string; signal?: AbortSignal },
): Promise<T> {
  opts.signal?.throwIfAborted();
  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort(opts.signal?.reason);
  opts.signal?.addEventListener("abort", onParentAbort, { once: true });

  const timer = setTimeout(() => controller.abort(new DeadlineError(opts.label, opts.timeoutMs)), opts.timeoutMs);
  const aborted = new Promise<never>((_, reject) => {
    const fail = (): void => reject(toError(controller.signal.reason));
    if (controller.signal.aborted) fail();
    else controller.signal.addEventListener("abort", fail, { once: true });
  });

  try {
    return await Promise.race([fn(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    opts.signal?.removeEventListener("abort", onParentAbort);
  }
}
