const DAILY_AT_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export function parseDailyAt(value: string): { hour: number; minute: number } {
  const m = DAILY_AT_PATTERN.exec(value);
  if (!m) throw new Error(`Invalid daily time (expected HH:MM): ${value}`);
  return { hour: Number(m[1]), minute: Number(m[2]) };
}

/** Next occurrence of `dailyAt` (UTC) strictly after `from`. */
export function nextDailyRun(from: Date, dailyAt: string): Date {
  const { hour, minute } = parseDailyAt(dailyAt);
  const candidate = new Date(
    Date.UTC(from.getUTCFullYear(), from.getUTCMonth(), from.getUTCDate(), hour, minute, 0, 0),
  );
  if (candidate.getTime() <= from.getTime()) return new Date(candidate.getTime() + DAY_MS);
  return candidate;
}

export type SchedulerOptions = {
  dailyAt: string;
  task: (firedAt: Date) => Promise<void>;
  onError: (e: unknown, firedAt: Date) => void;
  now?: () => Date;
};

/**
 * Fires `task` once a day. A run still in progress does not delay the next one; overlap
 * is resolved by the publish gate.
 */
export class DailyScheduler {
  private timer: NodeJS.Timeout | null = null;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly now: () => Date;

  constructor(private readonly opts: SchedulerOptions) {
    parseDailyAt(opts.dailyAt);
    this.now = opts.now ?? (() => new Date());
  }

  get running(): boolean {
    return this.timer !== null;
  }

  nextRun(): Date {
    return nextDailyRun(this.now(), this.opts.dailyAt);
  }

  start(): void {
    if (this.timer) return;
    this.arm();
  }

  /** Stop firing and wait for runs already started. */
  async stop(): Promise<void> {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    await Promise.all(this.inFlight);
  }

  private arm(): void {
    const delay = Math.max(0, this.nextRun().getTime() - this.now().getTime());
    this.timer = setTimeout(() => this.fire(), delay);
  }

  private fire(): void {
    const firedAt = this.now();
    const run = this.opts
      .task(firedAt)
      .catch((e: unknown) => this.opts.onError(e, firedAt))
      .finally(() => this.inFlight.delete(run));
    this.inFlight.add(run);
    this.arm();
  }
}
