import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { createPublishGate } from "../core/pipeline.js";
import { DailyScheduler } from "../core/scheduler.js";
import { diag, type Diagnostic } from "../types/diagnostic.js";
import { run } from "./run.js";

export const DEFAULT_DAILY_AT = "02:15";

/**
 * Start the daily trigger. Every firing is an independent `schedule` run; all runs of
 * this process share one publish gate.
 */
export async function startSchedule(opts: {
  configDir?: string;
  env?: string;
  baseDir?: string;
  onDiagnostic: (d: Diagnostic) => void;
}): Promise<DailyScheduler> {
  const baseDir = path.resolve(opts.baseDir ?? process.cwd());
  const config = await loadConfig(opts.env, opts.configDir ? path.resolve(baseDir, opts.configDir) : undefined);
  const gate = createPublishGate(config, baseDir);

  const scheduler = new DailyScheduler({
    dailyAt: config.schedule?.daily_at ?? DEFAULT_DAILY_AT,
    task: async (firedAt) => {
      opts.onDiagnostic(diag("info", "SCHEDULE_FIRED", `Scheduled run at ${firedAt.toISOString()}`));
      const res = await run({
        trigger: "schedule",
        configDir: opts.configDir,
        env: opts.env,
        baseDir,
        gate,
        onDiagnostic: opts.onDiagnostic,
      });
      if (!res.ok) {
        opts.onDiagnostic(diag("error", res.error.code, res.error.message));
        return;
      }
      opts.onDiagnostic(
        diag(res.result.status === "failed" ? "error" : "info", "RUN_FINISHED", `Run ${res.result.runId}: ${res.result.status}`),
      );
    },
    onError: (e, firedAt) =>
      opts.onDiagnostic(
        diag("error", "SCHEDULE_RUN_FAILED", `Scheduled run at ${firedAt.toISOString()} failed: ${e instanceof Error ? e.message : String(e)}`),
      ),
  });
  scheduler.start();
  opts.onDiagnostic(diag("info", "SCHEDULE_STARTED", `Next run at ${scheduler.nextRun().toISOString()}`));
  return scheduler;
}
