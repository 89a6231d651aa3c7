#!/usr/bin/env node

import { Command } from "commander";
import { ConfigError, loadConfig } from "./config/loader.js";
import { EXIT } from "./commands/exit-codes.js";
import { showHistory } from "./commands/history.js";
import { parseFormat, printDiagnostic, printRecord, type OutputFormat } from "./commands/output.js";
import { parseTrigger, run } from "./commands/run.js";
import { startSchedule } from "./commands/schedule.js";
import { listRuns, status } from "./commands/status.js";
import { parseRenderFormat, parseRenderShow, summary } from "./commands/summary.js";
import { validateAll } from "./commands/validate.js";
import type { DailyScheduler } from "./core/scheduler.js";
import type { ReportConfig } from "./types/config.js";
import { diag } from "./types/diagnostic.js";

const program = new Command();

function formatOrExit(value: string): OutputFormat {
  const format = parseFormat(value);
  if (!format) {
    console.error(`Unknown format: ${value} (expected human|jsonl)`);
    process.exit(EXIT.INVALID_ARGS);
  }
  return format;
}

function fail(message: string, code: string, format: OutputFormat, exitCode: number): never {
  printDiagnostic(diag("error", code, message), format);
  process.exit(exitCode);
}

program
  .name("reportctl")
  .description("Scheduled compatibility-report pipeline")
  .version("0.1.0");

program
  .command("validate")
  .description("Validate config layers and (optionally) a report document")
  .option("--config <path>", "Path to config directory", "config")
  .option("--env <name>", "Config overlay whose subjects are checked")
  .option("--report <file>", "Report document (JSON Lines) to validate")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (opts: { config: string; env?: string; report?: string; format: string }) => {
    const format = formatOrExit(opts.format);
    const res = await validateAll({ configDir: opts.config, env: opts.env, reportPath: opts.report });

    if (!res.ok) {
      for (const err of res.errors) printDiagnostic(err, format);
      process.exit(EXIT.INVALID_ARGS);
    }
    for (const d of res.diagnostics) printDiagnostic(d, format);
    printRecord({ code: "OK", message: "OK" }, "OK", format);
  });

program
  .command("run")
  .description("Run the pipeline once: fetch history, run the matrix, validate, merge, publish")
  .requiredOption("--trigger <source>", "Trigger source: release|call|manual|schedule")
  .option("--config <path>", "Path to config directory", "config")
  .option("--env <name>", "Config overlay (config/<name>.yaml)")
  .option("--dry-run", "Stop after the merge without publishing")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (opts: { trigger: string; config: string; env?: string; dryRun?: boolean; format: string }) => {
    const format = formatOrExit(opts.format);
    const trigger = parseTrigger(opts.trigger);
    if (!trigger) fail(`Unknown trigger: ${opts.trigger}`, "INVALID_TRIGGER", format, EXIT.INVALID_ARGS);

    const res = await run({
      trigger,
      configDir: opts.config,
      env: opts.env,
      dryRun: opts.dryRun,
      onDiagnostic: (d) => printDiagnostic(d, format),
    });

    if (!res.ok) fail(res.error.message, res.error.code, format, res.exitCode);

    const { result } = res;
    if (format === "jsonl") {
      printRecord(
        { code: "RUN_FINISHED", run_id: result.runId, status: result.status, state_path: result.statePath },
        "",
        format,
      );
    } else {
      process.stdout.write(result.summary);
    }
    process.exit(res.exitCode);
  });

program
  .command("schedule")
  .description("Run the pipeline daily at schedule.daily_at (UTC) until interrupted")
  .option("--config <path>", "Path to config directory", "config")
  .option("--env <name>", "Config overlay (config/<name>.yaml)")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (opts: { config: string; env?: string; format: string }) => {
    const format = formatOrExit(opts.format);
    let scheduler: DailyScheduler;
    try {
      scheduler = await startSchedule({
        configDir: opts.config,
        env: opts.env,
        onDiagnostic: (d) => printDiagnostic(d, format),
      });
    } catch (e) {
      const code = e instanceof ConfigError ? "CONFIG_INVALID" : "SCHEDULE_FAILED";
      fail(e instanceof Error ? e.message : String(e), code, format, EXIT.INVALID_ARGS);
    }

    const shutdown = (): void => {
      printDiagnostic(diag("info", "SCHEDULE_STOPPING", "Waiting for runs in progress"), format);
      scheduler.stop().then(
        () => process.exit(EXIT.SUCCESS),
        (e: unknown) => fail(e instanceof Error ? e.message : String(e), "SCHEDULE_FAILED", format, EXIT.RUN_FAILED),
      );
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  });

program
  .command("summary")
  .description("Render a report document")
  .argument("<file>", "Report document (JSON Lines), or - for stdin")
  .option("--format <format>", "Output format: markdown|json|pretty", "pretty")
  .option("--show <what>", "Cases to list: failures|all", "failures")
  .action(async (file: string, opts: { format: string; show: string }) => {
    const format = parseRenderFormat(opts.format);
    const show = parseRenderShow(opts.show);
    if (!format || !show) {
      console.error(`Unknown --format ${opts.format} or --show ${opts.show}`);
      process.exit(EXIT.INVALID_ARGS);
    }

    const res = await summary({ file, format, show });
    if (!res.ok) {
      console.error(res.error);
      process.exit(EXIT.RUN_FAILED);
    }
    process.stdout.write(res.text.endsWith("\n") ? res.text : res.text + "\n");
  });

program
  .command("history")
  .description("Show the stored history snapshot")
  .option("--config <path>", "Path to config directory", "config")
  .option("--env <name>", "Config overlay (config/<name>.yaml)")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (opts: { config: string; env?: string; format: string }) => {
    const format = formatOrExit(opts.format);
    let config: ReportConfig;
    try {
      config = await loadConfig(opts.env, opts.config);
    } catch (e) {
      fail(e instanceof Error ? e.message : String(e), "CONFIG_INVALID", format, EXIT.INVALID_ARGS);
    }

    const res = await showHistory({ config });
    if (!res.ok) fail(res.error, "HISTORY_READ_FAILED", format, EXIT.RUN_FAILED);

    for (const d of res.diagnostics) printDiagnostic(d, format);
    const { view } = res;
    const human = [
      `${view.name} (${view.root})`,
      `  current:  ${view.keys.length > 0 ? view.keys.join(", ") : "(none)"}`,
      `  previous: ${view.previous_keys ? view.previous_keys.join(", ") : "(none)"}`,
      ...(view.digest ? [`  digest:   ${view.digest}`] : []),
    ].join("\n");
    printRecord({ code: "HISTORY", ...view }, human, format);
  });

program
  .command("status")
  .description("Show run status")
  .argument("[id]", "Run ID (omit to list all)")
  .option("--runs-dir <path>", "Runs directory", ".reportctl/runs")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action((id: string | undefined, opts: { runsDir: string; format: string }) => {
    const format = formatOrExit(opts.format);
    if (id) {
      const res = status({ runsDir: opts.runsDir, runId: id });
      if (!res.ok) fail(res.error, "RUN_NOT_FOUND", format, EXIT.RUN_FAILED);
      if (format === "jsonl") {
        process.stdout.write(JSON.stringify(res.state) + "\n");
      } else {
        console.log(JSON.stringify(res.state, null, 2));
      }
      return;
    }

    const list = listRuns(opts.runsDir);
    if (format === "jsonl") {
      for (const item of list) process.stdout.write(JSON.stringify(item) + "\n");
    } else {
      if (list.length === 0) {
        console.log("No runs found.");
        return;
      }
      for (const item of list) console.log(`${item.id}  ${item.status}  ${item.stage}  ${item.updated_at}`);
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.RUN_FAILED);
});
