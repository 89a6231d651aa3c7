import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";
import { DirectoryDeployer, type Deployer } from "../adapter/deployer.js";
import { CommandExecutor, type TestExecutor } from "../adapter/executor.js";
import { resolveSubjects } from "../adapter/subjects.js";
import { ReportSummarizer, type Summarizer } from "../adapter/summarizer.js";
import { atomicWriteFile } from "../fs/atomic.js";
import { sanitizeLogMessage } from "../fs/security.js";
import { mergeHistory, type MergeResult } from "../history/merge.js";
import { FsHistoryStore, type HistoryStore } from "../history/store.js";
import { validateReport } from "../report/validator.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { PipelineStage, ReportConfig } from "../types/config.js";
import { diag, type Diagnostic } from "../types/diagnostic.js";
import type { HistoryEntry, HistorySnapshot, MatrixKey, SnapshotGeneration } from "../types/history.js";
import type { CellOutcome, CellVerdict, KeyReport, RunStatus, TriggerSource } from "../types/run.js";
import { errorMessage } from "./deadline.js";
import { runMatrix } from "./matrix.js";
import { Orchestrator, statePathFor, type StageResult } from "./orchestrator.js";
import { PublishCancelTimeoutError, PublishGate } from "./publish-gate.js";
import { reserveRunId } from "./run-id.js";
import { buildKeyReports, deriveRunStatus, renderRunSummary, type PublishReport } from "./run-summary.js";
import { type StageStatus, getEffectiveStages } from "./state-machine.js";

export const DEFAULT_EXECUTION_TIMEOUT_SECONDS = 3600;
export const DEFAULT_SUMMARIZE_TIMEOUT_SECONDS = 300;
export const DEFAULT_CANCEL_TIMEOUT_SECONDS = 60;

export type PipelineDeps = {
  config: ReportConfig;
  registry: SchemaRegistry;
  store: HistoryStore;
  executor: TestExecutor;
  summarizer: Summarizer;
  deployer: Deployer;
  gate: PublishGate;
  subjects: string[];
  /** Absolute directory for run records. */
  runsDir: string;
  /** Absolute path the run summary is appended to. */
  summaryFile?: string;
};

export type PipelineOptions = {
  trigger: TriggerSource;
  /** Stop after the merge without publishing. */
  dryRun?: boolean;
  now?: Date;
  onDiagnostic?: (d: Diagnostic) => void;
};

export type PipelineResult = {
  runId: string;
  trigger: TriggerSource;
  status: RunStatus;
  finalStage: StageStatus;
  keys: KeyReport[];
  snapshot: HistorySnapshot | null;
  publish: PublishReport;
  summary: string;
  statePath: string;
  error?: string;
};

/**
 * Build the default collaborators for `config`; relative paths resolve against `baseDir`.
 * One gate per process is enough for overlapping runs, so callers may pass a shared one.
 */
export async function createPipelineDeps(
  config: ReportConfig,
  opts: { baseDir?: string; registry?: SchemaRegistry; gate?: PublishGate; env?: NodeJS.ProcessEnv } = {},
): Promise<PipelineDeps> {
  const baseDir = path.resolve(opts.baseDir ?? process.cwd());
  const registry = opts.registry ?? (await createRegistry());
  return {
    config,
    registry,
    store: new FsHistoryStore(path.resolve(baseDir, config.history.root), registry),
    executor: new CommandExecutor(config.executor, opts.env ?? process.env, baseDir),
    summarizer: new ReportSummarizer(registry),
    deployer: new DirectoryDeployer(path.resolve(baseDir, config.publish.site_dir)),
    gate: opts.gate ?? createPublishGate(config, baseDir),
    subjects: resolveSubjects(config.subjects, baseDir),
    runsDir: path.resolve(baseDir, config.runs_dir),
    summaryFile: config.summary_file ? path.resolve(baseDir, config.summary_file) : undefined,
  };
}

export function createPublishGate(config: ReportConfig, baseDir: string = process.cwd()): PublishGate {
  return new PublishGate({
    cancelTimeoutMs: (config.publish.cancel_timeout_seconds ?? DEFAULT_CANCEL_TIMEOUT_SECONDS) * 1000,
    lockDir: config.publish.lock_dir ? path.resolve(baseDir, config.publish.lock_dir) : undefined,
  });
}

type RunContext = {
  prior: HistorySnapshot | null;
  outcomes: CellOutcome[];
  verdicts: Record<MatrixKey, CellVerdict>;
  freshText: Record<MatrixKey, string>;
  merged: MergeResult | null;
  publish: PublishReport;
};

function outcomeDiagnostic(outcome: CellOutcome): Diagnostic {
  const details = { key: outcome.key, duration_ms: outcome.durationMs };
  switch (outcome.status) {
    case "succeeded":
      return diag("info", "CELL_SUCCEEDED", `${outcome.key}: report produced`, { details });
    case "execution_failed":
      return outcome.timedOut
        ? diag("warn", "CELL_TIMED_OUT", `${outcome.key}: ${outcome.reason}`, { details })
        : diag("warn", "CELL_EXECUTION_FAILED", `${outcome.key}: ${sanitizeLogMessage(outcome.reason)}`, { details });
    case "summarize_failed":
      return diag("warn", "CELL_SUMMARIZE_FAILED", `${outcome.key}: ${outcome.reason}`, { details });
  }
}

async function validEntries(
  entries: Record<MatrixKey, HistoryEntry>,
  registry: SchemaRegistry,
  label: string,
  diagnostics: Diagnostic[],
): Promise<Record<MatrixKey, HistoryEntry>> {
  const kept: Record<MatrixKey, HistoryEntry> = {};
  for (const key of Object.keys(entries).sort()) {
    const check = await validateReport(entries[key].document, registry);
    if (check.valid) {
      kept[key] = entries[key];
    } else {
      diagnostics.push(
        diag("warn", "PRIOR_ENTRY_INVALID", `Dropped ${label} entry ${key}: ${check.reason}`, { details: { key } }),
      );
    }
  }
  return kept;
}

/**
 * Run one pipeline end to end: fetch the prior snapshot, run every matrix cell, validate,
 * merge and publish through the gate. Never throws for per-cell problems; the result
 * carries the run status and a markdown summary.
 */
export async function runPipeline(deps: PipelineDeps, opts: PipelineOptions): Promise<PipelineResult> {
  const { config } = deps;
  const name = config.history.name;
  const target = config.publish.target;
  const keys = config.matrix.keys;
  const publishing = config.publish.enabled && !opts.dryRun;
  const stages = getEffectiveStages({ publish: publishing });
  const runId = reserveRunId(opts.trigger, deps.runsDir, opts.now);

  const ctx: RunContext = {
    prior: null,
    outcomes: [],
    verdicts: {},
    freshText: {},
    merged: null,
    publish: { status: "skipped", target },
  };

  const stageRunner = async (stage: PipelineStage, signal: AbortSignal): Promise<StageResult> => {
    switch (stage) {
      case "fetch_history": {
        try {
          const fetched = await deps.store.fetch(name);
          ctx.prior = fetched.snapshot;
          return { success: true, diagnostics: fetched.diagnostics };
        } catch (e) {
          ctx.prior = null;
          return {
            success: true,
            diagnostics: [
              diag("warn", "HISTORY_FETCH_FAILED", `Could not read history ${name}, starting empty: ${errorMessage(e)}`),
            ],
          };
        }
      }

      case "run_matrix": {
        if (deps.subjects.length === 0) return { success: false, error: "No subjects to test" };
        ctx.outcomes = await runMatrix({
          keys,
          subjects: deps.subjects,
          suiteUrl: config.matrix.suite_url,
          executor: deps.executor,
          summarizer: deps.summarizer,
          executionTimeoutMs: (config.executor.timeout_seconds ?? DEFAULT_EXECUTION_TIMEOUT_SECONDS) * 1000,
          summarizeTimeoutMs: (config.summarizer?.timeout_seconds ?? DEFAULT_SUMMARIZE_TIMEOUT_SECONDS) * 1000,
          signal,
          onCellDone: (o) => opts.onDiagnostic?.(outcomeDiagnostic(o)),
        });
        return { success: true };
      }

      case "validate": {
        const diagnostics: Diagnostic[] = [];
        for (const outcome of ctx.outcomes) {
          signal.throwIfAborted();
          if (outcome.status === "execution_failed") {
            ctx.verdicts[outcome.key] = {
              status: "rejected",
              kind: outcome.timedOut ? "timeout" : "execution",
              reason: outcome.reason,
            };
          } else if (outcome.status === "summarize_failed") {
            ctx.verdicts[outcome.key] = { status: "rejected", kind: "summarize", reason: outcome.reason };
          } else {
            const check = await validateReport(outcome.document, deps.registry);
            if (check.valid) {
              ctx.verdicts[outcome.key] = {
                status: "valid",
                entry: { document: outcome.document, badges: outcome.badges },
              };
              ctx.freshText[outcome.key] = outcome.summaryText;
            } else {
              ctx.verdicts[outcome.key] = { status: "rejected", kind: "validation", reason: check.reason };
              diagnostics.push(
                diag("warn", "CELL_INVALID", `${outcome.key}: ${check.reason}`, { details: { key: outcome.key } }),
              );
            }
          }
        }

        if (ctx.prior) {
          const entries = await validEntries(ctx.prior.entries, deps.registry, "prior", diagnostics);
          let previous: SnapshotGeneration | null = null;
          if (ctx.prior.previous) {
            previous = { entries: await validEntries(ctx.prior.previous.entries, deps.registry, "previous", diagnostics) };
          }
          ctx.prior = { name: ctx.prior.name, entries, previous };
        }
        return { success: true, diagnostics };
      }

      case "merge_history": {
        const merged = mergeHistory(name, ctx.prior, ctx.verdicts);
        const diagnostics: Diagnostic[] = [];
        for (const [key, entry] of Object.entries(merged.snapshot.entries)) {
          signal.throwIfAborted();
          try {
            await deps.summarizer.summarize(entry.document);
          } catch (e) {
            return {
              success: false,
              error: `Merged entry ${key} cannot be summarized: ${errorMessage(e)}`,
              diagnostics: [diag("error", "MERGED_UNSUMMARIZABLE", `${key}: ${errorMessage(e)}`, { details: { key } })],
            };
          }
        }
        for (const key of keys) {
          if (merged.provenance[key] === "carried") {
            diagnostics.push(diag("info", "KEY_CARRIED_FORWARD", `${key}: kept the previous report`, { details: { key } }));
          } else if (merged.provenance[key] === "absent") {
            diagnostics.push(diag("warn", "KEY_ABSENT", `${key}: no report available`, { details: { key } }));
          }
        }
        ctx.merged = merged;
        return { success: true, diagnostics };
      }

      case "publish": {
        const merged = ctx.merged;
        if (!merged) return { success: false, error: "Nothing to publish" };
        const snapshot = merged.snapshot;
        const outcome = await deps.gate.run(
          target,
          runId,
          async (gateSignal) => {
            await deps.store.publish(name, snapshot, { signal: gateSignal });
            gateSignal.throwIfAborted();
            await deps.deployer.deploy(target, snapshot, gateSignal);
          },
          { signal },
        );

        if (outcome.status === "published") {
          ctx.publish = { status: "published", target };
          return { success: true, diagnostics: [diag("info", "PUBLISHED", `Published ${name} to ${target}`)] };
        }
        if (outcome.status === "superseded") {
          ctx.publish = { status: "superseded", target, supersededBy: outcome.supersededBy };
          return {
            success: true,
            diagnostics: [
              diag("info", "PUBLISH_SUPERSEDED", `Publish to ${target} cancelled in favour of ${outcome.supersededBy}`),
            ],
          };
        }
        const message = errorMessage(outcome.error);
        ctx.publish = { status: "failed", target, error: message };
        const code = outcome.error instanceof PublishCancelTimeoutError ? "PUBLISH_CANCEL_TIMEOUT" : "PUBLISH_FAILED";
        return {
          success: false,
          error: `Publish to ${target} failed: ${message}`,
          diagnostics: [diag("error", code, message)],
        };
      }
    }
  };

  const orchestrator = new Orchestrator(
    deps.runsDir,
    { stages, timeouts: config.stages, onDiagnostic: opts.onDiagnostic },
    stageRunner,
  );
  const result = await orchestrator.run({ runId, trigger: opts.trigger });

  const keyReports = buildKeyReports(keys, ctx.verdicts, ctx.merged?.provenance ?? {});
  const status: RunStatus = result.success ? deriveRunStatus(keyReports, ctx.publish) : "failed";
  const summary = renderRunSummary({
    runId,
    trigger: opts.trigger,
    status,
    keys: keyReports,
    publish: ctx.publish,
    error: result.success ? undefined : result.error,
    freshText: ctx.freshText,
  });

  const runDir = path.join(deps.runsDir, runId);
  await atomicWriteFile(path.join(runDir, "summary.md"), summary);
  if (deps.summaryFile) {
    await mkdir(path.dirname(deps.summaryFile), { recursive: true });
    await appendFile(deps.summaryFile, summary + "\n", "utf8");
  }
  await orchestrator.annotate(runId, {
    status,
    keys: keyReports,
    publish: {
      status: ctx.publish.status,
      target,
      detail:
        ctx.publish.status === "failed"
          ? ctx.publish.error
          : ctx.publish.status === "superseded"
            ? ctx.publish.supersededBy
            : undefined,
    },
  });

  return {
    runId,
    trigger: opts.trigger,
    status,
    finalStage: result.final_status,
    keys: keyReports,
    snapshot: ctx.merged?.snapshot ?? null,
    publish: ctx.publish,
    summary,
    statePath: statePathFor(deps.runsDir, runId),
    error: result.error,
  };
}
