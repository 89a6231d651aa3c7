import fs from "node:fs";
import path from "node:path";
import { atomicWriteJson } from "../fs/atomic.js";
import type { PipelineStage, StagesConfig } from "../types/config.js";
import type { Diagnostic } from "../types/diagnostic.js";
import type { KeyReport, RunStatus, TriggerSource } from "../types/run.js";
import { DeadlineError, errorMessage, withDeadline } from "./deadline.js";
import { type StageStatus, getStageTimeout, isTerminal, nextState } from "./state-machine.js";

export type StageRecord = {
  status: "success" | "failed" | "timeout";
  duration_ms: number;
  error?: string;
};

/** Persistent run state stored in {runs_dir}/{run_id}/state.json */
export type RunRecord = {
  run_id: string;
  trigger: TriggerSource;
  current_stage: StageStatus;
  started_at: string;
  updated_at: string;
  stage_started_at: string | null;
  stage_results: Partial<Record<PipelineStage, StageRecord>>;
  error: string | null;
  status?: RunStatus;
  keys?: KeyReport[];
  publish?: { status: string; target: string; detail?: string };
};

export type StageResult =
  | { success: true; diagnostics?: Diagnostic[] }
  | { success: false; error: string; diagnostics?: Diagnostic[] };

export type StageRunner = (stage: PipelineStage, signal: AbortSignal) => Promise<StageResult>;

export type OrchestratorResult = {
  success: boolean;
  run_id: string;
  final_status: StageStatus;
  stage_results: RunRecord["stage_results"];
  error?: string;
};

export type OrchestratorOptions = {
  stages: readonly PipelineStage[];
  timeouts?: StagesConfig;
  onDiagnostic?: (d: Diagnostic) => void;
};

export function statePathFor(runsDir: string, runId: string): string {
  return path.join(runsDir, runId, "state.json");
}

/**
 * Orchestrator: drives one run through the pipeline stages.
 *
 * Main loop: execute stage under its timeout → persist → advance. The first failed or
 * timed-out stage ends the run.
 */
export class Orchestrator {
  constructor(
    private readonly runsDir: string,
    private readonly opts: OrchestratorOptions,
    private readonly stageRunner: StageRunner,
  ) {}

  async run(opts: { runId: string; trigger: TriggerSource }): Promise<OrchestratorResult> {
    const statePath = statePathFor(this.runsDir, opts.runId);
    fs.mkdirSync(path.dirname(statePath), { recursive: true });

    const now = new Date().toISOString();
    const state: RunRecord = {
      run_id: opts.runId,
      trigger: opts.trigger,
      current_stage: this.opts.stages[0],
      started_at: now,
      updated_at: now,
      stage_started_at: null,
      stage_results: {},
      error: null,
    };
    await this.saveState(statePath, state);

    let current = state.current_stage;
    while (!isTerminal(current)) {
      const stage = this.opts.stages.find((s) => s === current);
      if (!stage) break;

      const timeoutMs = getStageTimeout(stage, this.opts.timeouts) * 1000;
      state.stage_started_at = new Date().toISOString();
      state.updated_at = state.stage_started_at;
      await this.saveState(statePath, state);

      const stageStart = Date.now();
      try {
        const result = await withDeadline((signal) => this.stageRunner(stage, signal), {
          timeoutMs,
          label: `stage ${stage}`,
        });
        for (const d of result.diagnostics ?? []) this.opts.onDiagnostic?.(d);

        const duration_ms = Date.now() - stageStart;
        if (result.success) {
          state.stage_results[stage] = { status: "success", duration_ms };
          current = nextState(stage, "success", this.opts.stages);
        } else {
          state.stage_results[stage] = { status: "failed", duration_ms, error: result.error };
          current = nextState(stage, "failure", this.opts.stages);
          state.error = result.error;
        }
      } catch (e) {
        const duration_ms = Date.now() - stageStart;
        const msg = errorMessage(e);
        if (e instanceof DeadlineError) {
          state.stage_results[stage] = { status: "timeout", duration_ms, error: msg };
          current = nextState(stage, "timeout", this.opts.stages);
          state.error = `Timeout at stage ${stage}`;
        } else {
          state.stage_results[stage] = { status: "failed", duration_ms, error: msg };
          current = nextState(stage, "failure", this.opts.stages);
          state.error = msg;
        }
      }

      state.current_stage = current;
      state.stage_started_at = null;
      state.updated_at = new Date().toISOString();
      await this.saveState(statePath, state);
    }

    return {
      success: current === "done",
      run_id: opts.runId,
      final_status: current,
      stage_results: state.stage_results,
      error: state.error ?? undefined,
    };
  }

  /** Merge `patch` into a persisted run record. */
  async annotate(runId: string, patch: Pick<RunRecord, "status" | "keys" | "publish">): Promise<RunRecord> {
    const statePath = statePathFor(this.runsDir, runId);
    const current = readRunRecord(statePath);
    if (!current) throw new Error(`No state for run ${runId}`);
    const next: RunRecord = { ...current, ...patch, updated_at: new Date().toISOString() };
    await this.saveState(statePath, next);
    return next;
  }

  private async saveState(statePath: string, state: RunRecord): Promise<void> {
    await atomicWriteJson(statePath, state);
  }
}

function isRunRecord(value: unknown): value is RunRecord {
  return (
    typeof value === "object" &&
    value !== null &&
    "run_id" in value &&
    typeof value.run_id === "string" &&
    "current_stage" in value &&
    typeof value.current_stage === "string" &&
    "stage_results" in value &&
    typeof value.stage_results === "object"
  );
}

/** Read a run record; null when missing or not a run record. */
export function readRunRecord(statePath: string): RunRecord | null {
  if (!fs.existsSync(statePath)) return null;
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(statePath, "utf8"));
  } catch (e) {
    if (e instanceof SyntaxError) return null;
    throw e;
  }
  return isRunRecord(data) ? data : null;
}
