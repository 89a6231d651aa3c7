import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import {
  ALL_STAGES,
  getEffectiveStages,
  nextState,
  isTerminal,
  getStageTimeout,
} from "../src/core/state-machine.js";
import { Orchestrator, readRunRecord, statePathFor, type StageResult } from "../src/core/orchestrator.js";
import { generateRunId, reserveRunId } from "../src/core/run-id.js";
import type { PipelineStage } from "../src/types/config.js";
import { untilAborted } from "./fakes.js";

describe("state-machine", () => {
  it("runs every stage when publishing", () => {
    expect(getEffectiveStages({ publish: true })).toEqual([...ALL_STAGES]);
  });

  it("stops after the merge when not publishing", () => {
    expect(getEffectiveStages({ publish: false })).toEqual([
      "fetch_history",
      "run_matrix",
      "validate",
      "merge_history",
    ]);
  });

  it("nextState advances to next stage on success", () => {
    const stages = getEffectiveStages({ publish: true });
    expect(nextState("fetch_history", "success", stages)).toBe("run_matrix");
    expect(nextState("run_matrix", "success", stages)).toBe("validate");
    expect(nextState("validate", "success", stages)).toBe("merge_history");
    expect(nextState("merge_history", "success", stages)).toBe("publish");
    expect(nextState("publish", "success", stages)).toBe("done");
  });

  it("nextState finishes after the merge in a dry run", () => {
    expect(nextState("merge_history", "success", getEffectiveStages({ publish: false }))).toBe("done");
  });

  it("nextState returns failed_ and timeout_ states", () => {
    expect(nextState("validate", "failure", ALL_STAGES)).toBe("failed_validate");
    expect(nextState("run_matrix", "timeout", ALL_STAGES)).toBe("timeout_run_matrix");
  });

  it("nextState fails a stage outside the effective list", () => {
    expect(nextState("publish", "success", getEffectiveStages({ publish: false }))).toBe("failed_publish");
  });

  it("isTerminal recognises done, failed and timeout states", () => {
    expect(isTerminal("done")).toBe(true);
    expect(isTerminal("failed_publish")).toBe(true);
    expect(isTerminal("timeout_fetch_history")).toBe(true);
    expect(isTerminal("merge_history")).toBe(false);
  });

  it("getStageTimeout returns defaults", () => {
    expect(getStageTimeout("fetch_history")).toBe(60);
    expect(getStageTimeout("run_matrix")).toBe(21600);
    expect(getStageTimeout("publish")).toBe(900);
  });

  it("getStageTimeout uses config overrides", () => {
    expect(getStageTimeout("publish", { timeouts: { publish: 30 } })).toBe(30);
    expect(getStageTimeout("validate", { timeouts: { publish: 30 } })).toBe(300);
  });
});

describe("run ids", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "reportctl-ids-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const now = new Date("2026-03-04T10:00:00Z");

  it("numbers runs per trigger and day", () => {
    expect(generateRunId("schedule", tmpDir, now)).toBe("schedule-20260304-001");
    fs.mkdirSync(path.join(tmpDir, "schedule-20260304-001"));
    fs.mkdirSync(path.join(tmpDir, "schedule-20260304-007"));
    fs.mkdirSync(path.join(tmpDir, "manual-20260304-009"));
    expect(generateRunId("schedule", tmpDir, now)).toBe("schedule-20260304-008");
    expect(generateRunId("release", tmpDir, now)).toBe("release-20260304-001");
  });

  it("reserves a fresh id on every call", () => {
    const ids = [reserveRunId("call", tmpDir, now), reserveRunId("call", tmpDir, now)];
    expect(ids).toEqual(["call-20260304-001", "call-20260304-002"]);
    expect(new Set(ids).size).toBe(2);
    for (const id of ids) expect(fs.existsSync(path.join(tmpDir, id))).toBe(true);
  });
});

describe("orchestrator", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "reportctl-orch-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function orchestrator(
    runner: (stage: PipelineStage, signal: AbortSignal) => Promise<StageResult>,
    opts: { publish?: boolean; timeouts?: Partial<Record<PipelineStage, number>> } = {},
  ): Orchestrator {
    return new Orchestrator(
      tmpDir,
      { stages: getEffectiveStages({ publish: opts.publish ?? true }), timeouts: { timeouts: opts.timeouts } },
      runner,
    );
  }

  it("runs every stage to done in order", async () => {
    const seen: PipelineStage[] = [];
    const orch = orchestrator(async (stage) => {
      seen.push(stage);
      return { success: true };
    });

    const result = await orch.run({ runId: "manual-20260304-001", trigger: "manual" });

    expect(result.success).toBe(true);
    expect(result.final_status).toBe("done");
    expect(seen).toEqual([...ALL_STAGES]);

    const state = readRunRecord(statePathFor(tmpDir, "manual-20260304-001"));
    expect(state?.current_stage).toBe("done");
    expect(state?.trigger).toBe("manual");
    expect(state?.error).toBeNull();
    expect(Object.keys(state?.stage_results ?? {})).toEqual([...ALL_STAGES]);
  });

  it("stops on stage failure", async () => {
    const seen: PipelineStage[] = [];
    const orch = orchestrator(async (stage) => {
      seen.push(stage);
      return stage === "run_matrix" ? { success: false, error: "No subjects to test" } : { success: true };
    });

    const result = await orch.run({ runId: "r1", trigger: "call" });

    expect(result.success).toBe(false);
    expect(result.final_status).toBe("failed_run_matrix");
    expect(result.error).toBe("No subjects to test");
    expect(seen).toEqual(["fetch_history", "run_matrix"]);
    expect(result.stage_results.run_matrix).toMatchObject({ status: "failed", error: "No subjects to test" });
  });

  it("records a thrown error as a stage failure", async () => {
    const orch = orchestrator(async (stage) => {
      if (stage === "validate") throw new Error("registry unavailable");
      return { success: true };
    });

    const result = await orch.run({ runId: "r1", trigger: "call" });

    expect(result.final_status).toBe("failed_validate");
    expect(result.error).toBe("registry unavailable");
  });

  it("times out a stage that overruns and aborts its signal", async () => {
    let aborted = false;
    const orch = orchestrator(
      async (stage, signal) => {
        if (stage !== "run_matrix") return { success: true };
        signal.addEventListener("abort", () => {
          aborted = true;
        });
        return untilAborted(signal);
      },
      { timeouts: { run_matrix: 0.25 } },
    );

    const result = await orch.run({ runId: "r1", trigger: "schedule" });

    expect(result.final_status).toBe("timeout_run_matrix");
    expect(result.error).toBe("Timeout at stage run_matrix");
    expect(result.stage_results.run_matrix).toMatchObject({
      status: "timeout",
      error: "stage run_matrix timed out after 250ms",
    });
    expect(aborted).toBe(true);
  });

  it("forwards stage diagnostics", async () => {
    const codes: string[] = [];
    const orch = new Orchestrator(
      tmpDir,
      { stages: ["fetch_history"], onDiagnostic: (d) => codes.push(d.code) },
      async () => ({ success: true, diagnostics: [{ level: "info", code: "HISTORY_ABSENT", message: "none" }] }),
    );
    await orch.run({ runId: "r1", trigger: "manual" });
    expect(codes).toEqual(["HISTORY_ABSENT"]);
  });

  it("annotates a finished run", async () => {
    const orch = orchestrator(async () => ({ success: true }), { publish: false });
    await orch.run({ runId: "r1", trigger: "manual" });

    const record = await orch.annotate("r1", { status: "partial", publish: { status: "skipped", target: "pages" } });

    expect(record.status).toBe("partial");
    expect(readRunRecord(statePathFor(tmpDir, "r1"))).toMatchObject({
      status: "partial",
      current_stage: "done",
      publish: { status: "skipped", target: "pages" },
    });
  });

  it("refuses to annotate an unknown run", async () => {
    const orch = orchestrator(async () => ({ success: true }));
    await expect(orch.annotate("missing", { status: "failed" })).rejects.toThrow("No state for run missing");
  });

  it("treats an unreadable record as absent", () => {
    const p = statePathFor(tmpDir, "broken");
    fs.mkdirSync(path.dirname(p), { recursive: true });
    fs.writeFileSync(p, "{not json");
    expect(readRunRecord(p)).toBeNull();
    fs.writeFileSync(p, JSON.stringify({ hello: "world" }));
    expect(readRunRecord(p)).toBeNull();
  });
});
