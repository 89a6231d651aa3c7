import { describe, expect, it, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { EXIT } from "../src/commands/exit-codes.js";
import { showHistory } from "../src/commands/history.js";
import { parseFormat, printDiagnostic, printRecord } from "../src/commands/output.js";
import { parseTrigger, run } from "../src/commands/run.js";
import { startSchedule } from "../src/commands/schedule.js";
import { listRuns, status } from "../src/commands/status.js";
import { parseRenderFormat, parseRenderShow, summary } from "../src/commands/summary.js";
import { validateAll } from "../src/commands/validate.js";
import { loadConfig } from "../src/config/loader.js";
import { diag } from "../src/types/diagnostic.js";
import { ExecutionError } from "../src/adapter/executor.js";
import { FakeExecutor, RecordingDeployer } from "./fakes.js";
import { reportDocument, taggedReport, truncatedReport } from "./fixtures.js";

const BASE_YAML = `schema_version: "1"
runs_dir: runs
matrix:
  keys: [draft7]
  suite_url: https://example.test/suite/{key}
subjects:
  list: [js-fast]
executor:
  command: [bowtie]
history:
  root: history
  name: report
publish:
  enabled: true
  target: pages
  site_dir: site
`;

describe("cli commands", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "reportctl-cli-"));
    fs.mkdirSync(path.join(tmpDir, "config"));
    fs.writeFileSync(path.join(tmpDir, "config", "base.yaml"), BASE_YAML);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe("validate", () => {
    it("accepts a valid config and reports its subjects", async () => {
      const res = await validateAll({ configDir: "config", baseDir: tmpDir, processEnv: {} });
      expect(res).toEqual({ ok: true, diagnostics: [diag("info", "SUBJECTS_OK", "1 subject(s): js-fast")] });
    });

    it("checks every overlay", async () => {
      fs.writeFileSync(path.join(tmpDir, "config", "bad.yaml"), "publish:\n  enabled: yes-please\n");
      const res = await validateAll({ configDir: "config", baseDir: tmpDir, processEnv: {} });
      expect(res.ok).toBe(false);
      expect(!res.ok && res.errors.map((e) => e.message)).toEqual([
        "Config invalid (bad.yaml): data/publish/enabled must be boolean",
      ]);
    });

    it("reports an unknown overlay", async () => {
      const res = await validateAll({ configDir: "config", env: "staging", baseDir: tmpDir, processEnv: {} });
      expect(!res.ok && res.errors.map((e) => e.code)).toEqual(["CONFIG_ENV_MISSING"]);
    });

    it("reports a missing config directory", async () => {
      const res = await validateAll({ configDir: "nowhere", baseDir: tmpDir, processEnv: {} });
      expect(!res.ok && res.errors[0].message).toBe(`Config directory not found: ${path.join(tmpDir, "nowhere")}`);
    });

    it("validates a report document", async () => {
      fs.writeFileSync(path.join(tmpDir, "good.jsonl"), reportDocument());
      fs.writeFileSync(path.join(tmpDir, "cut.jsonl"), truncatedReport());

      const good = await validateAll({ configDir: "config", baseDir: tmpDir, reportPath: "good.jsonl", processEnv: {} });
      expect(good.ok && good.diagnostics.map((d) => d.message)).toEqual([
        "1 subject(s): js-fast",
        "Report valid: 2 cases, 3 tests",
      ]);

      const cut = await validateAll({ configDir: "config", baseDir: tmpDir, reportPath: "cut.jsonl", processEnv: {} });
      expect(!cut.ok && cut.errors.map((e) => e.message)).toEqual([
        "Report invalid: line 8: not valid JSON (truncated output?)",
      ]);
    });
  });

  describe("run", () => {
    it("parses trigger sources", () => {
      expect(parseTrigger("release")).toBe("release");
      expect(parseTrigger("cron")).toBeNull();
    });

    it("runs the pipeline and publishes into the history store", async () => {
      const deployer = new RecordingDeployer();
      const first = await run({
        trigger: "manual",
        configDir: "config",
        baseDir: tmpDir,
        deps: (base) => ({ ...base, executor: new FakeExecutor({ draft7: async () => taggedReport("v1") }), deployer }),
      });

      expect(first.ok && first.exitCode).toBe(EXIT.SUCCESS);
      expect(first.ok && first.result.status).toBe("succeeded");
      expect(deployer.deployed.map((d) => d.target)).toEqual(["pages"]);

      const second = await run({
        trigger: "schedule",
        configDir: "config",
        baseDir: tmpDir,
        deps: (base) => ({
          ...base,
          executor: new FakeExecutor({
            draft7: async () => {
              throw new ExecutionError("bowtie exited with 2");
            },
          }),
          deployer,
        }),
      });

      expect(second.ok && second.exitCode).toBe(EXIT.PARTIAL_FAILURE);
      expect(second.ok && second.result.snapshot?.entries.draft7.document).toBe(taggedReport("v1"));

      const config = await loadConfig(undefined, path.join(tmpDir, "config"), {});
      const history = await showHistory({ config, baseDir: tmpDir });
      expect(history.ok && history.view.keys).toEqual(["draft7"]);
      expect(history.ok && history.view.previous_keys).toEqual(["draft7"]);
      expect(history.ok && history.diagnostics).toEqual([]);
    });

    it("treats config problems as invalid arguments", async () => {
      const res = await run({ trigger: "manual", configDir: "missing", baseDir: tmpDir });
      expect(res.ok).toBe(false);
      expect(!res.ok && res.error.code).toBe("CONFIG_INVALID");
      expect(res.exitCode).toBe(EXIT.INVALID_ARGS);
    });
  });

  describe("schedule", () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it("announces the next daily run", async () => {
      vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "Date"] });
      vi.setSystemTime(new Date("2026-03-04T02:00:00Z"));
      const seen: string[] = [];

      const scheduler = await startSchedule({
        configDir: "config",
        baseDir: tmpDir,
        onDiagnostic: (d) => seen.push(`${d.code}: ${d.message}`),
      });

      expect(scheduler.running).toBe(true);
      expect(seen).toEqual(["SCHEDULE_STARTED: Next run at 2026-03-04T02:15:00.000Z"]);
      await scheduler.stop();
    });
  });

  describe("history", () => {
    it("shows an empty store", async () => {
      const config = await loadConfig(undefined, path.join(tmpDir, "config"), {});
      const res = await showHistory({ config, baseDir: tmpDir });
      expect(res.ok && res.view).toEqual({
        name: "report",
        root: path.join(tmpDir, "history"),
        keys: [],
        previous_keys: null,
        digest: null,
      });
      expect(res.ok && res.diagnostics.map((d) => d.code)).toEqual(["HISTORY_ABSENT"]);
    });
  });

  describe("status", () => {
    function writeRecord(id: string, updatedAt: string, extra: Record<string, unknown> = {}): void {
      const dir = path.join(tmpDir, "runs", id);
      fs.mkdirSync(dir, { recursive: true });
      fs.writeFileSync(
        path.join(dir, "state.json"),
        JSON.stringify({
          run_id: id,
          trigger: "manual",
          current_stage: "done",
          started_at: updatedAt,
          updated_at: updatedAt,
          stage_started_at: null,
          stage_results: {},
          error: null,
          ...extra,
        }),
      );
    }

    it("lists runs newest first, flagging unreadable records", () => {
      writeRecord("manual-20260304-001", "2026-03-04T10:00:00.000Z", { status: "succeeded" });
      writeRecord("manual-20260304-002", "2026-03-04T11:00:00.000Z", { current_stage: "run_matrix" });
      fs.mkdirSync(path.join(tmpDir, "runs", "broken"));
      fs.writeFileSync(path.join(tmpDir, "runs", "broken", "state.json"), "{");

      expect(listRuns(path.join(tmpDir, "runs"))).toEqual([
        { id: "manual-20260304-002", status: "running", stage: "run_matrix", updated_at: "2026-03-04T11:00:00.000Z" },
        { id: "manual-20260304-001", status: "succeeded", stage: "done", updated_at: "2026-03-04T10:00:00.000Z" },
        { id: "broken", status: "corrupted", stage: "", updated_at: "" },
      ]);
    });

    it("returns one run record or an error", () => {
      writeRecord("manual-20260304-001", "2026-03-04T10:00:00.000Z");
      const runsDir = path.join(tmpDir, "runs");

      const found = status({ runsDir, runId: "manual-20260304-001" });
      expect(found.ok && found.state.current_stage).toBe("done");
      expect(status({ runsDir, runId: "nope" })).toEqual({ ok: false, error: "No run found: nope" });
    });

    it("lists nothing without a runs directory", () => {
      expect(listRuns(path.join(tmpDir, "absent"))).toEqual([]);
    });
  });

  describe("summary", () => {
    it("renders a report document", async () => {
      const file = path.join(tmpDir, "report.jsonl");
      fs.writeFileSync(file, reportDocument());
      const res = await summary({ file, format: "pretty", show: "failures" });
      expect(res).toEqual({
        ok: true,
        text:
          "Draft 7: 2 cases, 3 tests\n" +
          "  js-fast: 0 failed, 0 errored, 0 skipped (3/3 passed)\n" +
          "  py-slow: 1 failed, 0 errored, 1 skipped (1/3 passed)\n",
      });
    });

    it("reports a document that cannot be summarized", async () => {
      const file = path.join(tmpDir, "cut.jsonl");
      fs.writeFileSync(file, truncatedReport());
      expect(await summary({ file, format: "json", show: "all" })).toEqual({
        ok: false,
        error: `Cannot summarize ${file}: line 8: not valid JSON (truncated output?)`,
      });
    });

    it("parses render options", () => {
      expect(parseRenderFormat("markdown")).toBe("markdown");
      expect(parseRenderFormat("html")).toBeNull();
      expect(parseRenderShow("all")).toBe("all");
      expect(parseRenderShow("some")).toBeNull();
    });
  });

  describe("output", () => {
    it("prints human diagnostics by level", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
      const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

      printDiagnostic(diag("info", "PUBLISHED", "Published report to pages"), "human");
      printDiagnostic(diag("warn", "KEY_ABSENT", "draft3: no report available"), "human");

      expect(log).toHaveBeenCalledWith("Published report to pages");
      expect(error).toHaveBeenCalledWith("warn: draft3: no report available");
    });

    it("prints JSON lines", () => {
      const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);

      printDiagnostic(diag("warn", "KEY_ABSENT", "draft3: no report available"), "jsonl");
      printRecord({ code: "OK", message: "OK" }, "OK", "jsonl");

      expect(write.mock.calls.map((c) => c[0])).toEqual([
        JSON.stringify(diag("warn", "KEY_ABSENT", "draft3: no report available")) + "\n",
        JSON.stringify({ level: "info", code: "OK", message: "OK" }) + "\n",
      ]);
      expect(parseFormat("xml")).toBeNull();
    });
  });
});
