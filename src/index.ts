export { runPipeline, createPipelineDeps, createPublishGate } from "./core/pipeline.js";
export type { PipelineDeps, PipelineOptions, PipelineResult } from "./core/pipeline.js";
export { runMatrix, suiteUrlFor } from "./core/matrix.js";
export type { MatrixRunOptions } from "./core/matrix.js";
export { PublishGate, PublishSupersededError, PublishCancelTimeoutError } from "./core/publish-gate.js";
export type { PublishOutcome, PublishGateOptions } from "./core/publish-gate.js";
export { FileLease, LeaseTimeoutError } from "./core/lease.js";
export { Orchestrator, readRunRecord } from "./core/orchestrator.js";
export type { RunRecord, StageResult, StageRunner } from "./core/orchestrator.js";
export { ALL_STAGES, nextState, getEffectiveStages, getStageTimeout } from "./core/state-machine.js";
export type { StageStatus, TransitionEvent } from "./core/state-machine.js";
export { DailyScheduler, nextDailyRun } from "./core/scheduler.js";
export { DeadlineError, withDeadline } from "./core/deadline.js";
export { renderRunSummary, deriveRunStatus } from "./core/run-summary.js";
export type { PublishReport } from "./core/run-summary.js";

export { mergeHistory, stripPrevious, historyDepth, snapshotDigest } from "./history/merge.js";
export type { MergeResult } from "./history/merge.js";
export { FsHistoryStore, HistoryStoreError } from "./history/store.js";
export type { HistoryStore, FetchResult } from "./history/store.js";

export { parseReport, ReportParseError } from "./report/parse.js";
export { summarizeReport, SummaryError } from "./report/summary.js";
export { renderSummary } from "./report/render.js";
export { generateBadges } from "./report/badges.js";
export { validateReport } from "./report/validator.js";
export type { ReportValidation } from "./report/validator.js";

export { CommandExecutor, ExecutionError } from "./adapter/executor.js";
export type { TestExecutor, ExecuteOptions } from "./adapter/executor.js";
export { ReportSummarizer } from "./adapter/summarizer.js";
export type { Summarizer, SummarizeResult } from "./adapter/summarizer.js";
export { DirectoryDeployer, DeployError } from "./adapter/deployer.js";
export type { Deployer } from "./adapter/deployer.js";
export { resolveSubjects, filterSubjects } from "./adapter/subjects.js";

export { loadConfig, loadRawConfig, ConfigError } from "./config/loader.js";
export { validateConfig } from "./config/validator.js";
export { createRegistry, SchemaRegistry } from "./schema/registry.js";

export type * from "./types/config.js";
export type * from "./types/history.js";
export type * from "./types/report.js";
export type { Diagnostic } from "./types/diagnostic.js";
export type { TriggerSource, CellOutcome, CellVerdict, KeyReport, RunStatus, FailureKind } from "./types/run.js";
export { TRIGGER_SOURCES } from "./types/run.js";
