/** Configuration types: layered config system (base.yaml ← env.yaml ← REPORTCTL_ vars). */
import type { MatrixKey } from "./history.js";

export type PipelineStage = "fetch_history" | "run_matrix" | "validate" | "merge_history" | "publish";

export type MatrixConfig = {
  keys: MatrixKey[];
  /** Suite location template; `{key}` is replaced by the MatrixKey. */
  suite_url: string;
};

export type SubjectsConfig = {
  list?: string[];
  dir?: string;
  include?: string[];
  exclude?: string[];
};

export type ExecutorConfig = {
  /** argv template; `{subjects}` expands to flag/id pairs. */
  command: string[];
  subject_flag?: string;
  timeout_seconds?: number;
  max_output_mb?: number;
  success_exit_codes?: number[];
  pass_env?: string[];
};

export type SummarizerConfig = {
  timeout_seconds?: number;
};

export type HistoryConfig = {
  root: string;
  name: string;
};

export type PublishConfig = {
  enabled: boolean;
  target: string;
  site_dir: string;
  lock_dir?: string;
  cancel_timeout_seconds?: number;
};

export type ScheduleConfig = {
  /** HH:MM, UTC. */
  daily_at: string;
};

export type StagesConfig = {
  timeouts?: Partial<Record<PipelineStage, number>>;
};

export type ReportConfig = {
  schema_version: string;
  runs_dir: string;
  matrix: MatrixConfig;
  subjects: SubjectsConfig;
  executor: ExecutorConfig;
  summarizer?: SummarizerConfig;
  history: HistoryConfig;
  publish: PublishConfig;
  schedule?: ScheduleConfig;
  stages?: StagesConfig;
  summary_file?: string;
};
