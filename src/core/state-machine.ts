import type { PipelineStage, StagesConfig } from "../types/config.js";

/**
 * All pipeline stages in order.
 */
export const ALL_STAGES: readonly PipelineStage[] = [
  "fetch_history",
  "run_matrix",
  "validate",
  "merge_history",
  "publish",
];

/**
 * Terminal and error states.
 */
export type StageStatus = PipelineStage | "done" | `failed_${PipelineStage}` | `timeout_${PipelineStage}`;

/**
 * Events that drive state transitions.
 */
export type TransitionEvent = "success" | "failure" | "timeout";

const DEFAULT_TIMEOUTS: Record<PipelineStage, number> = {
  fetch_history: 60,
  run_matrix: 21600,
  validate: 300,
  merge_history: 120,
  publish: 900,
};

/**
 * Determine the effective stage list. A dry run, or a config with publishing disabled,
 * stops after the merge.
 */
export function getEffectiveStages(opts: { publish: boolean }): PipelineStage[] {
  return ALL_STAGES.filter((s) => opts.publish || s !== "publish");
}

/**
 * Pure function: given current stage + event, return next state.
 */
export function nextState(
  current: PipelineStage,
  event: TransitionEvent,
  effective: readonly PipelineStage[],
): StageStatus {
  if (event === "failure") return `failed_${current}`;
  if (event === "timeout") return `timeout_${current}`;

  const idx = effective.indexOf(current);
  if (idx === -1) return `failed_${current}`;
  if (idx >= effective.length - 1) return "done";
  return effective[idx + 1];
}

export function isTerminal(status: StageStatus): boolean {
  return status === "done" || status.startsWith("failed_") || status.startsWith("timeout_");
}

/**
 * Get the timeout for a stage in seconds.
 */
export function getStageTimeout(stage: PipelineStage, config?: StagesConfig): number {
  return config?.timeouts?.[stage] ?? DEFAULT_TIMEOUTS[stage];
}
