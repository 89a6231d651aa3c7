import path from "node:path";
import { ConfigError, loadConfig } from "../config/loader.js";
import { createPipelineDeps, runPipeline, type PipelineDeps, type PipelineResult } from "../core/pipeline.js";
import type { PublishGate } from "../core/publish-gate.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { TRIGGER_SOURCES, type TriggerSource } from "../types/run.js";
import { EXIT, exitCodeFor, type ExitCode } from "./exit-codes.js";

export type RunCommandResult =
  | { ok: true; result: PipelineResult; exitCode: ExitCode }
  | { ok: false; error: { code: string; message: string }; exitCode: ExitCode };

export function parseTrigger(value: string): TriggerSource | null {
  return TRIGGER_SOURCES.find((t) => t === value) ?? null;
}

/**
 * Load config, build the collaborators and run one pipeline.
 * Config and subject problems are input errors; everything later is a run outcome.
 */
export async function run(opts: {
  trigger: TriggerSource;
  configDir?: string;
  env?: string;
  baseDir?: string;
  dryRun?: boolean;
  gate?: PublishGate;
  deps?: (base: PipelineDeps) => PipelineDeps;
  onDiagnostic?: (d: Diagnostic) => void;
}): Promise<RunCommandResult> {
  const baseDir = path.resolve(opts.baseDir ?? process.cwd());

  let deps: PipelineDeps;
  try {
    const config = await loadConfig(opts.env, opts.configDir ? path.resolve(baseDir, opts.configDir) : undefined);
    deps = await createPipelineDeps(config, { baseDir, gate: opts.gate });
  } catch (e) {
    const code = e instanceof ConfigError ? "CONFIG_INVALID" : "SETUP_FAILED";
    return {
      ok: false,
      error: { code, message: e instanceof Error ? e.message : String(e) },
      exitCode: EXIT.INVALID_ARGS,
    };
  }

  const result = await runPipeline(opts.deps ? opts.deps(deps) : deps, {
    trigger: opts.trigger,
    dryRun: opts.dryRun,
    onDiagnostic: opts.onDiagnostic,
  });
  return { ok: true, result, exitCode: exitCodeFor(result.status, result.finalStage) };
}
