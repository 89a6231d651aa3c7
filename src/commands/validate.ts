import fs from "node:fs";
import path from "node:path";
import { resolveSubjects } from "../adapter/subjects.js";
import { CONFIG_DIR, loadRawConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { errorMessage } from "../core/deadline.js";
import { validateReport } from "../report/validator.js";
import { createRegistry } from "../schema/registry.js";
import type { ReportConfig } from "../types/config.js";
import { diag, type Diagnostic } from "../types/diagnostic.js";

export type ValidateResult = { ok: true; diagnostics: Diagnostic[] } | { ok: false; errors: Diagnostic[] };

function listOverlays(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((e) => e.isFile() && e.name.endsWith(".yaml") && e.name !== "base.yaml")
    .map((e) => e.name.replace(/\.yaml$/, ""))
    .sort();
}

/**
 * Check the base config and every overlay layered on it, the subject list of the
 * selected layer, and optionally one report document.
 */
export async function validateAll(opts: {
  configDir?: string;
  env?: string;
  baseDir?: string;
  reportPath?: string;
  processEnv?: NodeJS.ProcessEnv;
}): Promise<ValidateResult> {
  const baseDir = path.resolve(opts.baseDir ?? process.cwd());
  const configDir = opts.configDir ? path.resolve(baseDir, opts.configDir) : CONFIG_DIR;
  const processEnv = opts.processEnv ?? process.env;
  const errors: Diagnostic[] = [];
  const diagnostics: Diagnostic[] = [];

  if (!fs.existsSync(configDir)) {
    return { ok: false, errors: [diag("error", "CONFIG_DIR_MISSING", `Config directory not found: ${configDir}`)] };
  }

  let selected: ReportConfig | null = null;
  for (const layer of [undefined, ...listOverlays(configDir)]) {
    const file = path.join(configDir, `${layer ?? "base"}.yaml`);
    try {
      const result = await validateConfig(loadRawConfig(layer, configDir, processEnv));
      if (!result.valid) {
        errors.push(diag("error", "CONFIG_INVALID", `Config invalid (${path.basename(file)}): ${result.errors}`, { path: file }));
        continue;
      }
      if (layer === opts.env) selected = result.config;
    } catch (e) {
      errors.push(diag("error", "CONFIG_READ_FAILED", `Failed to read config (${path.basename(file)}): ${errorMessage(e)}`, { path: file }));
    }
  }

  if (opts.env && !fs.existsSync(path.join(configDir, `${opts.env}.yaml`))) {
    errors.push(diag("error", "CONFIG_ENV_MISSING", `Unknown config environment: ${opts.env}`));
  }

  if (selected) {
    try {
      const subjects = resolveSubjects(selected.subjects, baseDir);
      if (subjects.length === 0) {
        errors.push(diag("error", "SUBJECTS_NONE", "No subjects selected by the subjects config"));
      } else {
        diagnostics.push(diag("info", "SUBJECTS_OK", `${subjects.length} subject(s): ${subjects.join(", ")}`));
      }
    } catch (e) {
      errors.push(diag("error", "SUBJECTS_UNRESOLVED", errorMessage(e)));
    }
  }

  if (opts.reportPath) {
    const reportPath = path.resolve(baseDir, opts.reportPath);
    if (!fs.existsSync(reportPath)) {
      errors.push(diag("error", "REPORT_MISSING", `Report not found: ${reportPath}`, { path: reportPath }));
    } else {
      const check = await validateReport(fs.readFileSync(reportPath, "utf8"), await createRegistry());
      if (check.valid) {
        diagnostics.push(
          diag("info", "REPORT_OK", `Report valid: ${check.summary.cases} cases, ${check.summary.totalTests} tests`, {
            path: reportPath,
          }),
        );
      } else {
        errors.push(diag("error", "REPORT_INVALID", `Report invalid: ${check.reason}`, { path: reportPath }));
      }
    }
  }

  return errors.length > 0 ? { ok: false, errors } : { ok: true, diagnostics };
}
