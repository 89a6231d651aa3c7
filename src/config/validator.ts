import { isRecord } from "../report/parse.js";
import { conforms, loadAjv } from "../schema/ajv.js";
import type { ReportConfig } from "../types/config.js";

const KEY_PATTERN = "^[A-Za-z0-9][A-Za-z0-9._-]*$";
const positiveInt = { type: "integer", minimum: 1 };
const stringList = { type: "array", items: { type: "string", minLength: 1 } };

/** Config schema; ajv strict mode needs a `type` beside every keyword. */
const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "runs_dir", "matrix", "subjects", "executor", "history", "publish"],
  additionalProperties: false,
  properties: {
    schema_version: { type: "string", minLength: 1 },
    runs_dir: { type: "string", minLength: 1 },
    matrix: {
      type: "object",
      required: ["keys", "suite_url"],
      additionalProperties: false,
      properties: {
        keys: {
          type: "array",
          minItems: 1,
          uniqueItems: true,
          items: { type: "string", pattern: KEY_PATTERN },
        },
        suite_url: { type: "string", minLength: 1 },
      },
    },
    subjects: {
      type: "object",
      additionalProperties: false,
      properties: {
        list: stringList,
        dir: { type: "string", minLength: 1 },
        include: stringList,
        exclude: stringList,
      },
    },
    executor: {
      type: "object",
      required: ["command"],
      additionalProperties: false,
      properties: {
        command: { type: "array", minItems: 1, items: { type: "string" } },
        subject_flag: { type: "string", minLength: 1 },
        timeout_seconds: positiveInt,
        max_output_mb: positiveInt,
        success_exit_codes: { type: "array", minItems: 1, items: { type: "integer", minimum: 0 } },
        pass_env: stringList,
      },
    },
    summarizer: {
      type: "object",
      additionalProperties: false,
      properties: { timeout_seconds: positiveInt },
    },
    history: {
      type: "object",
      required: ["root", "name"],
      additionalProperties: false,
      properties: {
        root: { type: "string", minLength: 1 },
        name: { type: "string", pattern: KEY_PATTERN },
      },
    },
    publish: {
      type: "object",
      required: ["enabled", "target", "site_dir"],
      additionalProperties: false,
      properties: {
        enabled: { type: "boolean" },
        target: { type: "string", pattern: KEY_PATTERN },
        site_dir: { type: "string", minLength: 1 },
        lock_dir: { type: "string", minLength: 1 },
        cancel_timeout_seconds: positiveInt,
      },
    },
    schedule: {
      type: "object",
      required: ["daily_at"],
      additionalProperties: false,
      properties: {
        daily_at: { type: "string", pattern: "^([01][0-9]|2[0-3]):[0-5][0-9]$" },
      },
    },
    stages: {
      type: "object",
      additionalProperties: false,
      properties: {
        timeouts: {
          type: "object",
          additionalProperties: false,
          properties: {
            fetch_history: positiveInt,
            run_matrix: positiveInt,
            validate: positiveInt,
            merge_history: positiveInt,
            publish: positiveInt,
          },
        },
      },
    },
    summary_file: { type: "string", minLength: 1 },
  },
};

/** The `type` the config schema declares at `segments`, or undefined for paths it does not know. */
export function declaredType(segments: string[]): string | undefined {
  let node: unknown = CONFIG_SCHEMA;
  for (const segment of segments) {
    if (!isRecord(node) || !isRecord(node.properties)) return undefined;
    node = node.properties[segment];
  }
  return isRecord(node) && typeof node.type === "string" ? node.type : undefined;
}

export type ConfigValidationResult = { valid: true; config: ReportConfig } | { valid: false; errors: string };

/** Validate a loaded config against the config schema. */
export async function validateConfig(config: unknown): Promise<ConfigValidationResult> {
  const ajv = await loadAjv();
  const validate = ajv.compile(CONFIG_SCHEMA);
  if (conforms<ReportConfig>(validate, config)) return { valid: true, config };
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}
