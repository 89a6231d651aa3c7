import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { redactSensitiveInfo, sanitizeEnv, sanitizeLogMessage } from "../fs/security.js";
import type { ExecutorConfig } from "../types/config.js";
import type { MatrixKey } from "../types/history.js";

const pExecFile = promisify(execFile);

export type ExecuteOptions = {
  key: MatrixKey;
  signal: AbortSignal;
};

/** Runs the test suite at `suiteUrl` against `subjects` and returns the report document. */
export interface TestExecutor {
  run(subjects: string[], suiteUrl: string, opts: ExecuteOptions): Promise<string>;
}

export class ExecutionError extends Error {
  constructor(
    message: string,
    readonly details: { exitCode?: number | string; resourceExhausted?: boolean } = {},
  ) {
    super(message);
    this.name = "ExecutionError";
  }
}

export const DEFAULT_SUBJECT_FLAG = "-i";
export const DEFAULT_MAX_OUTPUT_MB = 512;

/**
 * Expand the argv template: `{subjects}` as a whole argument becomes `flag id` pairs,
 * `{suite_url}` and `{key}` are substituted anywhere.
 */
export function expandCommand(
  template: string[],
  vars: { subjects: string[]; subjectFlag: string; suiteUrl: string; key: MatrixKey },
): string[] {
  const argv: string[] = [];
  for (const part of template) {
    if (part === "{subjects}") {
      for (const s of vars.subjects) argv.push(vars.subjectFlag, s);
      continue;
    }
    argv.push(part.replace(/\{suite_url\}/g, vars.suiteUrl).replace(/\{key\}/g, vars.key));
  }
  return argv;
}

function tail(text: unknown): string {
  if (typeof text !== "string" || text.length === 0) return "";
  return redactSensitiveInfo(sanitizeLogMessage(text.slice(-2000)));
}

/**
 * Default test-execution collaborator: one subprocess per cell, no shell, a sanitized
 * environment and bounded stdout. The report is whatever the tool writes to stdout.
 */
export class CommandExecutor implements TestExecutor {
  constructor(
    private readonly config: ExecutorConfig,
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly cwd: string = process.cwd(),
  ) {}

  async run(subjects: string[], suiteUrl: string, opts: ExecuteOptions): Promise<string> {
    const [command, ...args] = expandCommand(this.config.command, {
      subjects,
      subjectFlag: this.config.subject_flag ?? DEFAULT_SUBJECT_FLAG,
      suiteUrl,
      key: opts.key,
    });
    if (!command) throw new ExecutionError("executor command is empty");

    const accepted = new Set(this.config.success_exit_codes ?? [0]);

    try {
      const { stdout } = await pExecFile(command, args, {
        cwd: this.cwd,
        env: sanitizeEnv(this.env, this.config.pass_env ?? []),
        maxBuffer: (this.config.max_output_mb ?? DEFAULT_MAX_OUTPUT_MB) * 1024 * 1024,
        signal: opts.signal,
        shell: false,
        encoding: "utf8",
      });
      return stdout;
    } catch (e) {
      if (!(e instanceof Error)) throw e;
      if (opts.signal.aborted) throw new ExecutionError(`${command} was aborted`);

      const code = "code" in e ? e.code : undefined;
      const stderr = "stderr" in e ? tail(e.stderr) : "";
      if (code === "ERR_CHILD_PROCESS_STDIO_MAXBUFFER") {
        throw new ExecutionError(`${command} exceeded the output limit`, { exitCode: code, resourceExhausted: true });
      }
      if (typeof code === "number" && accepted.has(code) && "stdout" in e && typeof e.stdout === "string") {
        return e.stdout;
      }
      if (typeof code === "number" || typeof code === "string") {
        const signal = "signal" in e && typeof e.signal === "string" ? ` (${e.signal})` : "";
        throw new ExecutionError(`${command} exited with ${code}${signal}${stderr ? `: ${stderr}` : ""}`, { exitCode: code });
      }
      throw new ExecutionError(`${command} failed: ${redactSensitiveInfo(e.message)}`);
    }
  }
}
