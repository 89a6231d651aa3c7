import type { Diagnostic } from "../types/diagnostic.js";

export type OutputFormat = "human" | "jsonl";

export function parseFormat(value: string): OutputFormat | null {
  return value === "human" || value === "jsonl" ? value : null;
}

/** Print a diagnostic: one JSON line, or `level: message` on stderr for warnings and errors. */
export function printDiagnostic(d: Diagnostic, format: OutputFormat): void {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify(d) + "\n");
  } else if (d.level === "info") {
    console.log(d.message);
  } else {
    console.error(`${d.level}: ${d.message}`);
  }
}

/** Print a result record: one JSON line, or the human text. */
export function printRecord(record: Record<string, unknown>, human: string, format: OutputFormat): void {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "info", ...record }) + "\n");
  } else {
    console.log(human);
  }
}
