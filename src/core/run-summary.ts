import type { MatrixKey, Provenance } from "../types/history.js";
import type { CellVerdict, KeyReport, RunStatus, TriggerSource } from "../types/run.js";

export type PublishReport =
  | { status: "published"; target: string }
  | { status: "superseded"; target: string; supersededBy: string }
  | { status: "failed"; target: string; error: string }
  | { status: "skipped"; target: string };

const PROVENANCE_LABEL: Record<Provenance, string> = {
  fresh: "fresh",
  carried: "carried forward",
  absent: "absent",
};

export function buildKeyReports(
  keys: readonly MatrixKey[],
  verdicts: Record<MatrixKey, CellVerdict>,
  provenance: Record<MatrixKey, Provenance>,
): KeyReport[] {
  return keys.map((key) => {
    const verdict = verdicts[key];
    const report: KeyReport = { key, provenance: provenance[key] ?? "absent" };
    if (verdict && verdict.status === "rejected") report.failure = { kind: verdict.kind, reason: verdict.reason };
    return report;
  });
}

/** Overall status of a run whose stages all finished. */
export function deriveRunStatus(keys: readonly KeyReport[], publish: PublishReport): RunStatus {
  if (publish.status === "failed") return "failed";
  if (publish.status === "superseded") return "superseded";
  return keys.some((k) => k.failure) ? "partial" : "succeeded";
}

function publishLine(publish: PublishReport): string {
  switch (publish.status) {
    case "published":
      return `Published to \`${publish.target}\`.`;
    case "superseded":
      return `Publish to \`${publish.target}\` superseded by ${publish.supersededBy}.`;
    case "failed":
      return `Publish to \`${publish.target}\` failed: ${publish.error}`;
    case "skipped":
      return "Publish skipped.";
  }
}

function cell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\s+/g, " ").trim();
}

/**
 * Markdown summary of one run: every key with its provenance and failure, then the
 * failure listing of each report that was produced fresh.
 */
export function renderRunSummary(run: {
  runId: string;
  trigger: TriggerSource;
  status: RunStatus;
  keys: readonly KeyReport[];
  publish: PublishReport;
  error?: string;
  freshText?: Record<MatrixKey, string>;
}): string {
  const lines: string[] = [`## Report run ${run.runId} (${run.trigger})`, "", `Status: **${run.status}**`, ""];
  if (run.error) lines.push(`Error: ${run.error}`, "");

  if (run.keys.length > 0) {
    lines.push("| Key | Result | Detail |", "|:---|:---|:---|");
    for (const k of run.keys) {
      const detail = k.failure ? cell(`${k.failure.kind}: ${k.failure.reason}`) : "";
      lines.push(`| ${k.key} | ${PROVENANCE_LABEL[k.provenance]} | ${detail} |`);
    }
    lines.push("");
  }

  lines.push(publishLine(run.publish));

  for (const [key, text] of Object.entries(run.freshText ?? {})) {
    lines.push("", `### ${key}`, "", text.trimEnd());
  }
  return lines.join("\n") + "\n";
}
