import { slugPathComponent } from "../fs/security.js";
import { dialectShortName } from "./dialects.js";
import { unsuccessful } from "./summary.js";
import type { BadgeSet } from "../types/history.js";
import type { ParsedReport, ReportSummary } from "../types/report.js";

export const SUPPORTED_VERSIONS_LABEL = "JSON Schema Versions";

function hex2(n: number): string {
  return n.toString(16).padStart(2, "0");
}

/**
 * Compliance badges for every implementation that speaks the report's dialect:
 * `<language>-<name>/compliance/<Dialect_Label>.json` with the pass percentage,
 * and `<language>-<name>/supported_versions.json` listing the dialects it supports.
 */
export function generateBadges(report: ParsedReport, summary: ReportSummary): BadgeSet {
  const badges: BadgeSet = {};
  const dialect = report.header.dialect;
  const label = dialectShortName(dialect);
  const total = summary.totalTests;
  if (total === 0) return badges;

  for (const [id, impl] of Object.entries(report.header.implementations)) {
    const dialects = impl.dialects ?? [];
    if (!dialects.includes(dialect)) continue;

    const counts = summary.byImplementation[id] ?? { failed: 0, errored: 0, skipped: 0 };
    const pct = Math.min(100, Math.max(0, Math.trunc(((total - unsuccessful(counts)) / total) * 100)));
    const dir = slugPathComponent(`${impl.language ?? "unknown"}-${impl.name ?? id}`);

    badges[`${dir}/compliance/${slugPathComponent(label.replace(/ /g, "_"))}.json`] = {
      schemaVersion: 1,
      label,
      message: `${pct}% Passing`,
      color: `${hex2(100 - pct)}${hex2(pct)}00`,
    };
    badges[`${dir}/supported_versions.json`] = {
      schemaVersion: 1,
      label: SUPPORTED_VERSIONS_LABEL,
      message: [...dialects]
        .reverse()
        .map((d) => dialectShortName(d).replace(/^Draft /, ""))
        .join(", "),
      color: "lightgreen",
    };
  }

  return badges;
}
