import type { Count, ParsedReport, ReportSummary } from "../types/report.js";

export class SummaryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SummaryError";
  }
}

export function unsuccessful(count: Count): number {
  return count.failed + count.errored + count.skipped;
}

/**
 * Reduce a parsed report to per-implementation failed/errored/skipped counts.
 * A test is failed when the implementation's answer differs from the expected `valid`.
 *
 * @throws SummaryError when the report has no tests or the counts are inconsistent
 */
export function summarizeReport(report: ParsedReport): ReportSummary {
  const bySeq = new Map(report.cases.map((c) => [String(c.seq), c.case]));
  const totalTests = report.cases.reduce((n, c) => n + c.case.tests.length, 0);
  if (totalTests === 0) throw new SummaryError("report contains no tests");

  const byImplementation: Record<string, Count> = {};
  for (const id of Object.keys(report.header.implementations)) {
    byImplementation[id] = { failed: 0, errored: 0, skipped: 0 };
  }

  for (const outcome of report.outcomes) {
    const testCase = bySeq.get(String(outcome.seq));
    if (!testCase) throw new SummaryError(`outcome for unknown case ${String(outcome.seq)}`);
    let count = byImplementation[outcome.implementation];
    if (!count) {
      count = { failed: 0, errored: 0, skipped: 0 };
      byImplementation[outcome.implementation] = count;
    }

    switch (outcome.kind) {
      case "skipped":
        count.skipped += testCase.tests.length;
        break;
      case "errored":
        count.errored += testCase.tests.length;
        break;
      case "results":
        outcome.results.forEach((result, i) => {
          if (result.kind === "skipped") count.skipped++;
          else if (result.kind === "errored") count.errored++;
          else {
            const expected = testCase.tests[i]?.valid;
            if (expected !== undefined && result.valid !== expected) count.failed++;
          }
        });
        break;
    }
  }

  for (const [id, count] of Object.entries(byImplementation)) {
    if (unsuccessful(count) > totalTests) {
      throw new SummaryError(`${id} has more unsuccessful results than tests`);
    }
  }

  return {
    dialect: report.header.dialect,
    cases: report.cases.length,
    totalTests,
    didFailFast: report.didFailFast,
    byImplementation,
  };
}
