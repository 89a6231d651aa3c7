import { dialectShortName } from "./dialects.js";
import { unsuccessful } from "./summary.js";
import type { CaseOutcome, ParsedReport, RenderFormat, RenderShow, ReportSummary } from "../types/report.js";

type Row = { implementation: string; failed: number; errored: number; skipped: number; passed: number };

function rows(summary: ReportSummary): Row[] {
  return Object.entries(summary.byImplementation)
    .map(([implementation, c]) => ({
      implementation,
      failed: c.failed,
      errored: c.errored,
      skipped: c.skipped,
      passed: summary.totalTests - unsuccessful(c),
    }))
    .sort((a, b) => b.passed - a.passed || a.implementation.localeCompare(b.implementation));
}

function cell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

function outcomeLabel(outcome: CaseOutcome | undefined, index: number, expected: boolean | undefined): string {
  if (!outcome) return "none";
  if (outcome.kind === "skipped") return "skipped";
  if (outcome.kind === "errored") return "error";
  const result = outcome.results[index];
  if (result.kind === "skipped") return "skipped";
  if (result.kind === "errored") return "error";
  if (expected === undefined) return result.valid ? "valid" : "invalid";
  return result.valid === expected ? "pass" : "fail";
}

function caseDetails(report: ParsedReport): Array<{ seq: string; description: string; tests: Array<{ description: string; results: Record<string, string> }> }> {
  const implementations = Object.keys(report.header.implementations).sort();
  const byCase = new Map<string, Map<string, CaseOutcome>>();
  for (const o of report.outcomes) {
    const key = String(o.seq);
    let m = byCase.get(key);
    if (!m) {
      m = new Map();
      byCase.set(key, m);
    }
    m.set(o.implementation, o);
  }

  return report.cases.map(({ seq, case: c }) => ({
    seq: String(seq),
    description: c.description,
    tests: c.tests.map((t, i) => {
      const results: Record<string, string> = {};
      for (const impl of implementations) {
        results[impl] = outcomeLabel(byCase.get(String(seq))?.get(impl), i, t.valid);
      }
      return { description: t.description, results };
    }),
  }));
}

function renderMarkdown(report: ParsedReport, summary: ReportSummary, show: RenderShow): string {
  const out: string[] = [];
  out.push(`# ${dialectShortName(summary.dialect)}`, "");
  out.push("| Implementation | Skipped | Errors | Failures |", "|:---|---:|---:|---:|");
  for (const r of rows(summary)) {
    out.push(`| ${cell(r.implementation)} | ${r.skipped} | ${r.errored} | ${r.failed} |`);
  }
  out.push("", `**${summary.cases} test cases ran, ${summary.totalTests} tests.**`);
  if (summary.didFailFast) out.push("", "_The run stopped early (fail fast)._");

  if (show === "all") {
    const implementations = Object.keys(report.header.implementations).sort();
    out.push("", "## Cases");
    for (const c of caseDetails(report)) {
      out.push("", `### ${cell(c.description)} (seq ${c.seq})`, "");
      out.push(`| Test | ${implementations.map(cell).join(" | ")} |`);
      out.push(`|:---|${implementations.map(() => ":---").join("|")}|`);
      for (const t of c.tests) {
        out.push(`| ${cell(t.description)} | ${implementations.map((i) => t.results[i]).join(" | ")} |`);
      }
    }
  }

  return out.join("\n") + "\n";
}

function renderPretty(summary: ReportSummary): string {
  const out = [`${dialectShortName(summary.dialect)}: ${summary.cases} cases, ${summary.totalTests} tests`];
  for (const r of rows(summary)) {
    out.push(
      `  ${r.implementation}: ${r.failed} failed, ${r.errored} errored, ${r.skipped} skipped (${r.passed}/${summary.totalTests} passed)`,
    );
  }
  if (summary.didFailFast) out.push("  (stopped early: fail fast)");
  return out.join("\n") + "\n";
}

/** Render a summarized report for a step summary or a terminal. */
export function renderSummary(
  report: ParsedReport,
  summary: ReportSummary,
  opts: { format: RenderFormat; show: RenderShow },
): string {
  switch (opts.format) {
    case "markdown":
      return renderMarkdown(report, summary, opts.show);
    case "pretty":
      return renderPretty(summary);
    case "json": {
      const body: Record<string, unknown> = {
        dialect: summary.dialect,
        cases: summary.cases,
        total_tests: summary.totalTests,
        did_fail_fast: summary.didFailFast,
        implementations: rows(summary),
      };
      if (opts.show === "all") body.case_results = caseDetails(report);
      return JSON.stringify(body, null, 2) + "\n";
    }
  }
}
