import { parseReport, ReportParseError } from "./parse.js";
import { summarizeReport, SummaryError } from "./summary.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { ParsedReport, ReportSummary } from "../types/report.js";

export type ReportValidation =
  | { valid: true; report: ParsedReport; summary: ReportSummary }
  | { valid: false; reason: string };

/**
 * A document is valid when it parses into the expected shape and its summary can be
 * computed. Anything else (truncated output, a crashed or starved run) is rejected
 * before it can reach history.
 */
export async function validateReport(document: string, registry: SchemaRegistry): Promise<ReportValidation> {
  try {
    const report = await parseReport(document, registry);
    const summary = summarizeReport(report);
    return { valid: true, report, summary };
  } catch (e) {
    if (e instanceof ReportParseError || e instanceof SummaryError) {
      return { valid: false, reason: e.message };
    }
    throw e;
  }
}
