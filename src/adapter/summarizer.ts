import { generateBadges } from "../report/badges.js";
import { parseReport } from "../report/parse.js";
import { renderSummary } from "../report/render.js";
import { summarizeReport } from "../report/summary.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { BadgeSet } from "../types/history.js";
import type { RenderFormat, RenderShow } from "../types/report.js";

export type SummarizeResult = {
  badges: BadgeSet;
  /** Human-readable failure listing (markdown). */
  text: string;
};

/** Turns a report document into badges and human-readable text. */
export interface Summarizer {
  summarize(document: string): Promise<SummarizeResult>;
  render(document: string, format: RenderFormat, show?: RenderShow): Promise<string>;
}

/** Built-in summarizer; throws the parse or summary error of a truncated document. */
export class ReportSummarizer implements Summarizer {
  constructor(private readonly registry: SchemaRegistry) {}

  async summarize(document: string): Promise<SummarizeResult> {
    const report = await parseReport(document, this.registry);
    const summary = summarizeReport(report);
    return {
      badges: generateBadges(report, summary),
      text: renderSummary(report, summary, { format: "markdown", show: "failures" }),
    };
  }

  async render(document: string, format: RenderFormat, show: RenderShow = "failures"): Promise<string> {
    const report = await parseReport(document, this.registry);
    return renderSummary(report, summarizeReport(report), { format, show });
  }
}
