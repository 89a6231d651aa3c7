import fs from "node:fs";
import { ReportSummarizer } from "../adapter/summarizer.js";
import { createRegistry } from "../schema/registry.js";
import type { RenderFormat, RenderShow } from "../types/report.js";

export type SummaryResult = { ok: true; text: string } | { ok: false; error: string };

const FORMATS: readonly RenderFormat[] = ["markdown", "json", "pretty"];
const SHOWS: readonly RenderShow[] = ["failures", "all"];

export function parseRenderFormat(value: string): RenderFormat | null {
  return FORMATS.find((f) => f === value) ?? null;
}

export function parseRenderShow(value: string): RenderShow | null {
  return SHOWS.find((s) => s === value) ?? null;
}

/** Render one report document, read from `file` or `-` for stdin. */
export async function summary(opts: {
  file: string;
  format: RenderFormat;
  show: RenderShow;
  schemaDir?: string;
}): Promise<SummaryResult> {
  let document: string;
  try {
    document = fs.readFileSync(opts.file === "-" ? 0 : opts.file, "utf8");
  } catch (e) {
    return { ok: false, error: `Failed to read ${opts.file}: ${e instanceof Error ? e.message : String(e)}` };
  }

  const summarizer = new ReportSummarizer(await createRegistry(opts.schemaDir));
  try {
    return { ok: true, text: await summarizer.render(document, opts.format, opts.show) };
  } catch (e) {
    return { ok: false, error: `Cannot summarize ${opts.file}: ${e instanceof Error ? e.message : String(e)}` };
  }
}
