import type { SchemaRegistry } from "../schema/registry.js";
import type {
  CaseOutcome,
  ParsedReport,
  ReportHeader,
  Seq,
  TestCase,
  TestCaseTest,
  TestOutcome,
} from "../types/report.js";

export class ReportParseError extends Error {
  constructor(message: string, readonly line?: number) {
    super(line === undefined ? message : `line ${line}: ${message}`);
    this.name = "ReportParseError";
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSeq(value: unknown): value is Seq {
  return typeof value === "number" || typeof value === "string";
}

function parseTest(raw: unknown, line: number): TestCaseTest {
  if (!isRecord(raw)) throw new ReportParseError("case test is not an object", line);
  let valid: boolean | undefined;
  if (typeof raw.valid === "boolean") {
    valid = raw.valid;
  } else if (raw.valid !== undefined) {
    throw new ReportParseError("case test `valid` is not a boolean", line);
  }
  return {
    description: typeof raw.description === "string" ? raw.description : "",
    instance: raw.instance,
    valid,
  };
}

function parseCase(raw: unknown, line: number): TestCase {
  if (!isRecord(raw)) throw new ReportParseError("`case` is not an object", line);
  if (!Array.isArray(raw.tests)) throw new ReportParseError("case has no `tests` array", line);
  return {
    description: typeof raw.description === "string" ? raw.description : "",
    schema: raw.schema,
    tests: raw.tests.map((t) => parseTest(t, line)),
  };
}

function parseTestOutcome(raw: unknown, line: number): TestOutcome {
  if (!isRecord(raw)) throw new ReportParseError("result entry is not an object", line);
  if (raw.skipped === true) return { kind: "skipped" };
  if (raw.errored === true) return { kind: "errored" };
  if (typeof raw.valid !== "boolean") throw new ReportParseError("result entry has no boolean `valid`", line);
  return { kind: "valid", valid: raw.valid };
}

function requireSeqAndImplementation(obj: Record<string, unknown>, line: number): { seq: Seq; implementation: string } {
  if (!isSeq(obj.seq)) throw new ReportParseError("missing `seq`", line);
  if (typeof obj.implementation !== "string") throw new ReportParseError("missing `implementation`", line);
  return { seq: obj.seq, implementation: obj.implementation };
}

/**
 * Parse a report document (JSON Lines) into its structural shape.
 *
 * The first line is the run header, then case lines and per-implementation outcomes,
 * closed by a `did_fail_fast` line. A document without that last line came from a run
 * that never finished and is rejected.
 *
 * @throws ReportParseError on any structural problem
 */
export async function parseReport(text: string, registry: SchemaRegistry): Promise<ParsedReport> {
  const lines = text.split("\n");

  let header: ReportHeader | null = null;
  const cases = new Map<string, { seq: Seq; case: TestCase }>();
  const outcomes: CaseOutcome[] = [];
  const seen = new Set<string>();
  let didFailFast: boolean | null = null;

  for (let i = 0; i < lines.length; i++) {
    const lineNo = i + 1;
    const raw = lines[i].trim();
    if (raw.length === 0) continue;

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      throw new ReportParseError("not valid JSON (truncated output?)", lineNo);
    }
    if (!isRecord(data)) throw new ReportParseError("not a JSON object", lineNo);

    if (didFailFast !== null) {
      throw new ReportParseError("content after the completion marker", lineNo);
    }

    if (header === null) {
      const res = await registry.check<ReportHeader>("report-header", data);
      if (!res.valid) throw new ReportParseError(`invalid header: ${res.errors}`, lineNo);
      header = res.value;
      continue;
    }

    if ("case" in data && "seq" in data) {
      if (!isSeq(data.seq)) throw new ReportParseError("case `seq` is not a number or string", lineNo);
      const id = String(data.seq);
      if (cases.has(id)) throw new ReportParseError(`duplicate case: ${id}`, lineNo);
      cases.set(id, { seq: data.seq, case: parseCase(data.case, lineNo) });
      continue;
    }

    if ("did_fail_fast" in data) {
      if (typeof data.did_fail_fast !== "boolean") {
        throw new ReportParseError("`did_fail_fast` is not a boolean", lineNo);
      }
      didFailFast = data.did_fail_fast;
      continue;
    }

    const { seq, implementation } = requireSeqAndImplementation(data, lineNo);
    const known = cases.get(String(seq));
    if (!known) throw new ReportParseError(`result for unknown case: ${String(seq)}`, lineNo);
    if (!(implementation in header.implementations)) {
      throw new ReportParseError(`result from an implementation missing in the header: ${implementation}`, lineNo);
    }
    const resultId = `${String(seq)}\u0000${implementation}`;
    if (seen.has(resultId)) {
      throw new ReportParseError(`duplicate result for case ${String(seq)} from ${implementation}`, lineNo);
    }
    seen.add(resultId);

    if ("caught" in data) {
      outcomes.push({
        kind: "errored",
        seq,
        implementation,
        caught: data.caught === true,
        context: isRecord(data.context) ? data.context : {},
      });
    } else if (data.skipped === true) {
      outcomes.push({
        kind: "skipped",
        seq,
        implementation,
        message: typeof data.message === "string" ? data.message : undefined,
      });
    } else {
      if (!Array.isArray(data.results)) throw new ReportParseError("result has no `results` array", lineNo);
      const results = data.results.map((r) => parseTestOutcome(r, lineNo));
      if (results.length !== known.case.tests.length) {
        throw new ReportParseError(
          `case ${String(seq)} has ${known.case.tests.length} tests but ${implementation} returned ${results.length} results`,
          lineNo,
        );
      }
      outcomes.push({ kind: "results", seq, implementation, results });
    }
  }

  if (header === null) throw new ReportParseError("empty report");
  if (cases.size === 0) throw new ReportParseError("no test cases ran");
  if (didFailFast === null) throw new ReportParseError("missing completion marker (run did not finish)");

  return {
    header,
    cases: [...cases.values()],
    outcomes,
    didFailFast,
  };
}
