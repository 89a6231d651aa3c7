/** Report document model: the JSON Lines stream a test-execution run emits. */

export type Seq = number | string;

export type ImplementationInfo = {
  name?: string;
  language?: string;
  dialects?: string[];
  [key: string]: unknown;
};

export type ReportHeader = {
  dialect: string;
  implementations: Record<string, ImplementationInfo>;
  started?: string;
  metadata?: Record<string, unknown>;
};

export type TestCaseTest = {
  description: string;
  instance: unknown;
  valid?: boolean;
};

export type TestCase = {
  description: string;
  schema: unknown;
  tests: TestCaseTest[];
};

export type TestOutcome =
  | { kind: "valid"; valid: boolean }
  | { kind: "skipped" }
  | { kind: "errored" };

export type CaseOutcome =
  | { kind: "results"; seq: Seq; implementation: string; results: TestOutcome[] }
  | { kind: "skipped"; seq: Seq; implementation: string; message?: string }
  | { kind: "errored"; seq: Seq; implementation: string; caught: boolean; context: Record<string, unknown> };

export type ParsedReport = {
  header: ReportHeader;
  /** Cases in seq order. */
  cases: Array<{ seq: Seq; case: TestCase }>;
  outcomes: CaseOutcome[];
  didFailFast: boolean;
};

export type Count = {
  failed: number;
  errored: number;
  skipped: number;
};

export type ReportSummary = {
  dialect: string;
  cases: number;
  totalTests: number;
  didFailFast: boolean;
  byImplementation: Record<string, Count>;
};

export type RenderFormat = "markdown" | "json" | "pretty";
export type RenderShow = "failures" | "all";
