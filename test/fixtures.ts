import type { ImplementationInfo } from "../src/types/report.js";

export const DRAFT7 = "http://json-schema.org/draft-07/schema#";
export const DRAFT2020 = "https://json-schema.org/draft/2020-12/schema";

export type FixtureCase = {
  description: string;
  tests: Array<{ description: string; instance: unknown; valid?: boolean }>;
};

export const DEFAULT_IMPLEMENTATIONS: Record<string, ImplementationInfo> = {
  "js-fast": { name: "fast", language: "js", dialects: [DRAFT2020, DRAFT7] },
  "py-slow": { name: "slow", language: "python", dialects: [DRAFT7] },
};

export const DEFAULT_CASES: FixtureCase[] = [
  {
    description: "type string",
    tests: [
      { description: "a string", instance: "foo", valid: true },
      { description: "a number", instance: 12, valid: false },
    ],
  },
  {
    description: "minimum",
    tests: [{ description: "above", instance: 5, valid: true }],
  },
];

/**
 * js-fast answers everything correctly; py-slow gets case 1 test 2 wrong
 * and skips case 2. 3 tests in total.
 */
export const DEFAULT_OUTCOMES: Array<Record<string, unknown>> = [
  { seq: 1, implementation: "js-fast", results: [{ valid: true }, { valid: false }] },
  { seq: 1, implementation: "py-slow", results: [{ valid: true }, { valid: true }] },
  { seq: 2, implementation: "js-fast", results: [{ valid: true }] },
  { seq: 2, implementation: "py-slow", skipped: true, message: "unsupported" },
];

export function reportLines(
  opts: {
    dialect?: string;
    implementations?: Record<string, ImplementationInfo>;
    cases?: FixtureCase[];
    outcomes?: Array<Record<string, unknown>>;
    footer?: boolean;
    didFailFast?: boolean;
  } = {},
): string[] {
  const dialect = opts.dialect ?? DRAFT7;
  const lines = [JSON.stringify({ dialect, implementations: opts.implementations ?? DEFAULT_IMPLEMENTATIONS })];
  (opts.cases ?? DEFAULT_CASES).forEach((c, i) => {
    lines.push(JSON.stringify({ seq: i + 1, case: { description: c.description, schema: {}, tests: c.tests } }));
  });
  for (const o of opts.outcomes ?? DEFAULT_OUTCOMES) lines.push(JSON.stringify(o));
  if (opts.footer ?? true) lines.push(JSON.stringify({ did_fail_fast: opts.didFailFast ?? false }));
  return lines;
}

export function reportDocument(opts: Parameters<typeof reportLines>[0] = {}): string {
  return reportLines(opts).join("\n") + "\n";
}

/** A one-case report whose single test description carries `tag`, so documents differ. */
export function taggedReport(tag: string, dialect: string = DRAFT7): string {
  return reportDocument({
    dialect,
    implementations: { "js-fast": DEFAULT_IMPLEMENTATIONS["js-fast"] },
    cases: [{ description: tag, tests: [{ description: tag, instance: 1, valid: true }] }],
    outcomes: [{ seq: 1, implementation: "js-fast", results: [{ valid: true }] }],
  });
}

/** A report cut off mid-line, as left behind by a crashed or starved run. */
export function truncatedReport(): string {
  const doc = reportDocument();
  return doc.slice(0, doc.length - 12);
}
