/** Pipeline run types: one end-to-end execution and its per-cell results. */
import type { BadgeSet, HistoryEntry, MatrixKey, Provenance } from "./history.js";

export type TriggerSource = "release" | "call" | "manual" | "schedule";

export const TRIGGER_SOURCES: readonly TriggerSource[] = ["release", "call", "manual", "schedule"];

export type CellOutcome =
  | {
      key: MatrixKey;
      status: "succeeded";
      document: string;
      badges: BadgeSet;
      summaryText: string;
      durationMs: number;
    }
  | { key: MatrixKey; status: "execution_failed"; reason: string; timedOut: boolean; durationMs: number }
  | { key: MatrixKey; status: "summarize_failed"; reason: string; durationMs: number };

export type FailureKind = "execution" | "timeout" | "summarize" | "validation";

export type CellVerdict =
  | { status: "valid"; entry: HistoryEntry }
  | { status: "rejected"; kind: FailureKind; reason: string };

export type KeyReport = {
  key: MatrixKey;
  provenance: Provenance;
  failure?: { kind: FailureKind; reason: string };
};

export type RunStatus = "succeeded" | "partial" | "superseded" | "failed";
