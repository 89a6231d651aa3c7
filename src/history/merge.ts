import { contentDigest } from "./checksum.js";
import type {
  HistoryEntry,
  HistorySnapshot,
  MatrixKey,
  Provenance,
  SnapshotGeneration,
} from "../types/history.js";
import type { CellVerdict } from "../types/run.js";

export type MergeResult = {
  snapshot: HistorySnapshot;
  provenance: Record<MatrixKey, Provenance>;
};

/**
 * Drop a snapshot's own lookback. Applied to every prior snapshot before it is
 * embedded, whatever it contains, which keeps history at one generation of depth.
 */
export function stripPrevious(snapshot: SnapshotGeneration): SnapshotGeneration {
  return { entries: { ...snapshot.entries } };
}

/**
 * Combine freshly validated results with the prior snapshot.
 *
 * For each key of `verdicts`: a valid fresh entry wins, then the prior entry, else the
 * key is absent. Keys only present in the prior snapshot are not carried. Pure: the
 * same inputs always produce the same snapshot.
 */
export function mergeHistory(
  name: string,
  prior: HistorySnapshot | null,
  verdicts: Record<MatrixKey, CellVerdict>,
): MergeResult {
  const entries: Record<MatrixKey, HistoryEntry> = {};
  const provenance: Record<MatrixKey, Provenance> = {};

  for (const key of Object.keys(verdicts).sort()) {
    const verdict = verdicts[key];
    const carried = prior?.entries[key];
    if (verdict.status === "valid") {
      entries[key] = verdict.entry;
      provenance[key] = "fresh";
    } else if (carried) {
      entries[key] = carried;
      provenance[key] = "carried";
    } else {
      provenance[key] = "absent";
    }
  }

  return {
    snapshot: {
      name,
      entries,
      previous: prior ? stripPrevious(prior) : null,
    },
    provenance,
  };
}

/** Nesting depth of a snapshot's lookback: 0 without a previous generation, else 1. */
export function historyDepth(snapshot: HistorySnapshot): 0 | 1 {
  return snapshot.previous ? 1 : 0;
}

export function snapshotDigest(snapshot: HistorySnapshot): string {
  return contentDigest(snapshot);
}
