/** History artifact types: the carried-forward report set. */

export type MatrixKey = string;

/** shields.io endpoint badge document. */
export type ShieldsBadge = {
  schemaVersion: 1;
  label: string;
  message: string;
  color: string;
};

/** Relative path → badge. Produced by the summarizer, never inspected by the core. */
export type BadgeSet = Record<string, ShieldsBadge>;

export type HistoryEntry = {
  /** Raw report document (JSON Lines) exactly as the executor emitted it. */
  document: string;
  badges: BadgeSet;
};

/** One generation of results, with no lookback of its own. */
export type SnapshotGeneration = {
  entries: Record<MatrixKey, HistoryEntry>;
};

/**
 * Latest results plus exactly one generation of lookback.
 * `previous` is a bare generation, so nesting deeper than one level cannot be expressed.
 */
export type HistorySnapshot = SnapshotGeneration & {
  name: string;
  previous: SnapshotGeneration | null;
};

export type Provenance = "fresh" | "carried" | "absent";

export type HistoryManifestEntry = {
  document: string;
  sha256: string;
  badges: string[];
};

/** On-disk manifest.json of one stored generation. */
export type HistoryManifest = {
  schema_version: "1";
  name: string;
  published_at: string;
  entries: Record<MatrixKey, HistoryManifestEntry>;
  has_previous: boolean;
};
