import { readFile, rm, stat } from "node:fs/promises";
import path from "node:path";
import { computeSha256FromContent } from "./checksum.js";
import { isNotFound, recoverInterruptedSwap, stagingDirFor, swapDirectory, writeFileTree } from "../fs/atomic.js";
import { isSafeRelativePath, safePath } from "../fs/security.js";
import { diag, type Diagnostic } from "../types/diagnostic.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type {
  BadgeSet,
  HistoryEntry,
  HistoryManifest,
  HistoryManifestEntry,
  HistorySnapshot,
  MatrixKey,
  ShieldsBadge,
  SnapshotGeneration,
} from "../types/history.js";

export const MATRIX_KEY_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export type FetchResult = {
  snapshot: HistorySnapshot | null;
  diagnostics: Diagnostic[];
};

/** Durable home of the latest snapshot, addressed by a stable name. Latest publish wins. */
export interface HistoryStore {
  fetch(name: string): Promise<FetchResult>;
  publish(name: string, snapshot: HistorySnapshot, opts?: { signal?: AbortSignal }): Promise<void>;
}

export class HistoryStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HistoryStoreError";
  }
}

type StoredGeneration = SnapshotGeneration & { hasPrevious: boolean };

function documentPath(key: MatrixKey): string {
  if (!MATRIX_KEY_PATTERN.test(key)) throw new HistoryStoreError(`Invalid matrix key: ${key}`);
  return `reports/${key}.jsonl`;
}

/** Files of one generation, manifest included, relative to the generation directory. */
export function generationFiles(
  name: string,
  entries: Record<MatrixKey, HistoryEntry>,
  opts: { publishedAt: string; hasPrevious: boolean },
): Map<string, string> {
  const files = new Map<string, string>();
  const manifest: HistoryManifest = {
    schema_version: "1",
    name,
    published_at: opts.publishedAt,
    entries: {},
    has_previous: opts.hasPrevious,
  };

  for (const key of Object.keys(entries).sort()) {
    const entry = entries[key];
    const doc = documentPath(key);
    files.set(doc, entry.document);

    const badgePaths = Object.keys(entry.badges).sort();
    for (const rel of badgePaths) {
      if (!isSafeRelativePath(rel)) throw new HistoryStoreError(`Unsafe badge path for ${key}: ${rel}`);
      files.set(`badges/${key}/${rel}`, JSON.stringify(entry.badges[rel]) + "\n");
    }

    manifest.entries[key] = {
      document: doc,
      sha256: computeSha256FromContent(entry.document),
      badges: badgePaths,
    };
  }

  files.set("manifest.json", JSON.stringify(manifest, null, 2) + "\n");
  return files;
}

/**
 * File-backed History Store.
 *
 * Layout of `<root>/<name>/`: `manifest.json`, `reports/<key>.jsonl`,
 * `badges/<key>/...` and `previous/` holding one older generation with the same layout.
 * Publishing writes a staging directory and swaps it in with renames, so a reader sees
 * either the old snapshot or the new one.
 */
export class FsHistoryStore implements HistoryStore {
  private readonly root: string;

  constructor(
    root: string,
    private readonly registry: SchemaRegistry,
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.root = path.resolve(root);
  }

  dirFor(name: string): string {
    return safePath(this.root, name);
  }

  async fetch(name: string): Promise<FetchResult> {
    const dir = this.dirFor(name);
    const diagnostics: Diagnostic[] = [];

    const recovery = await recoverInterruptedSwap(dir);
    if (recovery === "restored") {
      diagnostics.push(diag("warn", "HISTORY_SWAP_RECOVERED", `Restored ${name} from an interrupted publish`, { path: dir }));
    } else if (recovery === "pending") {
      diagnostics.push(
        diag("warn", "HISTORY_SWAP_PENDING", `Another publish of ${name} is mid-swap; reading it as absent`, { path: dir }),
      );
    }

    const current = await this.readGeneration(dir, diagnostics);
    if (!current) {
      if (diagnostics.every((d) => d.level !== "warn")) {
        diagnostics.push(diag("info", "HISTORY_ABSENT", `No prior history named ${name}; starting from an empty baseline`));
      }
      return { snapshot: null, diagnostics };
    }

    let previous: SnapshotGeneration | null = null;
    if (current.hasPrevious) {
      const prevDir = path.join(dir, "previous");
      const prev = await this.readGeneration(prevDir, diagnostics);
      if (prev) {
        previous = { entries: prev.entries };
        if (prev.hasPrevious || (await isDirectory(path.join(prevDir, "previous")))) {
          diagnostics.push(
            diag("warn", "HISTORY_NESTING_REPAIRED", "Ignored history nested deeper than one previous generation", {
              path: path.join(prevDir, "previous"),
            }),
          );
        }
      }
    }

    return { snapshot: { name, entries: current.entries, previous }, diagnostics };
  }

  async publish(name: string, snapshot: HistorySnapshot, opts: { signal?: AbortSignal } = {}): Promise<void> {
    const dir = this.dirFor(name);
    const publishedAt = this.clock().toISOString();

    const files = generationFiles(name, snapshot.entries, { publishedAt, hasPrevious: snapshot.previous !== null });
    if (snapshot.previous) {
      const prevFiles = generationFiles(name, snapshot.previous.entries, { publishedAt, hasPrevious: false });
      for (const [rel, content] of prevFiles) files.set(`previous/${rel}`, content);
    }

    const staging = stagingDirFor(dir);
    try {
      await writeFileTree(staging, files, { signal: opts.signal, last: ["previous/manifest.json", "manifest.json"] });
      await swapDirectory(staging, dir, opts.signal);
    } finally {
      await rm(staging, { recursive: true, force: true });
    }
  }

  private async readGeneration(dir: string, diagnostics: Diagnostic[]): Promise<StoredGeneration | null> {
    const manifestPath = path.join(dir, "manifest.json");
    let raw: string;
    try {
      raw = await readFile(manifestPath, "utf8");
    } catch (e) {
      if (isNotFound(e)) return null;
      throw e;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      diagnostics.push(diag("warn", "HISTORY_MANIFEST_INVALID", "History manifest is not valid JSON", { path: manifestPath }));
      return null;
    }

    const checked = await this.registry.check<HistoryManifest>("history-manifest", data);
    if (!checked.valid) {
      diagnostics.push(diag("warn", "HISTORY_MANIFEST_INVALID", `History manifest rejected: ${checked.errors}`, { path: manifestPath }));
      return null;
    }

    const entries: Record<MatrixKey, HistoryEntry> = {};
    for (const [key, meta] of Object.entries(checked.value.entries)) {
      const entry = await this.readEntry(dir, key, meta, diagnostics);
      if (entry) entries[key] = entry;
    }

    return { entries, hasPrevious: checked.value.has_previous };
  }

  private async readEntry(
    dir: string,
    key: MatrixKey,
    meta: HistoryManifestEntry,
    diagnostics: Diagnostic[],
  ): Promise<HistoryEntry | null> {
    const docPath = path.join(dir, meta.document);
    const corrupt = (message: string): null => {
      diagnostics.push(diag("warn", "HISTORY_ENTRY_CORRUPT", `${key}: ${message}`, { path: docPath }));
      return null;
    };

    let document: string;
    try {
      document = await readFile(docPath, "utf8");
    } catch (e) {
      if (isNotFound(e)) return corrupt("report document missing");
      throw e;
    }
    if (computeSha256FromContent(document) !== meta.sha256) return corrupt("report document checksum mismatch");

    const badges: BadgeSet = {};
    for (const rel of meta.badges) {
      if (!isSafeRelativePath(rel)) return corrupt(`unsafe badge path ${rel}`);
      let badgeData: unknown;
      try {
        badgeData = JSON.parse(await readFile(path.join(dir, "badges", key, rel), "utf8"));
      } catch (e) {
        if (isNotFound(e) || e instanceof SyntaxError) return corrupt(`badge ${rel} unreadable`);
        throw e;
      }
      const badge = await this.registry.check<ShieldsBadge>("shields-badge", badgeData);
      if (!badge.valid) return corrupt(`badge ${rel} rejected: ${badge.errors}`);
      badges[rel] = badge.value;
    }

    return { document, badges };
  }
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isDirectory();
  } catch (e) {
    if (isNotFound(e)) return false;
    throw e;
  }
}
