import path from "node:path";
import { FsHistoryStore } from "../history/store.js";
import { snapshotDigest } from "../history/merge.js";
import { createRegistry } from "../schema/registry.js";
import type { ReportConfig } from "../types/config.js";
import type { Diagnostic } from "../types/diagnostic.js";

export type HistoryView = {
  name: string;
  root: string;
  keys: string[];
  previous_keys: string[] | null;
  digest: string | null;
};

export type HistoryResult = { ok: true; view: HistoryView; diagnostics: Diagnostic[] } | { ok: false; error: string };

/** Show the stored snapshot and its previous generation. */
export async function showHistory(opts: { config: ReportConfig; baseDir?: string }): Promise<HistoryResult> {
  const root = path.resolve(opts.baseDir ?? process.cwd(), opts.config.history.root);
  const name = opts.config.history.name;
  const store = new FsHistoryStore(root, await createRegistry());

  try {
    const { snapshot, diagnostics } = await store.fetch(name);
    return {
      ok: true,
      diagnostics,
      view: {
        name,
        root,
        keys: snapshot ? Object.keys(snapshot.entries).sort() : [],
        previous_keys: snapshot?.previous ? Object.keys(snapshot.previous.entries).sort() : null,
        digest: snapshot ? snapshotDigest(snapshot) : null,
      },
    };
  } catch (e) {
    return { ok: false, error: `Failed to read history ${name}: ${e instanceof Error ? e.message : String(e)}` };
  }
}
