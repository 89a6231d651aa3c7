import fs from "node:fs";
import path from "node:path";
import { readRunRecord, statePathFor, type RunRecord } from "../core/orchestrator.js";

export type StatusResult = { ok: true; state: RunRecord } | { ok: false; error: string };

export type RunListing = { id: string; status: string; stage: string; updated_at: string };

/**
 * Read the run record for a given ID.
 */
export function status(opts: { runsDir: string; runId: string }): StatusResult {
  const statePath = statePathFor(opts.runsDir, opts.runId);

  if (!fs.existsSync(statePath)) {
    return { ok: false, error: `No run found: ${opts.runId}` };
  }

  try {
    const state = readRunRecord(statePath);
    if (!state) return { ok: false, error: `Unreadable run record: ${statePath}` };
    return { ok: true, state };
  } catch (e) {
    return { ok: false, error: `Failed to read state: ${e instanceof Error ? e.message : String(e)}` };
  }
}

/**
 * List all runs, most recently updated first.
 */
export function listRuns(runsDir: string): RunListing[] {
  if (!fs.existsSync(runsDir)) return [];

  const results: RunListing[] = [];
  for (const entry of fs.readdirSync(runsDir, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue;
    const statePath = path.join(runsDir, entry.name, "state.json");
    if (!fs.existsSync(statePath)) continue;

    const state = readRunRecord(statePath);
    if (!state) {
      results.push({ id: entry.name, status: "corrupted", stage: "", updated_at: "" });
      continue;
    }
    results.push({
      id: entry.name,
      status: state.status ?? "running",
      stage: state.current_stage,
      updated_at: state.updated_at,
    });
  }

  return results.sort((a, b) => b.updated_at.localeCompare(a.updated_at));
}
