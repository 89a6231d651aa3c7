import fs from "node:fs";
import path from "node:path";
import type { TriggerSource } from "../types/run.js";

function stamp(now: Date): string {
  return now.toISOString().slice(0, 10).replace(/-/g, "");
}

/**
 * Generate a run ID.
 * Format: {trigger}-{YYYYMMDD}-{seq}
 */
export function generateRunId(trigger: TriggerSource, runsDir: string, now: Date = new Date()): string {
  const prefix = `${trigger}-${stamp(now)}`;
  return `${prefix}-${getNextSeq(runsDir, prefix)}`;
}

/**
 * Generate a run ID and claim its directory, retrying when a concurrent process
 * took the same sequence number.
 */
export function reserveRunId(trigger: TriggerSource, runsDir: string, now: Date = new Date()): string {
  fs.mkdirSync(runsDir, { recursive: true });
  for (;;) {
    const runId = generateRunId(trigger, runsDir, now);
    try {
      fs.mkdirSync(path.join(runsDir, runId));
      return runId;
    } catch (e) {
      if (!(e instanceof Error && "code" in e && e.code === "EEXIST")) throw e;
    }
  }
}

function getNextSeq(runsDir: string, prefix: string): string {
  if (!fs.existsSync(runsDir)) return "001";

  const entries = fs.readdirSync(runsDir, { withFileTypes: true });
  let maxSeq = 0;

  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    if (!entry.name.startsWith(`${prefix}-`)) continue;
    const num = parseInt(entry.name.slice(prefix.length + 1), 10);
    if (!isNaN(num) && num > maxSeq) maxSeq = num;
  }

  return String(maxSeq + 1).padStart(3, "0");
}
