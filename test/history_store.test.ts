import { describe, expect, it, beforeAll, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { FsHistoryStore, generationFiles } from "../src/history/store.js";
import { createRegistry, type SchemaRegistry } from "../src/schema/registry.js";
import type { HistoryEntry, HistorySnapshot } from "../src/types/history.js";

function entry(document: string): HistoryEntry {
  return {
    document,
    badges: { "js-fast/supported_versions.json": { schemaVersion: 1, label: "JSON Schema Versions", message: "7", color: "lightgreen" } },
  };
}

const FIXED = new Date("2026-02-09T10:00:00.000Z");

describe("history store", () => {
  let registry: SchemaRegistry;
  let tmpDir: string;
  let store: FsHistoryStore;

  beforeAll(async () => {
    registry = await createRegistry();
  });

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "reportctl-history-"));
    store = new FsHistoryStore(tmpDir, registry, () => FIXED);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const snapshot: HistorySnapshot = {
    name: "report",
    entries: { draft7: entry("doc-7\n"), draft4: entry("doc-4\n") },
    previous: { entries: { draft7: entry("doc-7-old\n") } },
  };

  it("reports absence on first fetch", async () => {
    const res = await store.fetch("report");
    expect(res.snapshot).toBeNull();
    expect(res.diagnostics.map((d) => [d.level, d.code])).toEqual([["info", "HISTORY_ABSENT"]]);
  });

  it("round-trips a snapshot with its previous generation", async () => {
    await store.publish("report", snapshot);
    const res = await store.fetch("report");
    expect(res.diagnostics).toEqual([]);
    expect(res.snapshot).toEqual(snapshot);
  });

  it("lays out manifest, reports, badges and previous/", async () => {
    await store.publish("report", snapshot);
    const dir = store.dirFor("report");
    expect(fs.readFileSync(path.join(dir, "reports", "draft7.jsonl"), "utf8")).toBe("doc-7\n");
    expect(fs.existsSync(path.join(dir, "badges", "draft7", "js-fast", "supported_versions.json"))).toBe(true);
    expect(fs.readFileSync(path.join(dir, "previous", "reports", "draft7.jsonl"), "utf8")).toBe("doc-7-old\n");
    expect(fs.existsSync(path.join(dir, "previous", "previous"))).toBe(false);

    const manifest: unknown = JSON.parse(fs.readFileSync(path.join(dir, "manifest.json"), "utf8"));
    expect(manifest).toMatchObject({ schema_version: "1", name: "report", published_at: FIXED.toISOString(), has_previous: true });
  });

  it("replaces the previous publish and leaves no staging directories", async () => {
    await store.publish("report", snapshot);
    const next: HistorySnapshot = { name: "report", entries: { draft7: entry("doc-7-new\n") }, previous: { entries: snapshot.entries } };
    await store.publish("report", next);

    expect((await store.fetch("report")).snapshot).toEqual(next);
    expect(fs.readdirSync(tmpDir)).toEqual(["report"]);
  });

  it("keeps the old snapshot when the publish is aborted before the swap", async () => {
    await store.publish("report", snapshot);
    const controller = new AbortController();
    controller.abort(new Error("superseded"));

    await expect(
      store.publish("report", { name: "report", entries: { draft7: entry("never\n") }, previous: null }, { signal: controller.signal }),
    ).rejects.toThrow("superseded");
    expect((await store.fetch("report")).snapshot).toEqual(snapshot);
    expect(fs.readdirSync(tmpDir)).toEqual(["report"]);
  });

  it("drops an entry whose document no longer matches its checksum", async () => {
    await store.publish("report", snapshot);
    fs.writeFileSync(path.join(store.dirFor("report"), "reports", "draft4.jsonl"), "tampered\n");

    const res = await store.fetch("report");
    expect(Object.keys(res.snapshot?.entries ?? {})).toEqual(["draft7"]);
    expect(res.diagnostics.map((d) => d.code)).toEqual(["HISTORY_ENTRY_CORRUPT"]);
    expect(res.diagnostics[0].message).toBe("draft4: report document checksum mismatch");
  });

  it("treats an unreadable manifest as absent history with a warning", async () => {
    await store.publish("report", snapshot);
    fs.writeFileSync(path.join(store.dirFor("report"), "manifest.json"), "{ nope");

    const res = await store.fetch("report");
    expect(res.snapshot).toBeNull();
    expect(res.diagnostics.map((d) => [d.level, d.code])).toEqual([["warn", "HISTORY_MANIFEST_INVALID"]]);
  });

  it("ignores and reports history nested below previous/", async () => {
    await store.publish("report", snapshot);
    const dir = store.dirFor("report");
    const deep = path.join(dir, "previous", "previous");
    for (const [rel, content] of generationFiles("report", { draft7: entry("ancient\n") }, { publishedAt: FIXED.toISOString(), hasPrevious: false })) {
      fs.mkdirSync(path.dirname(path.join(deep, rel)), { recursive: true });
      fs.writeFileSync(path.join(deep, rel), content);
    }

    const res = await store.fetch("report");
    expect(res.snapshot).toEqual(snapshot);
    expect(res.diagnostics.map((d) => d.code)).toEqual(["HISTORY_NESTING_REPAIRED"]);
  });

  it("restores a snapshot left behind by an interrupted swap", async () => {
    await store.publish("report", snapshot);
    fs.renameSync(store.dirFor("report"), path.join(tmpDir, ".retired-report-1-2-abc"));

    const res = await store.fetch("report");
    expect(res.snapshot).toEqual(snapshot);
    expect(res.diagnostics.map((d) => d.code)).toEqual(["HISTORY_SWAP_RECOVERED"]);
    expect(fs.existsSync(store.dirFor("report"))).toBe(true);
  });

  it("leaves a freshly retired copy to the publish that parked it", async () => {
    await store.publish("report", snapshot);
    const retired = path.join(tmpDir, `.retired-report-1-${Date.now()}-abc`);
    fs.renameSync(store.dirFor("report"), retired);

    const res = await store.fetch("report");
    expect(res.snapshot).toBeNull();
    expect(res.diagnostics.map((d) => d.code)).toEqual(["HISTORY_SWAP_PENDING"]);
    expect(fs.existsSync(retired)).toBe(true);
    expect(fs.existsSync(store.dirFor("report"))).toBe(false);
  });

  it("rejects names that escape the store root", () => {
    expect(() => store.dirFor("../outside")).toThrow();
  });

  it("rejects matrix keys that are not path-safe", () => {
    expect(() =>
      generationFiles("report", { "../x": entry("doc\n") }, { publishedAt: FIXED.toISOString(), hasPrevious: false }),
    ).toThrow("Invalid matrix key: ../x");
  });
});
