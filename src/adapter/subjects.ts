import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";
import type { SubjectsConfig } from "../types/config.js";

/** Keep ids matching any include pattern and no exclude pattern. */
export function filterSubjects(ids: string[], include: string[] = ["*"], exclude: string[] = []): string[] {
  return ids.filter(
    (id) => include.some((p) => minimatch(id, p)) && !exclude.some((p) => minimatch(id, p)),
  );
}

/**
 * Resolve the subject list: the explicit `list`, else every sub-directory of `dir`
 * (relative to `baseDir`). Sorted and de-duplicated.
 */
export function resolveSubjects(config: SubjectsConfig, baseDir: string = process.cwd()): string[] {
  let ids: string[] = [];

  if (config.list && config.list.length > 0) {
    ids = [...config.list];
  } else if (config.dir) {
    const dir = path.resolve(baseDir, config.dir);
    if (!fs.existsSync(dir)) {
      throw new Error(`Subjects directory not found: ${dir}`);
    }
    ids = fs
      .readdirSync(dir, { withFileTypes: true })
      .filter((e) => e.isDirectory() && !e.name.startsWith("."))
      .map((e) => e.name);
  }

  return [...new Set(filterSubjects(ids, config.include, config.exclude))].sort();
}
