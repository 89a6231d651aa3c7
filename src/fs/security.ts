import { isAbsolute, resolve, sep } from "node:path";

export const MAX_LOG_MESSAGE_LENGTH = 10000;

/**
 * Reject a path component that could escape its parent directory.
 * @throws Error if the component is empty or contains a separator or `..`
 */
export function sanitizePathComponent(component: string): string {
  if (!component || component.trim().length === 0) {
    throw new Error("Path component cannot be empty");
  }

  if (
    component.includes("..") ||
    component.includes("/") ||
    component.includes("\\") ||
    component.includes("\0")
  ) {
    throw new Error(`Invalid path component: ${component}`);
  }

  return component.trim();
}

/**
 * Join `components` onto `base`, ensuring the result stays within `base`.
 * @throws Error on traversal or a relative base
 */
export function safePath(base: string, ...components: string[]): string {
  if (!isAbsolute(base)) {
    throw new Error(`Base path must be absolute: ${base}`);
  }

  const sanitized = components.map(sanitizePathComponent);
  const fullPath = resolve(base, ...sanitized);
  const normalizedBase = resolve(base);

  if (!fullPath.startsWith(normalizedBase + sep) && fullPath !== normalizedBase) {
    throw new Error(`Path traversal detected: ${fullPath}`);
  }

  return fullPath;
}

/** Check a slash-separated relative path segment by segment. */
export function isSafeRelativePath(rel: string): boolean {
  if (rel.length === 0 || isAbsolute(rel)) return false;
  return rel.split("/").every((part) => {
    try {
      sanitizePathComponent(part);
      return part === part.trim();
    } catch {
      return false;
    }
  });
}

/** Turn an arbitrary label into something usable as one path component. */
export function slugPathComponent(label: string): string {
  const slug = label.replace(/[^A-Za-z0-9._-]+/g, "-").replace(/^[-.]+/, "").replace(/\.{2,}/g, ".");
  return slug.length > 0 ? slug : "unnamed";
}

export function sanitizeLogMessage(s: string): string {
  if (!s) return "";
  return s.replace(/\r?\n/g, "\\n").replace(/\t/g, "\\t").slice(0, MAX_LOG_MESSAGE_LENGTH);
}

/** Redact credentials and home directories from subprocess output before it is logged. */
export function redactSensitiveInfo(s: string): string {
  if (!s) return "";

  let result = s;
  result = result.replace(/password[=:]\s*\S+/gi, "password=***");
  result = result.replace(/token[=:]\s*\S+/gi, "token=***");
  result = result.replace(/api[_-]?key[=:]\s*\S+/gi, "api_key=***");
  result = result.replace(/secret[=:]\s*\S+/gi, "secret=***");
  result = result.replace(/\/home\/[^/\s]+/g, "/home/***");
  result = result.replace(/\/Users\/[^/\s]+/g, "/Users/***");

  return result;
}

/** Environment for the test-execution tool: a fixed allow-list plus `passEnv`. */
export function sanitizeEnv(env: NodeJS.ProcessEnv, passEnv: string[] = []): NodeJS.ProcessEnv {
  const safe: NodeJS.ProcessEnv = {};
  for (const key of ["PATH", "HOME", "USER", "LANG", "LC_ALL", "TERM", ...passEnv]) {
    const value = env[key];
    if (value !== undefined) safe[key] = value;
  }
  return safe;
}
