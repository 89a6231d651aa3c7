import { createHash } from "node:crypto";

/** Compute SHA256 hash of a string/buffer. */
export function computeSha256FromContent(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

/** JSON with object keys sorted at every level, so equal values serialize identically. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => {
    if (typeof v !== "object" || v === null || Array.isArray(v)) return v;
    const sorted: Record<string, unknown> = {};
    for (const k of Object.keys(v).sort()) {
      sorted[k] = Object.getOwnPropertyDescriptor(v, k)?.value;
    }
    return sorted;
  });
}

export function contentDigest(value: unknown): string {
  return computeSha256FromContent(canonicalJson(value));
}
