import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadAjv, conforms, type AjvValidateFn, type AjvInstance } from "./ajv.js";

export type SchemaCheck<T> = { valid: true; value: T } | { valid: false; errors: string };

export const DEFAULT_SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

const SCHEMA_SUFFIX = ".schema.json";

/**
 * JSON Schemas for the documents reportctl reads back from disk (history manifests,
 * badges, report headers), keyed by file name without `.schema.json`.
 */
export class SchemaRegistry {
  private readonly schemas = new Map<string, unknown>();
  private readonly compiled = new Map<string, AjvValidateFn>();
  private ajv: AjvInstance | null = null;

  constructor(private readonly schemaDir: string) {}

  async load(): Promise<void> {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    for (const file of fs.readdirSync(this.schemaDir)) {
      if (!file.endsWith(SCHEMA_SUFFIX)) continue;
      const schema: unknown = JSON.parse(fs.readFileSync(path.join(this.schemaDir, file), "utf8"));
      this.schemas.set(file.slice(0, -SCHEMA_SUFFIX.length), schema);
    }
    this.ajv = await loadAjv();
  }

  /** Validate and narrow: the caller names the type the schema describes. */
  async check<T>(name: string, data: unknown): Promise<SchemaCheck<T>> {
    const ajv = this.ajv ?? (this.ajv = await loadAjv());
    const validate = this.validatorFor(ajv, name);
    if (conforms<T>(validate, data)) return { valid: true, value: data };
    return { valid: false, errors: ajv.errorsText(validate.errors) };
  }

  private validatorFor(ajv: AjvInstance, name: string): AjvValidateFn {
    const cached = this.compiled.get(name);
    if (cached) return cached;

    if (!this.schemas.has(name)) throw new Error(`Schema not found: ${name}`);
    const validate = ajv.compile(this.schemas.get(name));
    this.compiled.set(name, validate);
    return validate;
  }
}

/** Create and load a registry, from the bundled schemas unless `schemaDir` is given. */
export async function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  const registry = new SchemaRegistry(schemaDir ?? DEFAULT_SCHEMA_DIR);
  await registry.load();
  return registry;
}
