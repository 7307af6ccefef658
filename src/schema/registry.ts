import fs from "node:fs";
import path from "node:path";
import { loadAjv, type AjvInstance } from "./ajv.js";
import { DEFAULT_SCHEMA_DIR } from "../paths.js";
import type { DeployConfig } from "../types/config.js";
import type { DeploymentRecipe } from "../types/recipe.js";

/** Schema name → the type a document has once it validates. */
export type SchemaTypes = {
  config: DeployConfig;
  recipe: DeploymentRecipe;
};

export type SchemaName = keyof SchemaTypes;

export type SchemaCheck<T> = { valid: true; value: T } | { valid: false; errors: string };

/**
 * Schema registry — reads `<name>.schema.json` from a directory on first use.
 * Ajv caches the compiled validator per schema object.
 */
export class SchemaRegistry {
  private readonly ajv: AjvInstance = loadAjv();
  private readonly schemas = new Map<SchemaName, unknown>();

  constructor(private readonly schemaDir: string = DEFAULT_SCHEMA_DIR) {}

  private schema(name: SchemaName): unknown {
    if (this.schemas.has(name)) return this.schemas.get(name);

    const filePath = path.join(this.schemaDir, `${name}.schema.json`);
    if (!fs.existsSync(filePath)) {
      throw new Error(`Schema not found: ${filePath}`);
    }
    const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
    this.schemas.set(name, schema);
    return schema;
  }

  /** Validate data against a named schema, narrowing it on success. */
  check<K extends SchemaName>(name: K, data: unknown): SchemaCheck<SchemaTypes[K]> {
    const validate = this.ajv.compile<SchemaTypes[K]>(this.schema(name));
    if (validate(data)) return { valid: true, value: data };
    return { valid: false, errors: this.ajv.errorsText(validate.errors) };
  }
}
