import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { createAjv, type AjvValidateFn, type AjvInstance } from "./ajv.js";

export type SchemaName = "config" | "report" | "license-summary" | "dependencies" | "scan-manifest";

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

export type SchemaValidation = { valid: boolean; errors: string | null };

export const DEFAULT_SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

/**
 * Schema registry. Loads every `*.schema.json` of a directory and compiles
 * validators on first use.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private validators = new Map<string, AjvValidateFn>();
  private readonly ajv: AjvInstance = createAjv();
  private readonly coercingAjv: AjvInstance = createAjv({ coerce: true });

  constructor(private readonly schemaDir: string) {}

  load(): this {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json")).sort();
    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      if (typeof schema !== "object" || schema === null || Array.isArray(schema)) {
        throw new Error(`Schema file is not a JSON object: ${filePath}`);
      }
      // "report.schema.json" → "report"
      const name = file.replace(/\.schema\.json$/, "");
      this.entries.set(name, { name, version: extractVersion(schema) ?? "1.0.0", filePath, schema });
    }
    return this;
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  /** `name@version`, as recorded in the scan manifest. */
  ref(name: SchemaName): string {
    const entry = this.require(name);
    return `${entry.name}@${entry.version}`;
  }

  /** With `coerce`, mismatched scalar types are converted in `data` before checking. */
  validate(name: SchemaName, data: unknown, opts: { coerce?: boolean } = {}): SchemaValidation {
    const ajv = opts.coerce ? this.coercingAjv : this.ajv;
    const validate = this.getValidator(name, ajv, opts.coerce ? "coerce" : "strict");
    const valid = validate(data);
    return { valid, errors: valid ? null : ajv.errorsText(validate.errors, { separator: "; " }) };
  }

  private require(name: string): SchemaEntry {
    const entry = this.entries.get(name);
    if (!entry) throw new Error(`Schema not found: ${name} (in ${this.schemaDir})`);
    return entry;
  }

  private getValidator(name: string, ajv: AjvInstance, mode: "coerce" | "strict"): AjvValidateFn {
    const key = `${mode}:${name}`;
    const cached = this.validators.get(key);
    if (cached) return cached;
    const validate = ajv.compile(this.require(name).schema);
    this.validators.set(key, validate);
    return validate;
  }
}

/** Version from a `$id` such as `.../report@1.0.0`. */
function extractVersion(schema: object): string | null {
  const id = "$id" in schema ? schema.$id : undefined;
  if (typeof id === "string") {
    const m = /@(\d+\.\d+\.\d+)$/.exec(id);
    if (m) return m[1];
  }
  return null;
}

export function createRegistry(schemaDir: string = DEFAULT_SCHEMA_DIR): SchemaRegistry {
  return new SchemaRegistry(schemaDir).load();
}
