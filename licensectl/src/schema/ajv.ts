import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn = ((data: unknown) => boolean) & { errors?: unknown };

export type AjvInstance = {
  compile: (schema: unknown) => AjvValidateFn;
  errorsText: (errors: unknown, opts?: { separator?: string }) => string;
};

/**
 * Draft 2020-12 validator with `date-time` and friends. With `coerce`,
 * string values coming from environment overrides may satisfy boolean and
 * array fields; coercion rewrites the validated data in place, so only the
 * config is validated that way.
 */
export function createAjv(opts: { coerce?: boolean } = {}): AjvInstance {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true, coerceTypes: opts.coerce ? "array" : false });
  add(ajv);

  return ajv;
}
