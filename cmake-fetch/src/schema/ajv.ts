import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn<T = unknown> = ((data: unknown) => data is T) & { errors?: unknown };

export type AjvInstance = {
  compile: <T = unknown>(schema: unknown) => AjvValidateFn<T>;
  errorsText: (errors: unknown, opts?: { separator?: string; dataVar?: string }) => string;
};

let shared: AjvInstance | null = null;

/** Draft 2020-12 validator with the `uri` format registered. One instance per process. */
export function loadAjv(): AjvInstance {
  if (shared) return shared;

  // ajv and ajv-formats are CommonJS; under NodeNext their default export types describe the module object.
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance, formats: string[]) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv, ["uri"]);

  shared = ajv;
  return ajv;
}

/** Human-readable summary of the last validation failure. */
export function describeErrors(ajv: AjvInstance, validate: AjvValidateFn, dataVar = "data"): string {
  return ajv.errorsText(validate.errors, { separator: "; ", dataVar });
}
