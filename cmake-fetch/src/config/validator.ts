import { loadAjv, describeErrors, type AjvValidateFn } from "../schema/ajv.js";
import type { FetchConfig } from "../types/config.js";

const CONFIG_SCHEMA = {
  type: "object",
  required: [
    "schema_version",
    "product",
    "repo",
    "timeout_seconds",
    "manifest_schema",
    "trusted_keys_dir",
    "gpg_binary",
    "format",
    "channels",
  ],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    product: { type: "string", pattern: "^[A-Za-z0-9._-]+$" },
    repo: { type: "string", minLength: 1 },
    timeout_seconds: { type: "integer", minimum: 1 },
    manifest_schema: { type: "integer", minimum: 1 },
    trusted_keys_dir: { type: "string", minLength: 1 },
    gpg_binary: { type: "string", minLength: 1 },
    format: { type: "string", enum: ["human", "jsonl"] },
    github_token: { type: "string" },
    channels: {
      type: "object",
      required: ["github", "kitware"],
      properties: {
        github: {
          type: "object",
          required: ["releases_api", "download_base"],
          properties: {
            releases_api: { type: "string", format: "uri" },
            download_base: { type: "string", minLength: 1 },
          },
        },
        kitware: {
          type: "object",
          required: ["download_base", "latest_base"],
          properties: {
            download_base: { type: "string", minLength: 1 },
            latest_base: { type: "string", format: "uri" },
          },
        },
      },
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: FetchConfig; errors: null }
  | { valid: false; errors: string };

let compiled: AjvValidateFn<FetchConfig> | null = null;

/** Validate a merged config tree against the config schema. */
export function validateConfig(raw: unknown): ConfigValidationResult {
  const ajv = loadAjv();
  const validate = compiled ?? (compiled = ajv.compile<FetchConfig>(CONFIG_SCHEMA));
  if (validate(raw)) {
    return { valid: true, config: raw, errors: null };
  }
  return { valid: false, errors: describeErrors(ajv, validate, "config") };
}
