import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";

export const DEFAULT_CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export const ENV_PREFIX = "CMAKE_FETCH_";

type ConfigTree = Record<string, unknown>;

function isTree(value: unknown): value is ConfigTree {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isTree(val)) {
      const current = result[key];
      result[key] = deepMerge(isTree(current) ? current : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Parsed YAML mapping, or an empty object when the file is missing or empty. */
function loadYaml(filePath: string): ConfigTree {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isTree(parsed)) {
    throw new Error(`Config file is not a mapping: ${filePath}`);
  }
  return parsed;
}

/** CMAKE_FETCH_TIMEOUT_SECONDS=60 → { timeout_seconds: 60 } */
function envOverrides(env: NodeJS.ProcessEnv): ConfigTree {
  const overrides: ConfigTree = {};
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const configKey = key.slice(ENV_PREFIX.length).toLowerCase();
    overrides[configKey] = /^\d+$/.test(value) ? parseInt(value, 10) : value;
  }
  return overrides;
}

export type LoadConfigOptions = {
  /** Overlay name: loads `<configDir>/<envName>.yaml` over base.yaml. */
  envName?: string;
  configDir?: string;
  env?: NodeJS.ProcessEnv;
  /** Highest-precedence layer, normally the CLI flags. */
  overrides?: ConfigTree;
};

/**
 * Load layered config: base.yaml ← <env>.yaml ← CMAKE_FETCH_* variables ← overrides.
 * The result is unvalidated; pass it through `validateConfig` before use.
 */
export function loadConfig(opts: LoadConfigOptions = {}): ConfigTree {
  const dir = opts.configDir ?? DEFAULT_CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (opts.envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${opts.envName}.yaml`)));
  }
  merged = deepMerge(merged, envOverrides(opts.env ?? process.env));
  if (opts.overrides) {
    merged = deepMerge(merged, opts.overrides);
  }
  return merged;
}

