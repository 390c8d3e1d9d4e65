// ─── Bridge Config Loader ────────────────────────────────────────────────────
//
// Resolution order, later wins:
//   1. schema defaults
//   2. JSON file (--config <path> or FL_BRIDGE_CONFIG)
//   3. FL_BRIDGE_<KEY> environment variables, e.g. FL_BRIDGE_MAX_CHUNK_BYTES
// ─────────────────────────────────────────────────────────────────────────────

import { readFileSync, existsSync } from "node:fs";
import { ValidationError, errorMessage } from "../errors.js";
import { CONFIG_KEYS, parseBridgeConfig, type BridgeConfig } from "./schema.js";

export const ENV_PREFIX = "FL_BRIDGE_";
export const CONFIG_PATH_ENV = `${ENV_PREFIX}CONFIG`;

const STRING_KEYS = new Set(["midi_port_name", "feedback_port_name", "log_level"]);

export interface LoadConfigOptions {
  /** Explicit config file path (takes precedence over FL_BRIDGE_CONFIG). */
  path?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load and validate the bridge config.
 * @throws ValidationError listing every offending field.
 */
export function loadBridgeConfig(options: LoadConfigOptions = {}): BridgeConfig {
  const env = options.env ?? process.env;
  const path = options.path ?? env[CONFIG_PATH_ENV];

  return parseBridgeConfig({
    ...(path ? readConfigFile(path) : {}),
    ...envOverrides(env),
  });
}

function readConfigFile(path: string): Record<string, unknown> {
  if (!existsSync(path)) {
    throw new ValidationError(`Config not found: ${path}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new ValidationError(`Config ${path} is not valid JSON: ${errorMessage(err)}`);
  }
  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
    throw new ValidationError(`Config ${path} must contain a JSON object`);
  }
  return { ...raw };
}

/** Collect FL_BRIDGE_* variables for known keys. Numeric keys are parsed. */
export function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  for (const key of CONFIG_KEYS) {
    const value = env[ENV_PREFIX + key.toUpperCase()];
    if (value === undefined || value === "") continue;
    overrides[key] = STRING_KEYS.has(key) ? value : Number(value);
  }
  return overrides;
}
