/**
 * Configuration loader for keel
 *
 * Supports hierarchical configuration with priority:
 * 1. Explicit config path
 * 2. Project config (<project>/.keel/config.json)
 * 3. Global config ($KEEL_HOME/config.json)
 * 4. Built-in defaults
 */

import fs from "node:fs/promises";
import JSON5 from "json5";
import { KeelConfigSchema, type KeelConfig } from "./schema.js";
import { ConfigError, errnoCode, toError } from "../utils/errors.js";
import { getConfigPaths, getProjectConfigPath } from "./paths.js";

/**
 * Raw, not-yet-defaulted configuration as found in a file
 */
type RawConfig = Record<string, unknown>;

/**
 * Load configuration with hierarchical fallback
 */
export async function loadConfig(
  projectPath: string,
  options: { configPath?: string } = {},
): Promise<KeelConfig> {
  let merged: RawConfig = {};

  // Global config is lenient: a broken file there must not block every project
  const globalConfig = await loadConfigFile(getConfigPaths().config, { strict: false });
  if (globalConfig) {
    merged = mergeRawConfig(merged, globalConfig);
  }

  const projectConfig = await loadConfigFile(getProjectConfigPath(projectPath));
  if (projectConfig) {
    merged = mergeRawConfig(merged, projectConfig);
  }

  if (options.configPath) {
    const explicitConfig = await loadConfigFile(options.configPath);
    if (!explicitConfig) {
      throw new ConfigError("Configuration file not found", { configPath: options.configPath });
    }
    merged = mergeRawConfig(merged, explicitConfig);
  }

  const result = KeelConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError("Invalid configuration", {
      issues: result.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
      configPath: options.configPath ?? getProjectConfigPath(projectPath),
    });
  }

  return result.data;
}

/**
 * Load a single config file, returning null if not found
 */
async function loadConfigFile(
  configPath: string,
  options: { strict?: boolean } = {},
): Promise<RawConfig | null> {
  const { strict = true } = options;

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      return null;
    }
    throw new ConfigError("Failed to load configuration", {
      configPath,
      cause: toError(error),
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(content);
  } catch (error) {
    if (!strict) return null;
    throw new ConfigError("Configuration is not valid JSON5", {
      configPath,
      cause: toError(error),
    });
  }

  if (!isRecord(parsed)) {
    if (!strict) return null;
    throw new ConfigError("Invalid configuration: expected an object", { configPath });
  }

  // Validate the file on its own so issues point at the file that has them
  const result = KeelConfigSchema.partial().safeParse(parsed);
  if (!result.success) {
    if (!strict) return null;
    throw new ConfigError("Invalid configuration", {
      issues: result.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
      configPath,
    });
  }

  // Raw values only, so defaults never override a lower-priority file during merge
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Merge two raw configs one section deep
 */
function mergeRawConfig(base: RawConfig, override: RawConfig): RawConfig {
  const result: RawConfig = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = result[key];
    result[key] = isRecord(existing) && isRecord(value) ? { ...existing, ...value } : value;
  }
  return result;
}
