/**
 * Configuration file loading
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { ControllerConfig } from "../types";
import { DEFAULT_CONFIG, deepMerge } from "./defaults";
import { resolvePaths } from "./resolver";
import { ConfigError, isRecord, validateConfig } from "./validator";

export { ConfigError } from "./validator";

export const CONFIG_FILE_NAMES = [
  "backup-controller.config.yaml",
  "backup-controller.config.yml",
  "backup-controller.config.json",
];

/**
 * Parse YAML or JSON text, picking the format from the file extension
 */
export function parseStructuredContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${(e as Error).message}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${(e as Error).message}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

function mergeWithDefaults(parsed: unknown): ControllerConfig {
  const source = parsed ?? {};
  if (!isRecord(source)) {
    throw new ConfigError("Config must be an object");
  }

  const merged = deepMerge<Record<string, unknown>>({ ...DEFAULT_CONFIG }, source);
  validateConfig(merged);
  return merged;
}

/**
 * Load and parse a config file
 */
export async function loadConfig(configPath: string): Promise<ControllerConfig> {
  const absolutePath = path.resolve(configPath);

  if (!existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const content = await readFile(absolutePath, "utf8");
  const parsed = parseStructuredContent(content, path.extname(absolutePath).toLowerCase());

  return resolvePaths(mergeWithDefaults(parsed), path.dirname(absolutePath));
}

/**
 * Defaults only, used when no config file exists
 */
export function createDefaultConfig(baseDir: string = process.cwd()): ControllerConfig {
  return resolvePaths(mergeWithDefaults({ version: "1.0" }), baseDir);
}

/**
 * Check if running inside a Docker container
 */
function isRunningInDocker(): boolean {
  return existsSync("/.dockerenv");
}

/**
 * Find a config file in the given directory or standard locations
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  const searchDirs = [startDir];

  // Only check /config when running in Docker
  if (isRunningInDocker()) {
    searchDirs.push("/config");
  }

  for (const dir of searchDirs) {
    for (const name of CONFIG_FILE_NAMES) {
      const configPath = path.join(dir, name);
      if (existsSync(configPath)) {
        return configPath;
      }
    }
  }

  return null;
}

/**
 * Find and load a config file
 */
export async function findAndLoadConfig(configPath?: string): Promise<ControllerConfig> {
  if (configPath) {
    return loadConfig(configPath);
  }

  const found = findConfigFile();
  if (!found) {
    throw new ConfigError(
      "No config file found. Create backup-controller.config.yaml or specify --config path",
    );
  }

  return loadConfig(found);
}
