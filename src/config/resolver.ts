/**
 * Configuration path resolution
 */

import * as path from "node:path";
import type { ControllerConfig } from "../types";

export const IN_MEMORY_DATABASE = ":memory:";

/**
 * Resolve relative paths in config against the directory of the config file
 */
export function resolvePaths(config: ControllerConfig, baseDir: string): ControllerConfig {
  const dbPath = config.database.path;
  if (dbPath === IN_MEMORY_DATABASE || path.isAbsolute(dbPath)) {
    return config;
  }

  return {
    ...config,
    database: { ...config.database, path: path.resolve(baseDir, dbPath) },
  };
}
