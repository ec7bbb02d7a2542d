/**
 * Default configuration values
 */

import type { ControllerConfig, ImageMap } from "../types";

export const DEFAULT_IMAGES: ImageMap = {
  postgres: "ghcr.io/example/postgres-backup:latest",
  mysql: "ghcr.io/example/mysql-backup:latest",
  mongodb: "ghcr.io/example/mongodb-backup:latest",
  default: "ghcr.io/example/generic-backup:latest",
};

export const DEFAULT_CONFIG: Omit<ControllerConfig, "version"> = {
  // version is intentionally NOT defaulted - it must be specified by the user
  database: {
    path: "./backup-controller.db",
  },
  controller: {
    watchInterval: 10,
    defaultRequeue: 60,
    minRequeue: 1,
    activeJobPoll: 30,
    maxConcurrentReconciles: 4,
    backoff: {
      base: 1,
      max: 300,
    },
  },
  jobs: {
    images: DEFAULT_IMAGES,
  },
};

/**
 * Deep merge two objects, with source overriding target
 */
export function deepMerge<T extends object>(target: T, source: Partial<T>): T {
  const result = { ...target };

  for (const key in source) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (
      sourceValue !== undefined &&
      typeof sourceValue === "object" &&
      sourceValue !== null &&
      !Array.isArray(sourceValue) &&
      typeof targetValue === "object" &&
      targetValue !== null &&
      !Array.isArray(targetValue)
    ) {
      (result as Record<string, unknown>)[key] = deepMerge(
        targetValue as object,
        sourceValue as object,
      );
    } else if (sourceValue !== undefined) {
      (result as Record<string, unknown>)[key] = sourceValue;
    }
  }

  return result;
}
