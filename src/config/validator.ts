/**
 * Configuration validation
 */

import type { ControllerConfig } from "../types";
import { KNOWN_DATABASE_TYPES } from "../types";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

type Validator = (config: Record<string, unknown>) => void;

function requireSection(c: Record<string, unknown>, name: string): Record<string, unknown> {
  const section = c[name];
  if (!isRecord(section)) {
    throw new ConfigError(`Config must have a '${name}' section`);
  }
  return section;
}

function requirePositive(section: Record<string, unknown>, path: string, key: string): void {
  const value = section[key];
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${path}.${key} must be a positive number`);
  }
}

function requireStringMap(value: unknown, path: string): void {
  if (!isRecord(value)) {
    throw new ConfigError(`${path} must be a map of strings`);
  }
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== "string") {
      throw new ConfigError(`${path}.${key} must be a string`);
    }
  }
}

const validators: Record<string, Validator> = {
  version: (c) => {
    if (!c.version || typeof c.version !== "string") {
      throw new ConfigError("Config must have a 'version' field");
    }
  },

  database: (c) => {
    const db = requireSection(c, "database");
    if (!db.path || typeof db.path !== "string") {
      throw new ConfigError("database.path must be a string");
    }
  },

  controller: (c) => {
    const controller = requireSection(c, "controller");
    for (const key of ["watchInterval", "defaultRequeue", "minRequeue", "activeJobPoll"]) {
      requirePositive(controller, "controller", key);
    }

    const concurrency = controller.maxConcurrentReconciles;
    if (typeof concurrency !== "number" || !Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigError("controller.maxConcurrentReconciles must be a positive integer");
    }

    const backoff = controller.backoff;
    if (!isRecord(backoff)) {
      throw new ConfigError("controller.backoff must be an object");
    }
    requirePositive(backoff, "controller.backoff", "base");
    requirePositive(backoff, "controller.backoff", "max");
    if (typeof backoff.base === "number" && typeof backoff.max === "number" && backoff.max < backoff.base) {
      throw new ConfigError("controller.backoff.max must not be smaller than controller.backoff.base");
    }

    if (controller.timezone !== undefined && typeof controller.timezone !== "string") {
      throw new ConfigError("controller.timezone must be a string");
    }
  },

  jobs: (c) => {
    const jobs = requireSection(c, "jobs");
    const images = jobs.images;
    if (!isRecord(images)) {
      throw new ConfigError("jobs.images must be an object");
    }
    for (const key of [...KNOWN_DATABASE_TYPES, "default"]) {
      if (!images[key] || typeof images[key] !== "string") {
        throw new ConfigError(`jobs.images.${key} must be a string`);
      }
    }
    if (jobs.labels !== undefined) {
      requireStringMap(jobs.labels, "jobs.labels");
    }
    if (jobs.network !== undefined && typeof jobs.network !== "string") {
      throw new ConfigError("jobs.network must be a string");
    }
  },
};

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): asserts config is ControllerConfig {
  if (!isRecord(config)) {
    throw new ConfigError("Config must be an object");
  }

  for (const validate of Object.values(validators)) {
    validate(config);
  }
}
