/**
 * Wiring shared by the CLI commands
 */

import { ConfigError, createDefaultConfig, findAndLoadConfig } from "../config";
import { Reconciler } from "../core";
import { closeDatabase, createPolicyStore, initDatabase } from "../db";
import { createDockerJobRunner, type DockerJobRunner } from "../docker";
import type { ControllerConfig, PolicyRepository } from "../types";
import { createLogger } from "../utils/logger";

const log = createLogger("cli");

export interface CliContext {
  config: ControllerConfig;
  store: PolicyRepository;
  jobs: DockerJobRunner;
  reconciler: Reconciler;
  close(): void;
}

/**
 * Load the config file; without an explicit path a missing file means defaults
 */
export async function loadCliConfig(configPath?: string): Promise<ControllerConfig> {
  try {
    return await findAndLoadConfig(configPath);
  } catch (error) {
    if (error instanceof ConfigError && !configPath && error.message.startsWith("No config file")) {
      log.debug("No config file found, using defaults");
      return createDefaultConfig();
    }
    throw error;
  }
}

const seconds = (value: number): number => value * 1000;

export function createReconciler(
  config: ControllerConfig,
  store: PolicyRepository,
  jobs: DockerJobRunner,
): Reconciler {
  const settings = config.controller;
  return new Reconciler({
    store,
    jobs,
    timezone: settings.timezone,
    images: config.jobs.images,
    jobLabels: config.jobs.labels,
    defaultRequeueMs: seconds(settings.defaultRequeue),
    minRequeueMs: seconds(settings.minRequeue),
    activeJobPollMs: seconds(settings.activeJobPoll),
  });
}

export async function openContext(configPath?: string): Promise<CliContext> {
  const config = await loadCliConfig(configPath);
  await initDatabase(config.database.path);

  const store = createPolicyStore();
  const jobs = createDockerJobRunner({ network: config.jobs.network });

  return {
    config,
    store,
    jobs,
    reconciler: createReconciler(config, store, jobs),
    close: closeDatabase,
  };
}
