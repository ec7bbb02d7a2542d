/**
 * Docker module exports
 */

export type { DockerRunResult } from "./client";
export {
  DockerCommandError,
  dockerRun,
  getDockerVersion,
  isDockerAvailable,
  runCommand,
} from "./client";
export type { DockerExecutor, DockerJobRunner, DockerJobRunnerOptions } from "./jobs";
export {
  buildRunArgs,
  completionStateOf,
  createDockerJobRunner,
  parseInspectOutput,
} from "./jobs";
