/**
 * Backup jobs as detached Docker containers
 *
 * A job is a container named after the job. It is never started with --rm so
 * its exit code stays readable until the owning policy is deleted. The
 * ownership labels written by the job spec builder double as the namespace
 * and garbage collection keys.
 */

import { isRecord } from "../config/validator";
import {
  LABEL_MANAGED_BY,
  LABEL_POLICY_NAME,
  LABEL_POLICY_NAMESPACE,
  LABEL_POLICY_UID,
  MANAGED_BY,
} from "../core/reconcile/job-spec";
import type {
  CompletionState,
  Job,
  JobCollector,
  JobRunner,
  JobSpec,
  JobVolume,
  OwnerReference,
} from "../types";
import { createLogger } from "../utils/logger";
import { DockerCommandError, type DockerRunResult, dockerRun } from "./client";

const log = createLogger("jobs");

export type DockerExecutor = (args: string[]) => Promise<DockerRunResult>;

export interface DockerJobRunnerOptions {
  /** Network the job containers join */
  network?: string;
  exec?: DockerExecutor;
  now?: () => Date;
}

const RUNNING_STATES = new Set(["created", "running", "restarting", "paused", "removing"]);
const TERMINAL_STATES = new Set(["exited", "dead"]);

// Docker reports unset timestamps as the zero time
const ZERO_TIME_PREFIX = "0001-01-01";

function volumeSource(volume: JobVolume): string {
  return volume.source.kind === "volume" ? volume.source.claimName : volume.source.secretName;
}

export function buildRunArgs(spec: JobSpec, network?: string): string[] {
  const args = ["run", "-d", "--name", spec.name];

  for (const key of Object.keys(spec.labels).sort()) {
    args.push("--label", `${key}=${spec.labels[key]}`);
  }

  for (const env of spec.env) {
    args.push("-e", `${env.name}=${env.value}`);
  }

  for (const volume of spec.volumes) {
    const mount = `${volumeSource(volume)}:${volume.mountPath}`;
    args.push("-v", volume.readOnly ? `${mount}:ro` : mount);
  }

  if (network) {
    args.push("--network", network);
  }

  args.push(spec.image);
  return args;
}

function isNotFound(result: DockerRunResult): boolean {
  return result.stderr.includes("No such");
}

function parseTime(value: unknown): Date | null {
  if (typeof value !== "string" || value === "" || value.startsWith(ZERO_TIME_PREFIX)) {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function stringLabels(value: unknown): Record<string, string> {
  const labels: Record<string, string> = {};
  if (!isRecord(value)) {
    return labels;
  }
  for (const [key, label] of Object.entries(value)) {
    if (typeof label === "string") {
      labels[key] = label;
    }
  }
  return labels;
}

function ownerFromLabels(labels: Record<string, string>): OwnerReference | null {
  const name = labels[LABEL_POLICY_NAME];
  const namespace = labels[LABEL_POLICY_NAMESPACE];
  const uid = labels[LABEL_POLICY_UID];
  if (!name || !namespace || !uid) {
    return null;
  }
  return { kind: "BackupPolicy", namespace, name, uid };
}

export function completionStateOf(status: string, exitCode: number): CompletionState {
  if (RUNNING_STATES.has(status)) {
    return "Running";
  }
  if (TERMINAL_STATES.has(status)) {
    return exitCode === 0 ? "Succeeded" : "Failed";
  }
  throw new Error(`Unknown container state "${status}"`);
}

/**
 * Turn `docker inspect` output into a job.
 * Containers outside the namespace, or not created by the controller, are not jobs.
 */
export function parseInspectOutput(stdout: string, namespace: string, name: string): Job | null {
  const parsed: unknown = JSON.parse(stdout);
  const container: unknown = Array.isArray(parsed) ? parsed[0] : parsed;
  if (!isRecord(container) || !isRecord(container.State) || !isRecord(container.Config)) {
    throw new Error(`docker inspect returned an unexpected document for ${name}`);
  }

  const labels = stringLabels(container.Config.Labels);
  if (labels[LABEL_MANAGED_BY] !== MANAGED_BY || labels[LABEL_POLICY_NAMESPACE] !== namespace) {
    return null;
  }

  const { State: state } = container;
  const status = typeof state.Status === "string" ? state.Status : "";
  const exitCode = typeof state.ExitCode === "number" ? state.ExitCode : 0;
  const completionState = completionStateOf(status, exitCode);

  return {
    name,
    namespace,
    image: typeof container.Config.Image === "string" ? container.Config.Image : "",
    owner: ownerFromLabels(labels),
    completionState,
    startedAt: parseTime(state.StartedAt),
    finishedAt: completionState === "Running" ? null : parseTime(state.FinishedAt),
    exitCode: completionState === "Running" ? null : exitCode,
  };
}

export type DockerJobRunner = JobRunner & JobCollector;

export function createDockerJobRunner(options: DockerJobRunnerOptions = {}): DockerJobRunner {
  const exec = options.exec ?? dockerRun;
  const now = options.now ?? (() => new Date());

  async function run(args: string[]): Promise<DockerRunResult> {
    const result = await exec(args);
    if (!result.success) {
      throw new DockerCommandError(args, result);
    }
    return result;
  }

  async function listOwnedJobs(owner: Pick<OwnerReference, "uid">): Promise<string[]> {
    const result = await run([
      "ps",
      "-a",
      "--filter",
      `label=${LABEL_POLICY_UID}=${owner.uid}`,
      "--format",
      "{{.Names}}",
    ]);
    return result.stdout
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  return {
    async getJob(namespace, name) {
      const args = ["inspect", "--type", "container", name];
      const result = await exec(args);
      if (!result.success) {
        if (isNotFound(result)) {
          return null;
        }
        throw new DockerCommandError(args, result);
      }
      return parseInspectOutput(result.stdout, namespace, name);
    },

    async createJob(spec) {
      await run(buildRunArgs(spec, options.network));
      log.debug(`Started container ${spec.name} from ${spec.image}`);
      return {
        name: spec.name,
        namespace: spec.namespace,
        image: spec.image,
        owner: spec.owner,
        completionState: "Running",
        startedAt: now(),
        finishedAt: null,
        exitCode: null,
      };
    },

    listOwnedJobs,

    async deleteOwnedJobs(owner) {
      const names = await listOwnedJobs(owner);
      if (names.length === 0) {
        return [];
      }
      await run(["rm", "-f", ...names]);
      log.info(`Removed ${names.length} job container(s) for policy uid ${owner.uid}`);
      return names;
    },
  };
}
