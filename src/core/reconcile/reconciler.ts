/**
 * Reconcile loop for BackupPolicy resources
 *
 * One pass reads the policy, observes the job it launched last (if any),
 * evaluates the schedule, launches at most one new job and reports when the
 * policy should be looked at again. All state lives in the store; nothing is
 * kept between passes.
 */

import type {
  BackupPhase,
  ImageMap,
  Job,
  JobRunner,
  PolicyId,
  PolicyStore,
} from "../../types";
import { policyKey } from "../../types";
import { createLogger } from "../../utils/logger";
import { InvalidScheduleError, JobCreationError } from "../errors";
import { isDue, parseSchedule, type Schedule } from "../scheduler/cron-parser";
import { buildJobSpec } from "./job-spec";
import { StatusWriter } from "./status-writer";

const log = createLogger("reconcile");

export const JOB_FAILED_REASON = "Backup job failed, check job logs for details";
export const INVALID_SCHEDULE_PREFIX = "Invalid schedule: ";

export const DEFAULT_REQUEUE_MS = 60_000;
export const MIN_REQUEUE_MS = 1_000;
export const ACTIVE_JOB_POLL_MS = 30_000;

export function jobMissingReason(jobName: string): string {
  return `Backup job ${jobName} disappeared before reporting a result`;
}

export interface ReconcilerOptions {
  store: PolicyStore;
  jobs: JobRunner;
  now?: () => Date;
  /** Timezone for schedules that don't set their own */
  timezone?: string;
  images?: ImageMap;
  jobLabels?: Record<string, string>;
  /** Random suffix source for job names */
  shortId?: () => string;
  defaultRequeueMs?: number;
  minRequeueMs?: number;
  activeJobPollMs?: number;
}

export interface ReconcileResult {
  /** Whether any status write happened during the pass */
  statusWritten: boolean;
  /** Delay before the next pass; null when the policy is gone */
  requeueAfterMs: number | null;
  /** Name of the job launched by this pass */
  jobCreated: string | null;
  phase: BackupPhase | null;
}

export class Reconciler {
  private readonly store: PolicyStore;
  private readonly jobs: JobRunner;
  private readonly now: () => Date;
  private readonly timezone?: string;
  private readonly images?: ImageMap;
  private readonly jobLabels?: Record<string, string>;
  private readonly shortId?: () => string;
  private readonly defaultRequeueMs: number;
  private readonly minRequeueMs: number;
  private readonly activeJobPollMs: number;

  constructor(options: ReconcilerOptions) {
    this.store = options.store;
    this.jobs = options.jobs;
    this.now = options.now ?? (() => new Date());
    this.timezone = options.timezone;
    this.images = options.images;
    this.jobLabels = options.jobLabels;
    this.shortId = options.shortId;
    this.defaultRequeueMs = options.defaultRequeueMs ?? DEFAULT_REQUEUE_MS;
    this.minRequeueMs = options.minRequeueMs ?? MIN_REQUEUE_MS;
    this.activeJobPollMs = options.activeJobPollMs ?? ACTIVE_JOB_POLL_MS;
  }

  async reconcile(id: PolicyId): Promise<ReconcileResult> {
    const key = policyKey(id);
    const now = this.now();

    const policy = await this.store.get(id);
    if (!policy) {
      log.debug(`${key}: policy not found, nothing to do`);
      return { statusWritten: false, requeueAfterMs: null, jobCreated: null, phase: null };
    }

    const writer = new StatusWriter(this.store, policy);

    if (
      writer.status.lastBackupStatus === null ||
      writer.status.observedGeneration !== policy.generation
    ) {
      await writer.write(
        {
          lastBackupStatus: writer.status.lastBackupStatus ?? "Pending",
          observedGeneration: policy.generation,
        },
        "initialized status",
      );
    }

    if (writer.status.activeJobRef) {
      await this.observeActiveJob(writer, now);
    }

    let schedule: Schedule;
    try {
      schedule = parseSchedule(policy.spec.schedule, {
        timezone: policy.spec.timezone ?? this.timezone,
      });
    } catch (error) {
      if (!(error instanceof InvalidScheduleError)) {
        throw error;
      }
      log.warn(`${key}: invalid schedule "${policy.spec.schedule}": ${error.message}`);
      await writer.write(
        { lastBackupStatus: "Error", failureReason: `${INVALID_SCHEDULE_PREFIX}${error.message}` },
        "schedule rejected",
      );
      return this.result(writer, this.defaultRequeueMs, null);
    }

    if (
      writer.status.lastBackupStatus === "Error" &&
      writer.status.failureReason.startsWith(INVALID_SCHEDULE_PREFIX)
    ) {
      await writer.write({ lastBackupStatus: "Pending", failureReason: "" }, "schedule repaired");
    }

    await this.refreshNextRun(writer, schedule, now);

    let jobCreated: string | null = null;
    if (
      !writer.status.activeJobRef &&
      !writer.policy.spec.suspend &&
      isDue(writer.status.nextScheduledBackupAt, now)
    ) {
      jobCreated = await this.launchJob(writer, schedule, now);
    }

    return this.result(writer, this.requeueDelay(writer, now), jobCreated);
  }

  private async observeActiveJob(writer: StatusWriter, now: Date): Promise<void> {
    const key = policyKey(writer.policy);
    const jobName = writer.status.activeJobRef;
    const job = await this.jobs.getJob(writer.policy.namespace, jobName);

    if (!job) {
      log.warn(`${key}: active job ${jobName} not found, marking the run as failed`);
      await writer.write(
        { lastBackupStatus: "Failed", failureReason: jobMissingReason(jobName), activeJobRef: "" },
        `job ${jobName} disappeared`,
      );
      return;
    }

    switch (job.completionState) {
      case "Succeeded":
        log.info(`${key}: backup job ${jobName} succeeded`);
        await writer.write(
          {
            lastSuccessfulBackupAt: now,
            lastBackupStatus: "Succeeded",
            failureReason: "",
            activeJobRef: "",
          },
          `job ${jobName} succeeded`,
        );
        return;
      case "Failed":
        log.warn(`${key}: backup job ${jobName} failed`, { exitCode: job.exitCode });
        await writer.write(
          { lastBackupStatus: "Failed", failureReason: JOB_FAILED_REASON, activeJobRef: "" },
          `job ${jobName} failed`,
        );
        return;
      case "Running":
        log.debug(`${key}: backup job ${jobName} still running`);
        return;
    }
  }

  /**
   * Keep the displayed next run current without ever moving it backward.
   * A stored instant that is already due stays put so the trigger fires,
   * unless the policy is suspended, in which case the missed run is skipped.
   */
  private async refreshNextRun(writer: StatusWriter, schedule: Schedule, now: Date): Promise<void> {
    const nextRun = schedule.next(now);
    const stored = writer.status.nextScheduledBackupAt;

    if (stored === null) {
      await writer.write({ nextScheduledBackupAt: nextRun }, "scheduled first backup");
      return;
    }

    if (isDue(stored, now)) {
      if (writer.policy.spec.suspend) {
        await writer.write({ nextScheduledBackupAt: nextRun }, "skipped run while suspended");
      }
      return;
    }

    if (nextRun.getTime() > stored.getTime()) {
      await writer.write({ nextScheduledBackupAt: nextRun }, "schedule moved next run forward");
    }
  }

  private async launchJob(writer: StatusWriter, schedule: Schedule, now: Date): Promise<string> {
    const key = policyKey(writer.policy);
    const spec = buildJobSpec(writer.policy, {
      images: this.images,
      labels: this.jobLabels,
      now,
      shortId: this.shortId,
    });

    let job: Job;
    try {
      job = await this.jobs.createJob(spec);
    } catch (error) {
      const cause = error instanceof Error ? error.message : String(error);
      log.error(`${key}: failed to create backup job ${spec.name}`, cause);
      try {
        await writer.write(
          { lastBackupStatus: "Error", failureReason: `Failed to create backup job: ${cause}` },
          "job creation failed",
        );
      } catch (writeError) {
        log.error(`${key}: failed to record job creation failure`, writeError);
      }
      throw new JobCreationError(spec.name, error);
    }

    log.info(`${key}: launched backup job ${job.name} (${spec.image})`);
    await writer.write(
      {
        activeJobRef: job.name,
        lastBackupStatus: "Running",
        failureReason: "",
        nextScheduledBackupAt: schedule.next(now),
      },
      `launched job ${job.name}`,
    );
    return job.name;
  }

  private requeueDelay(writer: StatusWriter, now: Date): number {
    const next = writer.status.nextScheduledBackupAt;
    let delay = next
      ? Math.max(next.getTime() - now.getTime(), this.minRequeueMs)
      : this.defaultRequeueMs;

    if (writer.status.activeJobRef) {
      delay = Math.min(delay, this.activeJobPollMs);
    }
    return delay;
  }

  private result(
    writer: StatusWriter,
    requeueAfterMs: number,
    jobCreated: string | null,
  ): ReconcileResult {
    return {
      statusWritten: writer.written,
      requeueAfterMs,
      jobCreated,
      phase: writer.status.lastBackupStatus,
    };
  }
}
