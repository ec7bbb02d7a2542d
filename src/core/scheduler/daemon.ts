/**
 * Controller daemon
 *
 * Decides when a policy is reconciled: a polling watch over the store,
 * one timer per policy for requeues, a bounded set of workers and
 * exponential backoff after failed passes. Passes for the same policy never
 * overlap.
 */

import type { PolicyId, PolicyLister } from "../../types";
import { policyKey } from "../../types";
import { formatDuration } from "../../utils/format";
import { createLogger } from "../../utils/logger";
import { isRetryable, NotFoundError } from "../errors";
import type { ReconcileResult } from "../reconcile/reconciler";

const log = createLogger("controller");

export const DEFAULT_WATCH_INTERVAL_MS = 10_000;
export const DEFAULT_MAX_CONCURRENT_RECONCILES = 4;
export const DEFAULT_BACKOFF_BASE_MS = 1_000;
export const DEFAULT_BACKOFF_MAX_MS = 300_000;

/** Longest delay setTimeout accepts; longer waits are re-armed in steps */
export const MAX_TIMER_MS = 2_147_483_647;

export interface ControllerOptions {
  store: PolicyLister;
  reconciler: { reconcile(id: PolicyId): Promise<ReconcileResult> };
  watchIntervalMs?: number;
  maxConcurrentReconciles?: number;
  backoffBaseMs?: number;
  backoffMaxMs?: number;
}

export interface QueueEntryStatus extends PolicyId {
  /** When the next pass is due; null when none is scheduled */
  nextPassAt: Date | null;
  failures: number;
  inFlight: boolean;
}

interface PendingTimer {
  timer: ReturnType<typeof setTimeout>;
  dueAt: number;
}

export class Controller {
  private readonly store: PolicyLister;
  private readonly reconciler: ControllerOptions["reconciler"];
  private readonly watchIntervalMs: number;
  private readonly maxConcurrent: number;
  private readonly backoffBaseMs: number;
  private readonly backoffMaxMs: number;

  private readonly ids = new Map<string, PolicyId>();
  private readonly timers = new Map<string, PendingTimer>();
  private readonly queue: string[] = [];
  private readonly queued = new Set<string>();
  private readonly inFlight = new Set<string>();
  private readonly dirty = new Set<string>();
  private readonly failures = new Map<string, number>();
  private readonly seenGenerations = new Map<string, number>();
  private idleWaiters: Array<() => void> = [];

  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private polling = false;
  private running = false;
  private stopped = false;

  constructor(options: ControllerOptions) {
    this.store = options.store;
    this.reconciler = options.reconciler;
    this.watchIntervalMs = options.watchIntervalMs ?? DEFAULT_WATCH_INTERVAL_MS;
    this.maxConcurrent = Math.max(
      1,
      options.maxConcurrentReconciles ?? DEFAULT_MAX_CONCURRENT_RECONCILES,
    );
    this.backoffBaseMs = options.backoffBaseMs ?? DEFAULT_BACKOFF_BASE_MS;
    this.backoffMaxMs = options.backoffMaxMs ?? DEFAULT_BACKOFF_MAX_MS;
  }

  async start(): Promise<void> {
    if (this.running) {
      log.warn("Controller is already running");
      return;
    }

    this.running = true;
    this.stopped = false;
    log.info(
      `Controller started (watch every ${formatDuration(this.watchIntervalMs)}, ${this.maxConcurrent} worker(s))`,
    );

    await this.poll();

    this.pollTimer = setInterval(() => {
      void this.poll();
    }, this.watchIntervalMs);
  }

  stop(): void {
    if (!this.running && this.stopped) {
      return;
    }

    this.running = false;
    this.stopped = true;

    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
    for (const pending of this.timers.values()) {
      clearTimeout(pending.timer);
    }
    this.timers.clear();
    this.queue.length = 0;
    this.queued.clear();
    this.dirty.clear();

    log.info("Controller stopped");
  }

  /**
   * Schedule a pass for a policy. An earlier deadline replaces a later one.
   */
  enqueue(id: PolicyId, delayMs = 0): void {
    if (this.stopped) {
      return;
    }

    const key = policyKey(id);
    this.ids.set(key, { namespace: id.namespace, name: id.name });

    if (delayMs <= 0) {
      this.clearTimer(key);
      this.markReady(key);
      return;
    }

    if (this.queued.has(key)) {
      return;
    }

    const dueAt = Date.now() + delayMs;
    const existing = this.timers.get(key);
    if (existing && existing.dueAt <= dueAt) {
      return;
    }
    this.clearTimer(key);
    this.arm(key, dueAt);
  }

  getStatus(): QueueEntryStatus[] {
    const now = Date.now();
    const status: QueueEntryStatus[] = [];

    for (const [key, id] of this.ids) {
      const pending = this.timers.get(key);
      let nextPassAt: Date | null = null;
      if (this.queued.has(key) || this.dirty.has(key)) {
        nextPassAt = new Date(now);
      } else if (pending) {
        nextPassAt = new Date(pending.dueAt);
      }

      status.push({
        namespace: id.namespace,
        name: id.name,
        nextPassAt,
        failures: this.failures.get(key) ?? 0,
        inFlight: this.inFlight.has(key),
      });
    }

    return status.sort((a, b) => policyKey(a).localeCompare(policyKey(b)));
  }

  /**
   * Resolves once no pass is queued or running
   */
  drained(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  backoffDelay(failures: number): number {
    return Math.min(this.backoffBaseMs * 2 ** (failures - 1), this.backoffMaxMs);
  }

  private async poll(): Promise<void> {
    if (this.polling || this.stopped) {
      return;
    }
    this.polling = true;

    try {
      const policies = await this.store.list();
      const present = new Set<string>();

      for (const policy of policies) {
        const key = policyKey(policy);
        present.add(key);

        const seen = this.seenGenerations.get(key);
        if (seen === undefined || seen !== policy.generation || policy.status.activeJobRef) {
          if (seen === undefined) {
            log.debug(`${key}: discovered`);
          } else if (seen !== policy.generation) {
            log.debug(`${key}: generation ${seen} -> ${policy.generation}`);
          }
          this.seenGenerations.set(key, policy.generation);
          this.enqueue(policy);
        }
      }

      for (const key of [...this.ids.keys()]) {
        if (!present.has(key) && !this.inFlight.has(key)) {
          log.debug(`${key}: deleted, dropping its timers`);
          this.forget(key);
        }
      }
    } catch (error) {
      log.error("Failed to list policies", error);
    } finally {
      this.polling = false;
    }
  }

  private arm(key: string, dueAt: number): void {
    const delay = Math.min(Math.max(dueAt - Date.now(), 0), MAX_TIMER_MS);
    const timer = setTimeout(() => {
      if (Date.now() < dueAt) {
        this.arm(key, dueAt);
        return;
      }
      this.timers.delete(key);
      this.markReady(key);
    }, delay);
    this.timers.set(key, { timer, dueAt });
  }

  private markReady(key: string): void {
    if (this.stopped) {
      return;
    }
    if (this.inFlight.has(key)) {
      this.dirty.add(key);
      return;
    }
    if (this.queued.has(key)) {
      return;
    }
    this.queue.push(key);
    this.queued.add(key);
    this.pump();
  }

  private pump(): void {
    while (!this.stopped && this.inFlight.size < this.maxConcurrent) {
      const key = this.queue.shift();
      if (key === undefined) {
        break;
      }
      this.queued.delete(key);
      this.inFlight.add(key);
      void this.process(key);
    }
    this.notifyIfIdle();
  }

  private async process(key: string): Promise<void> {
    const id = this.ids.get(key);

    try {
      if (!id) {
        return;
      }

      const result = await this.reconciler.reconcile(id);
      this.failures.delete(key);

      if (result.requeueAfterMs === null) {
        this.forget(key);
      } else {
        this.enqueue(id, result.requeueAfterMs);
      }
    } catch (error) {
      if (error instanceof NotFoundError) {
        log.debug(`${key}: deleted during the pass`);
        this.forget(key);
        return;
      }

      const failures = (this.failures.get(key) ?? 0) + 1;
      this.failures.set(key, failures);
      const delay = this.backoffDelay(failures);
      const message = `${key}: reconcile failed (attempt ${failures}), retrying in ${formatDuration(delay)}`;
      if (isRetryable(error)) {
        log.warn(message, error);
      } else {
        log.error(message, error);
      }
      if (id) {
        this.enqueue(id, delay);
      }
    } finally {
      this.inFlight.delete(key);
      if (this.dirty.delete(key)) {
        this.markReady(key);
      }
      this.pump();
    }
  }

  private forget(key: string): void {
    this.clearTimer(key);
    this.ids.delete(key);
    this.failures.delete(key);
    this.seenGenerations.delete(key);
    this.dirty.delete(key);
  }

  private clearTimer(key: string): void {
    const pending = this.timers.get(key);
    if (pending) {
      clearTimeout(pending.timer);
      this.timers.delete(key);
    }
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && this.inFlight.size === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle() || this.idleWaiters.length === 0) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
