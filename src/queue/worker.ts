/**
 * Task worker — polls the broker with a fixed number of slots, runs one task
 * per slot to completion, heartbeats its lease, and settles the outcome.
 *
 * Handler errors that extend NonRetryableError are dead-lettered at once;
 * everything else goes back to the queue with backoff until the attempt cap.
 */
import { errorMessage, isRetryable, StageNotClaimableError, StaleLeaseError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { ClaimedTask, TaskBroker } from './broker.js';

export type TaskHandler = (task: ClaimedTask) => Promise<void>;

export interface WorkerOptions {
  concurrency: number;
  pollIntervalMs: number;
  leaseMs: number;
  heartbeatMs?: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class TaskWorker {
  private stopped = true;
  private loops: Promise<void>[] = [];

  constructor(
    private readonly broker: TaskBroker,
    private readonly handle: TaskHandler,
    private readonly opts: WorkerOptions,
  ) {}

  /** Claims and runs at most one task. Returns false when nothing was due. */
  async processOne(slot = 0): Promise<boolean> {
    const task = this.broker.claimNext(this.opts.leaseMs);
    if (!task) return false;

    const startedAt = Date.now();
    const meta = { slot, taskId: task.id, name: task.name, attempt: task.attempts, maxAttempts: task.maxAttempts };
    logger.info('Task claimed', meta);

    const heartbeatMs = this.opts.heartbeatMs ?? Math.max(1_000, Math.floor(this.opts.leaseMs / 3));
    const heartbeat = setInterval(() => {
      if (!this.broker.extendLease(task.id, task.leaseToken, this.opts.leaseMs)) {
        logger.warn('Task lease lost', meta);
        clearInterval(heartbeat);
      }
    }, heartbeatMs);
    heartbeat.unref();

    try {
      await this.handle(task);
      if (this.broker.complete(task.id, task.leaseToken)) {
        logger.info('Task completed', { ...meta, durationMs: Date.now() - startedAt });
      } else {
        logger.warn('Task completed on a stale lease', meta);
      }
    } catch (err) {
      const message = errorMessage(err);
      const settled = this.broker.fail(task.id, task.leaseToken, message, isRetryable(err));
      if (err instanceof StageNotClaimableError || err instanceof StaleLeaseError) {
        logger.warn('Task skipped', { ...meta, reason: message });
      } else if (settled.outcome === 'retried') {
        logger.warn('Task failed — requeued', {
          ...meta,
          error: message,
          backoffMs: settled.backoffMs,
          nextRunAt: settled.nextRunAt.toISOString(),
        });
      } else if (settled.outcome === 'dead') {
        logger.error('Task failed — giving up', { ...meta, error: message });
      } else {
        logger.warn('Task failed on a stale lease', { ...meta, error: message });
      }
    } finally {
      clearInterval(heartbeat);
    }
    return true;
  }

  /** Runs due tasks until none are left. Returns how many were processed. */
  async drain(maxTasks = Number.POSITIVE_INFINITY): Promise<number> {
    let handled = 0;
    while (handled < maxTasks && await this.processOne()) handled++;
    return handled;
  }

  start(): void {
    if (!this.stopped) return;
    this.stopped = false;
    this.loops = Array.from({ length: this.opts.concurrency }, (_v, slot) => this.loop(slot));
    logger.info('Worker started', { concurrency: this.opts.concurrency, leaseMs: this.opts.leaseMs });
  }

  async stop(): Promise<void> {
    this.stopped = true;
    await Promise.all(this.loops);
    this.loops = [];
    logger.info('Worker stopped');
  }

  private async loop(slot: number): Promise<void> {
    while (!this.stopped) {
      try {
        const handled = await this.processOne(slot);
        if (!handled) await sleep(this.opts.pollIntervalMs);
      } catch (err) {
        logger.error('Worker slot error', { slot, error: errorMessage(err) });
        await sleep(this.opts.pollIntervalMs);
      }
    }
  }
}
