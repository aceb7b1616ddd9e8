/**
 * Process-wide broker handle and the typed task catalogue.
 */
import { z } from 'zod';
import { QUEUE } from '../config.js';
import { logger } from '../utils/logger.js';
import { TaskBroker, type EnqueueOptions } from './broker.js';

// ── Task catalogue ────────────────────────────────────────────────────────────

export const TaskPayloadSchemas = {
  'episode.script':  z.object({ episodeId: z.string().min(1) }),
  'episode.media':   z.object({ episodeId: z.string().min(1) }),
  'episode.render':  z.object({ episodeId: z.string().min(1) }),
  'post.publish':    z.object({ postId: z.string().min(1) }),
  'series.schedule': z.object({ seriesId: z.string().min(1) }),
} as const;

export type TaskName = keyof typeof TaskPayloadSchemas;
export type TaskPayload<N extends TaskName> = z.infer<(typeof TaskPayloadSchemas)[N]>;

export function isTaskName(name: string): name is TaskName {
  return Object.prototype.hasOwnProperty.call(TaskPayloadSchemas, name);
}

// ── Broker singleton ──────────────────────────────────────────────────────────

let _broker: TaskBroker | null = null;

export function getBroker(): TaskBroker {
  if (!_broker) {
    _broker = new TaskBroker({
      filename:      QUEUE.dbPath,
      maxAttempts:   QUEUE.maxAttempts,
      backoffBaseMs: QUEUE.backoffBaseMs,
      backoffMaxMs:  QUEUE.backoffMaxMs,
    });
  }
  return _broker;
}

export function closeBroker(): void {
  _broker?.close();
  _broker = null;
}

export function enqueueTask<N extends TaskName>(
  name: N,
  payload: TaskPayload<N>,
  options: EnqueueOptions = {},
): string {
  const id = getBroker().enqueue(name, payload, options);
  logger.info('Task enqueued', {
    taskId: id,
    name,
    ...payload,
    runAt: options.runAt?.toISOString() ?? 'now',
  });
  return id;
}
