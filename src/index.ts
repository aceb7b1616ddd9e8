#!/usr/bin/env node
/**
 * Series Autopilot — entry point.
 *
 * `worker` (the default) runs the queue worker plus an hourly node-cron
 * top-up of every active series. The other commands trigger single
 * operations and exit.
 */
import cron, { type ScheduledTask } from 'node-cron';
import { QUEUE } from './config.js';
import { approveEpisode } from './pipeline/lifecycle.js';
import { publishEpisode } from './pipeline/publisher.js';
import { launchSeries, listSchedulableSeries, topUpActiveSeries } from './pipeline/scheduler.js';
import { closeBroker, enqueueTask, getBroker } from './queue/index.js';
import { dispatchTask } from './queue/tasks.js';
import { TaskWorker } from './queue/worker.js';
import { errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

const USAGE = `Usage: series-autopilot <command>

  worker                          queue worker + hourly schedule top-up (default)
  launch   <seriesId>             activate a series and schedule its first episodes
  generate <episodeId>            queue script generation
  media    <episodeId>            queue media generation (render follows)
  render   <episodeId>            queue video assembly from the stored media
  publish  <episodeId> [acct...]  queue one publish per connected account
  approve  <episodeId>            mark a reviewed episode approved
  schedule                        run one schedule top-up pass now
  drain                           process every due task, then exit`;

function createWorker(): TaskWorker {
  return new TaskWorker(getBroker(), dispatchTask, {
    concurrency:    QUEUE.concurrency,
    pollIntervalMs: QUEUE.pollIntervalMs,
    leaseMs:        QUEUE.leaseMs,
  });
}

function requireArg(value: string | undefined, name: string): string {
  if (!value) {
    console.error(`Missing <${name}>\n\n${USAGE}`);
    process.exit(2);
  }
  return value;
}

function print(result: unknown): void {
  console.log(JSON.stringify(result, null, 2));
}

// ── Cron schedules ────────────────────────────────────────────────────────────

function startCron(): ScheduledTask {
  // Hourly: each active series gets a top-up task on the queue
  const task = cron.schedule('0 * * * *', async () => {
    logger.info('Cron: triggering schedule top-up');
    try {
      const series = await listSchedulableSeries();
      for (const s of series) enqueueTask('series.schedule', { seriesId: s.id });
    } catch (err) {
      logger.error('Cron: schedule top-up error', { error: errorMessage(err) });
    }
  });
  logger.info('Cron: schedules registered');
  return task;
}

async function runWorker(): Promise<void> {
  const worker = createWorker();
  const cronTask = startCron();
  worker.start();

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    cronTask.stop();
    worker.stop()
      .then(() => {
        closeBroker();
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error('Shutdown error', { error: errorMessage(err) });
        process.exit(1);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
  logger.info('Series Autopilot: worker mode running');
}

// ── CLI entrypoint ────────────────────────────────────────────────────────────

const [,, command, ...args] = process.argv;

async function main(): Promise<void> {
  logger.info('Series Autopilot: starting', { command: command ?? 'worker' });

  switch (command) {
    case undefined:
    case 'worker':
      await runWorker();
      return;

    case 'launch':
      print(await launchSeries(requireArg(args[0], 'seriesId')));
      break;

    case 'generate':
      print({ taskId: enqueueTask('episode.script', { episodeId: requireArg(args[0], 'episodeId') }) });
      break;

    case 'media':
      print({ taskId: enqueueTask('episode.media', { episodeId: requireArg(args[0], 'episodeId') }) });
      break;

    case 'render':
      print({ taskId: enqueueTask('episode.render', { episodeId: requireArg(args[0], 'episodeId') }) });
      break;

    case 'publish': {
      const [episodeId, ...accountIds] = args;
      const posts = await publishEpisode(requireArg(episodeId, 'episodeId'), accountIds.length ? accountIds : undefined);
      print(posts.map(p => ({ postId: p.id, socialAccountId: p.social_account_id, status: p.status })));
      break;
    }

    case 'approve':
      print(await approveEpisode(requireArg(args[0], 'episodeId')));
      break;

    case 'schedule':
      print({ created: await topUpActiveSeries() });
      break;

    case 'drain':
      print({ processed: await createWorker().drain() });
      break;

    case 'help':
    case '--help':
      console.log(USAGE);
      break;

    default:
      console.error(`Unknown command: ${command}\n\n${USAGE}`);
      process.exitCode = 2;
  }
  closeBroker();
}

main().catch((err: unknown) => {
  logger.error('Fatal error', { error: errorMessage(err) });
  closeBroker();
  process.exit(1);
});
