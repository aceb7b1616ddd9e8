/**
 * Task dispatch — routes a claimed task to its pipeline entry point after
 * validating the payload against the task catalogue.
 */
import { runEpisodeStage } from '../pipeline/workflow.js';
import { runPublishTask } from '../pipeline/publisher.js';
import { runScheduleTask } from '../pipeline/scheduler.js';
import { PipelineInputError } from '../utils/errors.js';
import type { ClaimedTask } from './broker.js';
import { isTaskName, TaskPayloadSchemas } from './index.js';

function invalidPayload(task: ClaimedTask, message: string): PipelineInputError {
  return new PipelineInputError(`Invalid payload for ${task.name}: ${message}`);
}

export async function dispatchTask(task: ClaimedTask): Promise<void> {
  if (!isTaskName(task.name)) throw new PipelineInputError(`Unknown task: ${task.name}`);

  switch (task.name) {
    case 'episode.script':
    case 'episode.media':
    case 'episode.render': {
      const parsed = TaskPayloadSchemas[task.name].safeParse(task.payload);
      if (!parsed.success) throw invalidPayload(task, parsed.error.message);
      const stage = task.name === 'episode.script' ? 'script' : task.name === 'episode.media' ? 'media' : 'render';
      await runEpisodeStage(stage, parsed.data.episodeId, task.id);
      return;
    }
    case 'post.publish': {
      const parsed = TaskPayloadSchemas['post.publish'].safeParse(task.payload);
      if (!parsed.success) throw invalidPayload(task, parsed.error.message);
      await runPublishTask(parsed.data.postId);
      return;
    }
    case 'series.schedule': {
      const parsed = TaskPayloadSchemas['series.schedule'].safeParse(task.payload);
      if (!parsed.success) throw invalidPayload(task, parsed.error.message);
      await runScheduleTask(parsed.data.seriesId);
      return;
    }
  }
}
