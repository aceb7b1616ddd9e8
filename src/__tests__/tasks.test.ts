import { runPublishTask } from '../pipeline/publisher.js';
import { runScheduleTask } from '../pipeline/scheduler.js';
import { runEpisodeStage } from '../pipeline/workflow.js';
import type { ClaimedTask } from '../queue/broker.js';
import { dispatchTask } from '../queue/tasks.js';
import { PipelineInputError } from '../utils/errors.js';

vi.mock('../pipeline/workflow.js', () => ({ runEpisodeStage: vi.fn() }));
vi.mock('../pipeline/publisher.js', () => ({ runPublishTask: vi.fn() }));
vi.mock('../pipeline/scheduler.js', () => ({ runScheduleTask: vi.fn() }));

function task(name: string, payload: unknown): ClaimedTask {
  return {
    id:          'task-1',
    name,
    payload,
    status:      'running',
    attempts:    1,
    maxAttempts: 6,
    runAt:       new Date(0),
    leaseUntil:  new Date(60_000),
    lastError:   null,
    leaseToken:  'lease-1',
  };
}

beforeEach(() => {
  vi.clearAllMocks();
});

describe('dispatchTask', () => {
  it('runs episode stages under the task id', async () => {
    await dispatchTask(task('episode.script', { episodeId: 'e1' }));
    await dispatchTask(task('episode.media', { episodeId: 'e1' }));
    await dispatchTask(task('episode.render', { episodeId: 'e1' }));

    expect(vi.mocked(runEpisodeStage).mock.calls).toEqual([
      ['script', 'e1', 'task-1'],
      ['media', 'e1', 'task-1'],
      ['render', 'e1', 'task-1'],
    ]);
  });

  it('routes publish and schedule tasks', async () => {
    await dispatchTask(task('post.publish', { postId: 'p1' }));
    await dispatchTask(task('series.schedule', { seriesId: 's1' }));

    expect(runPublishTask).toHaveBeenCalledWith('p1');
    expect(runScheduleTask).toHaveBeenCalledWith('s1');
  });

  it('rejects unknown task names', async () => {
    await expect(dispatchTask(task('episode.upscale', {}))).rejects.toThrow('Unknown task: episode.upscale');
  });

  it('rejects payloads that do not match the task', async () => {
    const err = await dispatchTask(task('post.publish', { episodeId: 'e1' })).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(PipelineInputError);
    expect(String(err)).toContain('Invalid payload for post.publish');
    expect(runPublishTask).not.toHaveBeenCalled();
  });
});
