import { describe, it, expect } from '@jest/globals';
import { handlePipelineMessage, schedulePipeline } from '../pipeline.worker';
import { createTestContext } from '../../__tests__/support/testContext';

describe('pipeline worker', () => {
  it('registers enabled schedules and the sensor tick', async () => {
    const t = createTestContext();

    await schedulePipeline(t.queues.pipeline, t.ctx.pipeline);

    expect(t.queues.pipeline.messages.map((queued) => [queued.message, queued.options.repeat])).toEqual([
      [{ kind: 'schedule', schedule: 'daily_etl_schedule' }, { pattern: '0 2 * * *' }],
      [{ kind: 'sensors' }, { every: 30000 }],
    ]);
  });

  it('identifies a schedule tick by its scheduled minute', async () => {
    const t = createTestContext();

    await handlePipelineMessage(
      t.ctx.pipeline,
      { kind: 'schedule', schedule: 'daily_etl_schedule' },
      new Date('2024-03-15T02:00:17.250Z')
    );

    const run = await t.repositories.pipelineRuns.findByRunKey('daily_etl_2024_03_15');
    expect(run?.tags.execution_date).toBe('2024-03-15');
    expect(run?.status).toBe('success');
  });

  it('evaluates every sensor on a tick', async () => {
    const t = createTestContext();

    await handlePipelineMessage(t.ctx.pipeline, { kind: 'sensors' }, t.clock.now());

    expect(t.repositories.pipelineRuns.records.size).toBe(0);
  });
});
