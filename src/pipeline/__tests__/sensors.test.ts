import { describe, it, expect, beforeEach } from '@jest/globals';
import { dataAvailabilitySensor, etlFailureRecoverySensor } from '../sensors';
import { SensorContext } from '../types';
import { TestContext, createTestContext } from '../../__tests__/support/testContext';

const NOW = new Date('2024-03-15T12:00:00.000Z');

describe('pipeline sensors', () => {
  let t: TestContext;
  let context: SensorContext;

  beforeEach(() => {
    t = createTestContext({ now: NOW });
    context = { dataSources: t.repositories.dataSources, jobs: t.repositories.jobs, now: NOW, maxRecoveryAttempts: 1 };
  });

  describe('dataAvailabilitySensor', () => {
    it('requests a run for the most recently updated active source', async () => {
      t.clock.set(new Date('2024-03-15T11:10:00.000Z'));
      await t.repositories.dataSources.create({ name: 'older', sourceType: 'api', connectionString: 'test://source' });
      t.clock.set(new Date('2024-03-15T11:40:00.000Z'));
      const latest = await t.repositories.dataSources.create({ name: 'latest', sourceType: 'file', connectionString: 'test://source' });
      await t.repositories.dataSources.create({
        name: 'inactive',
        sourceType: 'api',
        connectionString: 'test://source',
        isActive: false,
      });

      await expect(dataAvailabilitySensor.evaluate(context)).resolves.toEqual({
        type: 'run',
        request: {
          jobName: 'etl_pipeline',
          runKey: `sensor_triggered_${latest.id}_20240315_120000`,
          trigger: 'sensor',
          tags: { trigger: 'sensor', data_source: 'latest', source_type: 'file' },
        },
      });
    });

    it('skips when nothing changed in the last hour', async () => {
      t.clock.set(new Date('2024-03-15T10:59:59.000Z'));
      await t.repositories.dataSources.create({ name: 'stale', sourceType: 'api', connectionString: 'test://source' });

      await expect(dataAvailabilitySensor.evaluate(context)).resolves.toEqual({
        type: 'skip',
        reason: 'No new data sources updated in the last hour',
      });
    });
  });

  describe('etlFailureRecoverySensor', () => {
    it('picks the oldest recent temporary failure', async () => {
      t.repositories.jobs.insert({
        name: 'newer',
        dataSourceId: 's',
        status: 'failed',
        errorMessage: 'Temporary outage',
        completedAt: new Date('2024-03-15T11:00:00.000Z'),
      });
      const oldest = t.repositories.jobs.insert({
        name: 'oldest',
        dataSourceId: 's',
        status: 'failed',
        errorMessage: 'temporary outage',
        completedAt: new Date('2024-03-15T09:00:00.000Z'),
      });
      t.repositories.jobs.insert({
        name: 'too old',
        dataSourceId: 's',
        status: 'failed',
        errorMessage: 'temporary outage',
        completedAt: new Date('2024-03-15T07:59:00.000Z'),
      });
      t.repositories.jobs.insert({
        name: 'permanent',
        dataSourceId: 's',
        status: 'failed',
        errorMessage: 'syntax error',
        completedAt: new Date('2024-03-15T08:30:00.000Z'),
      });

      const result = await etlFailureRecoverySensor.evaluate(context);

      expect(result.type === 'run' && result.request.tags.original_job_id).toBe(oldest.id);
    });

    it('leaves jobs that used up their automatic recoveries', async () => {
      t.repositories.jobs.insert({
        name: 'recovered',
        dataSourceId: 's',
        status: 'failed',
        errorMessage: 'temporary outage',
        recoveryAttempts: 1,
        completedAt: new Date('2024-03-15T09:00:00.000Z'),
      });

      await expect(etlFailureRecoverySensor.evaluate(context)).resolves.toEqual({
        type: 'skip',
        reason: 'No failed jobs requiring automatic retry',
      });
    });
  });
});
