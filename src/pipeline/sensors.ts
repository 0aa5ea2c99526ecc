import { subHours } from 'date-fns';
import { formatUtc } from '../utils/dateUtils';
import { SensorDefinition } from './types';

const RECENT_UPDATE_WINDOW_HOURS = 1;
const RECOVERY_WINDOW_HOURS = 4;

/** Error text marking a failure as worth retrying automatically. */
export const RETRYABLE_ERROR_MARKER = 'temporary';

const stamp = (now: Date): string => formatUtc(now, 'yyyyMMdd_HHmmss');

/**
 * Triggers the full pipeline for the most recently updated active data source
 */
export const dataAvailabilitySensor: SensorDefinition = {
  name: 'data_availability_sensor',
  jobName: 'etl_pipeline',
  description: 'Sensor to trigger ETL when new data is available',
  errorPrefix: 'Sensor error',
  async evaluate({ dataSources, now }) {
    const [latest] = await dataSources.find(
      { isActive: true, updatedSince: subHours(now, RECENT_UPDATE_WINDOW_HOURS) },
      { updatedAt: -1 },
      1
    );

    if (!latest) {
      return { type: 'skip', reason: 'No new data sources updated in the last hour' };
    }

    return {
      type: 'run',
      request: {
        jobName: 'etl_pipeline',
        runKey: `sensor_triggered_${latest.id}_${stamp(now)}`,
        trigger: 'sensor',
        tags: { trigger: 'sensor', data_source: latest.name, source_type: latest.sourceType },
      },
    };
  },
};

/**
 * Picks the oldest recent failure flagged as temporary that still has automatic
 * recoveries left. The runner re-queues the original job when it launches the
 * retry-tagged run.
 */
export const etlFailureRecoverySensor: SensorDefinition = {
  name: 'etl_failure_recovery_sensor',
  jobName: 'etl_pipeline',
  description: 'Failure recovery sensor for failed ETL jobs',
  errorPrefix: 'Recovery sensor error',
  async evaluate({ jobs, now, maxRecoveryAttempts }) {
    const [oldest] = await jobs.find(
      {
        statuses: ['failed'],
        completedAfter: subHours(now, RECOVERY_WINDOW_HOURS),
        errorContains: RETRYABLE_ERROR_MARKER,
        recoveryAttemptsBelow: maxRecoveryAttempts,
      },
      { completedAt: 1 },
      1
    );

    if (!oldest) {
      return { type: 'skip', reason: 'No failed jobs requiring automatic retry' };
    }

    return {
      type: 'run',
      request: {
        jobName: 'etl_pipeline',
        runKey: `retry_${oldest.id}_${stamp(now)}`,
        trigger: 'retry',
        tags: { trigger: 'retry', original_job_id: oldest.id, retry_reason: 'automatic_recovery' },
      },
    };
  },
};

export const PIPELINE_SENSORS: SensorDefinition[] = [dataAvailabilitySensor, etlFailureRecoverySensor];
