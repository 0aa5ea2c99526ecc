import { formatUtc } from '../utils/dateUtils';
import { ScheduleDefinition } from './types';

export const dailyEtlSchedule: ScheduleDefinition = {
  name: 'daily_etl_schedule',
  jobName: 'etl_pipeline',
  cron: '0 2 * * *', // Daily at 02:00
  enabledByDefault: true,
  description: 'Daily ETL pipeline execution',
  buildRequest: (scheduledTime) => ({
    jobName: 'etl_pipeline',
    runKey: `daily_etl_${formatUtc(scheduledTime, 'yyyy_MM_dd')}`,
    trigger: 'schedule',
    tags: { schedule: 'daily', execution_date: formatUtc(scheduledTime, 'yyyy-MM-dd') },
  }),
};

export const frequentExtractSchedule: ScheduleDefinition = {
  name: 'frequent_extract_schedule',
  jobName: 'extract_only',
  cron: '0 */6 * * *', // Every 6 hours
  enabledByDefault: false,
  description: 'Frequent data extraction for monitoring',
  buildRequest: (scheduledTime) => ({
    jobName: 'extract_only',
    runKey: `extract_${formatUtc(scheduledTime, 'yyyy_MM_dd_HH')}`,
    trigger: 'schedule',
    tags: { schedule: 'frequent', execution_time: formatUtc(scheduledTime, 'yyyy-MM-dd HH:mm') },
  }),
};

export const PIPELINE_SCHEDULES: ScheduleDefinition[] = [dailyEtlSchedule, frequentExtractSchedule];
