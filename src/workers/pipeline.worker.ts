import { startOfMinute } from 'date-fns';
import { pipelineConfig } from '../config';
import { PipelineRunner } from '../pipeline/runner';
import { createLogger } from '../utils/logger';
import { WorkQueue } from '../utils/queue';

const log = createLogger('pipeline-worker');

export type PipelineMessage = { kind: 'schedule'; schedule: string } | { kind: 'sensors' };

export const handlePipelineMessage = async (
  runner: PipelineRunner,
  message: PipelineMessage,
  dueAt: Date
): Promise<void> => {
  switch (message.kind) {
    case 'schedule':
      // Cron ticks are identified by their scheduled minute
      await runner.triggerSchedule(message.schedule, startOfMinute(dueAt));
      return;
    case 'sensors': {
      const results = await runner.tick();
      log.debug(`Evaluated ${results.length} sensors`);
      return;
    }
  }
};

export const startPipelineWorker = (queue: WorkQueue<PipelineMessage>, runner: PipelineRunner): void => {
  queue.process((message, delivery) => handlePipelineMessage(runner, message, delivery.dueAt));
};

/**
 * Register enabled schedules and the sensor tick as repeatable messages
 */
export const schedulePipeline = async (queue: WorkQueue<PipelineMessage>, runner: PipelineRunner): Promise<void> => {
  await queue.clearRepeatable();

  for (const schedule of runner.getSchedules()) {
    const enabled = pipelineConfig.scheduleOverrides[schedule.name] ?? schedule.enabledByDefault;
    if (!enabled) {
      log.info(`Schedule ${schedule.name} is stopped`);
      continue;
    }
    await queue.enqueue({ kind: 'schedule', schedule: schedule.name }, { repeat: { pattern: schedule.cron } });
    log.info(`Schedule ${schedule.name} running (${schedule.cron} UTC)`);
  }

  await queue.enqueue({ kind: 'sensors' }, { repeat: { every: pipelineConfig.sensorIntervalMs } });
};
