import { startRuntime, startWorkers } from './runtime';
import { logger } from './utils/logger';

const startWorkerProcess = async () => {
  const runtime = await startRuntime();
  await startWorkers(runtime.ctx);

  const shutdown = (signal: string) => {
    logger.info(`${signal} received. Draining workers`);
    runtime
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

startWorkerProcess().catch((error: unknown) => {
  logger.error(`Worker failed to start: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
