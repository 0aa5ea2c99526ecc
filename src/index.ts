import { appConfig } from './config';
import { createApp } from './app';
import { startRuntime, startWorkers } from './runtime';
import { logger } from './utils/logger';

// Connect to database and start server
const startServer = async () => {
  const runtime = await startRuntime();
  if (appConfig.runWorkersInApi) {
    await startWorkers(runtime.ctx);
  }

  const server = createApp(runtime.ctx).listen(appConfig.port, () => {
    logger.info(`Server running in ${appConfig.env} mode on port ${appConfig.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received. Shutting down gracefully`);
    server.close(() => {
      runtime
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  // Handle unhandled promise rejections
  process.on('unhandledRejection', (err: unknown) => {
    logger.error(`Unhandled rejection: ${err instanceof Error ? err.message : String(err)}`);
    // Close server & exit process
    server.close(() => process.exit(1));
  });
};

// Handle uncaught exceptions
process.on('uncaughtException', (err: unknown) => {
  logger.error(`Uncaught exception: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});

startServer().catch((error: unknown) => {
  logger.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
