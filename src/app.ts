import express, { Express } from 'express';
import cors from 'cors';
import morgan from 'morgan';
import { apiConfig, appConfig } from './config';
import { AppContext } from './container';
import { errorHandler, notFound } from './middleware/errorHandler';
import { createApiRouter } from './routes';
import { httpLogger } from './utils/logger';

/**
 * Build the Express application over an already wired context
 */
export const createApp = (ctx: AppContext): Express => {
  const app = express();

  // Middleware
  app.use(cors(apiConfig.cors));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));
  app.use(httpLogger);

  // Logging middleware in development
  if (appConfig.isDevelopment) {
    app.use(morgan('dev'));
  }

  // API routes
  app.use(apiConfig.prefix, createApiRouter(ctx));

  app.get('/', (req, res) => {
    res.json({ name: appConfig.name, version: appConfig.version, api: apiConfig.prefix });
  });

  app.use(notFound);

  // Error handling middleware (should be the last middleware)
  app.use(errorHandler);

  return app;
};
