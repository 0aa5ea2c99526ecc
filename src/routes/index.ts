import { Router } from 'express';
import { AppContext } from '../container';
import { createHealthController } from '../controllers/health.controller';
import { protect } from '../middleware/auth';
import { notFound } from '../middleware/errorHandler';
import { apiLimiter } from '../middleware/rateLimiter';
import { apiKeyRoutes } from './apiKey.routes';
import { dashboardRoutes } from './dashboard.routes';
import { dataSourceRoutes } from './dataSource.routes';
import { etlJobRoutes } from './etlJob.routes';
import { metricRoutes } from './metric.routes';

/**
 * Everything mounted under the API prefix
 */
export const createApiRouter = (ctx: AppContext): Router => {
  const router = Router();

  // Public routes
  router.get('/health', createHealthController(ctx).check);

  // Protected routes
  const guard = [apiLimiter, protect(ctx.apiKeys)];
  router.use('/data-sources', guard, dataSourceRoutes(ctx));
  router.use('/etl-jobs', guard, etlJobRoutes(ctx));
  router.use('/metrics', guard, metricRoutes(ctx));
  router.use('/keys', guard, apiKeyRoutes(ctx));
  router.use('/dashboard', guard, dashboardRoutes(ctx));

  // 404 handler for API routes
  router.use(notFound);

  return router;
};
