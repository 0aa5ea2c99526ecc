import { Router } from 'express';
import { AppContext } from '../container';
import { createMetricController } from '../controllers/metric.controller';

export const metricRoutes = (ctx: AppContext): Router => {
  const router = Router();
  const controller = createMetricController(ctx);

  router.route('/').get(controller.list).post(controller.create);

  return router;
};
