import { Router } from 'express';
import { AppContext } from '../container';
import { createEtlJobController } from '../controllers/etlJob.controller';

// Jobs are created and retried through the API; every other transition belongs to the workers
export const etlJobRoutes = (ctx: AppContext): Router => {
  const router = Router();
  const controller = createEtlJobController(ctx);

  router.route('/').get(controller.list).post(controller.create);
  router.get('/:id', controller.get);
  router.post('/:id/retry', controller.retry);

  return router;
};
