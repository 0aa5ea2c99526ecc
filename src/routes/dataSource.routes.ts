import { Router } from 'express';
import { AppContext } from '../container';
import { createDataSourceController } from '../controllers/dataSource.controller';

export const dataSourceRoutes = (ctx: AppContext): Router => {
  const router = Router();
  const controller = createDataSourceController(ctx);

  router.route('/').get(controller.list).post(controller.create);
  router.route('/:id').get(controller.get).put(controller.replace).patch(controller.update).delete(controller.remove);

  return router;
};
