import { Router } from 'express';
import { AppContext } from '../container';
import { createApiKeyController } from '../controllers/apiKey.controller';

export const apiKeyRoutes = (ctx: AppContext): Router => {
  const router = Router();
  const controller = createApiKeyController(ctx);

  router.route('/').get(controller.list).post(controller.create);
  router.route('/:id').get(controller.get).put(controller.replace).patch(controller.update).delete(controller.remove);

  return router;
};
