import { Router } from 'express';
import { AppContext } from '../container';
import { createDashboardController } from '../controllers/dashboard.controller';

export const dashboardRoutes = (ctx: AppContext): Router => {
  const router = Router();
  router.get('/stats', createDashboardController(ctx).stats);
  return router;
};
