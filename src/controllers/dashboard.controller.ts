import { Request, Response } from 'express';
import { AppContext } from '../container';
import { getRequestUser } from '../middleware/auth';
import { serializeDashboardStats } from '../serializers/dashboard.serializer';
import { successResponse } from '../utils/apiResponse';
import { asyncHandler } from '../utils/asyncHandler';
import { createLogger } from '../utils/logger';

const log = createLogger('dashboard');

export const createDashboardController = ({ dashboard }: AppContext) => ({
  // @desc    Aggregate counts and the most recent jobs
  // @route   GET /dashboard/stats
  // @access  Private
  stats: asyncHandler(async (req: Request, res: Response) => {
    const stats = await dashboard.getStats();
    log.info('Dashboard stats requested', { user: getRequestUser(req).username });
    return successResponse(res, serializeDashboardStats(stats));
  }),
});
