import { Request, Response } from 'express';
import { AppContext } from '../container';
import { asyncHandler } from '../utils/asyncHandler';

export const createHealthController = ({ health }: AppContext) => ({
  // @desc    Dependency health; reported without the response envelope
  // @route   GET /health
  // @access  Public
  check: asyncHandler(async (req: Request, res: Response) => {
    const report = await health.check();
    return res.status(200).json(report);
  }),
});
