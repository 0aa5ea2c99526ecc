import rateLimit from 'express-rate-limit';
import { Request, Response } from 'express';
import { rateLimitExceededResponse } from '../utils/apiResponse';
import { apiConfig } from '../config';

// Limits every API route per client IP
export const apiLimiter = rateLimit({
  windowMs: apiConfig.rateLimit.windowMs,
  max: apiConfig.rateLimit.max,
  standardHeaders: true, // Return rate limit info in the `RateLimit-*` headers
  legacyHeaders: false, // Disable the `X-RateLimit-*` headers
  handler: (req: Request, res: Response) => {
    rateLimitExceededResponse(res);
  },
});
