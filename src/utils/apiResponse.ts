import { Response } from 'express';

export interface PageMeta {
  page: number;
  limit: number;
  total: number;
  totalPages: number;
}

/**
 * Standard API response format
 */
interface ApiResponse<T> {
  success: boolean;
  message?: string;
  data?: T;
  meta?: PageMeta;
}

/**
 * Send a successful API response
 */
export const successResponse = <T>(
  res: Response,
  data: T,
  message: string = 'Success',
  statusCode: number = 200,
  meta?: PageMeta
): Response => {
  const response: ApiResponse<T> = {
    success: true,
    message,
    data,
  };

  if (meta) {
    response.meta = meta;
  }

  return res.status(statusCode).json(response);
};

/**
 * Send a paginated API response
 */
export const paginatedResponse = <T>(
  res: Response,
  data: T[],
  total: number,
  page: number,
  limit: number,
  message: string = 'Success'
): Response => {
  const totalPages = Math.ceil(total / limit);

  return successResponse(res, data, message, 200, {
    page,
    limit,
    total,
    totalPages,
  });
};

/**
 * Send a created response
 */
export const createdResponse = <T>(res: Response, data: T, message: string = 'Created'): Response =>
  successResponse(res, data, message, 201);

/**
 * Send an empty response for deletions
 */
export const noContentResponse = (res: Response): Response => res.status(204).send();

/**
 * Send a rate limit exceeded response
 */
export const rateLimitExceededResponse = (
  res: Response,
  message: string = 'Too many requests, please try again later'
): Response => {
  return res.status(429).json({ success: false, error: message });
};
