import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ApiKeyRecord, UserRecord } from '../repositories/types';
import { ApiKeyService } from '../services/apiKey.service';
import { AuthenticationError } from '../utils/errors';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      user?: UserRecord;
      apiKey?: ApiKeyRecord;
    }
  }
}

const AUTH_SCHEME = 'Api-Key';

/**
 * Pull the presented key from `Authorization: Api-Key <key>` or `X-API-Key`
 */
export const extractApiKey = (req: Request): string | undefined => {
  const header = req.get('authorization');
  if (header) {
    const [scheme, key] = header.trim().split(/\s+/, 2);
    if (scheme.toLowerCase() === AUTH_SCHEME.toLowerCase() && key) {
      return key;
    }
  }
  return req.get('x-api-key')?.trim() || undefined;
};

/**
 * Authenticate every request on the router with an API key
 */
export const protect = (apiKeys: ApiKeyService): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    const key = extractApiKey(req);
    if (!key) {
      next(new AuthenticationError());
      return;
    }

    apiKeys
      .authenticate(key)
      .then(({ user, apiKey }) => {
        req.user = user;
        req.apiKey = apiKey;
        next();
      })
      .catch(next);
  };
};

/**
 * The authenticated user; only valid behind `protect`
 */
export const getRequestUser = (req: Request): UserRecord => {
  if (!req.user) {
    throw new AuthenticationError();
  }
  return req.user;
};
