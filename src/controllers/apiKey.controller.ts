import { Request, Response } from 'express';
import { pickBy } from 'lodash';
import { AppContext } from '../container';
import { getRequestUser } from '../middleware/auth';
import { ApiKeyUpdate } from '../repositories/types';
import { serializeApiKey } from '../serializers/apiKey.serializer';
import { createdResponse, noContentResponse, paginatedResponse, successResponse } from '../utils/apiResponse';
import { asyncHandler } from '../utils/asyncHandler';
import { getPaginationOptions } from '../utils/pagination';
import { parseInput } from '../utils/validation';
import {
  API_KEY_ORDERING,
  ApiKeyBody,
  createApiKeySchema,
  listApiKeysSchema,
  updateApiKeySchema,
} from '../validations/apiKey.validation';

const toUpdate = (body: Partial<ApiKeyBody>): ApiKeyUpdate =>
  pickBy({ name: body.name, isActive: body.is_active, expiresAt: body.expires_at }, (value) => value !== undefined);

export const createApiKeyController = ({ apiKeys }: AppContext) => ({
  // @desc    List the caller's API keys
  // @route   GET /keys
  // @access  Private
  list: asyncHandler(async (req: Request, res: Response) => {
    const user = getRequestUser(req);
    const query = parseInput(listApiKeysSchema, req.query);
    const options = getPaginationOptions(query, API_KEY_ORDERING, { createdAt: -1 });

    const page = await apiKeys.list(user.id, query.search || undefined, options);
    return paginatedResponse(
      res,
      page.items.map((apiKey) => serializeApiKey(apiKey, user)),
      page.total,
      page.page,
      page.limit
    );
  }),

  // @desc    Issue an API key for the caller
  // @route   POST /keys
  // @access  Private
  create: asyncHandler(async (req: Request, res: Response) => {
    const user = getRequestUser(req);
    const body = parseInput(createApiKeySchema, req.body);
    const apiKey = await apiKeys.create(user.id, {
      name: body.name,
      isActive: body.is_active,
      expiresAt: body.expires_at,
    });
    return createdResponse(res, serializeApiKey(apiKey, user), 'API key created');
  }),

  // @desc    Get one of the caller's API keys
  // @route   GET /keys/:id
  // @access  Private
  get: asyncHandler(async (req: Request, res: Response) => {
    const user = getRequestUser(req);
    const apiKey = await apiKeys.get(user.id, req.params.id);
    return successResponse(res, serializeApiKey(apiKey, user));
  }),

  // @desc    Replace an API key's name, state and expiry
  // @route   PUT /keys/:id
  // @access  Private
  replace: asyncHandler(async (req: Request, res: Response) => {
    const user = getRequestUser(req);
    const body = parseInput(createApiKeySchema, req.body);
    const apiKey = await apiKeys.update(user.id, req.params.id, toUpdate(body));
    return successResponse(res, serializeApiKey(apiKey, user), 'API key updated');
  }),

  // @desc    Partially update an API key
  // @route   PATCH /keys/:id
  // @access  Private
  update: asyncHandler(async (req: Request, res: Response) => {
    const user = getRequestUser(req);
    const body = parseInput(updateApiKeySchema, req.body);
    const apiKey = await apiKeys.update(user.id, req.params.id, toUpdate(body));
    return successResponse(res, serializeApiKey(apiKey, user), 'API key updated');
  }),

  // @desc    Revoke an API key
  // @route   DELETE /keys/:id
  // @access  Private
  remove: asyncHandler(async (req: Request, res: Response) => {
    const user = getRequestUser(req);
    await apiKeys.delete(user.id, req.params.id);
    return noContentResponse(res);
  }),
});
