import { paginationKeys } from '../utils/pagination';
import { Joi, schemas } from '../utils/validation';

export interface ApiKeyBody {
  name: string;
  is_active?: boolean;
  expires_at?: Date | null;
}

export interface ApiKeyListQuery {
  page: number;
  limit: number;
  ordering?: string;
  search?: string;
}

const name = Joi.string().trim().min(3).max(100);

export const createApiKeySchema = Joi.object<ApiKeyBody>({
  name: name.required(),
  is_active: Joi.boolean(),
  expires_at: schemas.dateTime.allow(null),
});

export const updateApiKeySchema = Joi.object<Partial<ApiKeyBody>>({
  name,
  is_active: Joi.boolean(),
  expires_at: schemas.dateTime.allow(null),
});

export const listApiKeysSchema = Joi.object<ApiKeyListQuery>({
  ...paginationKeys,
  search: Joi.string().trim().allow(''),
});

export const API_KEY_ORDERING: Record<string, string> = {
  name: 'name',
  created_at: 'createdAt',
  last_used_at: 'lastUsedAt',
};
