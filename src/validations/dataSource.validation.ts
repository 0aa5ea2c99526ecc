import { SOURCE_TYPES, SourceType, KeyValueMap } from '../repositories/types';
import { paginationKeys } from '../utils/pagination';
import { Joi, schemas } from '../utils/validation';

export interface DataSourceBody {
  name: string;
  source_type: SourceType;
  connection_string: string;
  is_active?: boolean;
  metadata?: KeyValueMap;
}

export interface DataSourceListQuery {
  page: number;
  limit: number;
  ordering?: string;
  search?: string;
  source_type?: SourceType;
  is_active?: boolean;
}

const name = Joi.string().trim().max(100);
const sourceType = Joi.string().valid(...SOURCE_TYPES);
const connectionString = Joi.string();

export const createDataSourceSchema = Joi.object<DataSourceBody>({
  name: name.required(),
  source_type: sourceType.required(),
  connection_string: connectionString.required(),
  is_active: Joi.boolean(),
  metadata: schemas.keyValueMap,
});

// PATCH semantics: every field optional
export const updateDataSourceSchema = Joi.object<Partial<DataSourceBody>>({
  name,
  source_type: sourceType,
  connection_string: connectionString,
  is_active: Joi.boolean(),
  metadata: schemas.keyValueMap,
});

export const listDataSourcesSchema = Joi.object<DataSourceListQuery>({
  ...paginationKeys,
  search: Joi.string().trim().allow(''),
  source_type: sourceType,
  is_active: schemas.queryBoolean,
});

export const DATA_SOURCE_ORDERING: Record<string, string> = {
  name: 'name',
  created_at: 'createdAt',
  source_type: 'sourceType',
};
