import Joi from 'joi';

// Default pagination values
const DEFAULT_PAGE = 1;
const DEFAULT_LIMIT = 10;
const MAX_LIMIT = 100;

export type SortDirection = 1 | -1;
export type SortSpec = Record<string, SortDirection>;

/**
 * Pagination options handed to repositories
 */
export interface PaginationOptions {
  page: number;
  limit: number;
  skip: number;
  sort: SortSpec;
}

export interface Page<T> {
  items: T[];
  total: number;
  page: number;
  limit: number;
}

/**
 * Joi keys shared by every list endpoint's query schema
 */
const paginationKeys = {
  page: Joi.number().integer().min(1).default(DEFAULT_PAGE),
  limit: Joi.number().integer().min(1).max(MAX_LIMIT).default(DEFAULT_LIMIT),
  ordering: Joi.string().trim().allow(''),
};

/**
 * Parse an ordering parameter such as `-created_at,name` into a sort spec.
 * `allowed` maps the public field name to the stored field; unknown fields are ignored.
 */
const parseOrdering = (
  ordering: string | undefined,
  allowed: Record<string, string>,
  defaultSort: SortSpec
): SortSpec => {
  if (!ordering) {
    return defaultSort;
  }

  const sort: SortSpec = {};
  for (const raw of ordering.split(',')) {
    const token = raw.trim();
    const descending = token.startsWith('-');
    const key = descending ? token.slice(1) : token;
    if (Object.hasOwn(allowed, key)) {
      sort[allowed[key]] = descending ? -1 : 1;
    }
  }

  return Object.keys(sort).length > 0 ? sort : defaultSort;
};

/**
 * Build pagination options from validated query values
 */
const getPaginationOptions = (
  query: { page: number; limit: number; ordering?: string },
  allowed: Record<string, string>,
  defaultSort: SortSpec
): PaginationOptions => {
  const { page, limit } = query;

  return {
    page,
    limit,
    skip: (page - 1) * limit,
    sort: parseOrdering(query.ordering, allowed, defaultSort),
  };
};

export {
  paginationKeys,
  parseOrdering,
  getPaginationOptions,
  DEFAULT_PAGE,
  DEFAULT_LIMIT,
  MAX_LIMIT,
};
