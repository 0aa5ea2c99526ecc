import { describe, it, expect } from '@jest/globals';
import { getPaginationOptions, parseOrdering } from '../pagination';

const allowed = { name: 'name', created_at: 'createdAt' };

describe('parseOrdering', () => {
  it('maps public fields and honours a leading minus', () => {
    expect(parseOrdering('-created_at,name', allowed, { name: 1 })).toEqual({ createdAt: -1, name: 1 });
  });

  it('ignores unknown fields and falls back to the default', () => {
    expect(parseOrdering('password', allowed, { name: 1 })).toEqual({ name: 1 });
    expect(parseOrdering(undefined, allowed, { createdAt: -1 })).toEqual({ createdAt: -1 });
  });

  it('does not resolve inherited object properties as fields', () => {
    expect(parseOrdering('constructor,-toString', allowed, { name: 1 })).toEqual({ name: 1 });
    expect(parseOrdering('__proto__,-name', allowed, { createdAt: -1 })).toEqual({ name: -1 });
  });
});

describe('getPaginationOptions', () => {
  it('derives the offset from page and limit', () => {
    expect(getPaginationOptions({ page: 3, limit: 20 }, allowed, { name: 1 })).toEqual({
      page: 3,
      limit: 20,
      skip: 40,
      sort: { name: 1 },
    });
  });
});
