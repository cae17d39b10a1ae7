import { err, ok, type Result } from 'neverthrow';

import type { QueryParams } from './core/http-utils.js';
import type { ValidationError } from './errors.js';

export type SortDirection = 'asc' | 'desc';

export const MAX_PAGE_SIZE = 1000;

/**
 * Fluent builder for the common list parameters (`limit`, `page`, `cursor`,
 * `sort_by`, `sort_direction`, `expand`) plus arbitrary filters.
 */
export class ListQuery {
  private readonly params: QueryParams = {};

  limit(limit: number): this {
    this.params['limit'] = limit;
    return this;
  }

  page(page: number): this {
    this.params['page'] = page;
    return this;
  }

  cursor(cursor: string): this {
    this.params['cursor'] = cursor;
    return this;
  }

  sortBy(field: string): this {
    this.params['sort_by'] = field;
    return this;
  }

  sortDirection(direction: SortDirection): this {
    this.params['sort_direction'] = direction;
    return this;
  }

  expand(fields: readonly string[]): this {
    this.params['expand'] = fields;
    return this;
  }

  param(key: string, value: string | number | boolean): this {
    this.params[key] = value;
    return this;
  }

  validate(): Result<this, ValidationError> {
    const limit = this.params['limit'];
    if (typeof limit === 'number' && (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGE_SIZE)) {
      return err({
        field: 'limit',
        message: `Limit must be between 1 and ${MAX_PAGE_SIZE}`,
        type: 'validation',
      });
    }

    const page = this.params['page'];
    if (typeof page === 'number' && (!Number.isInteger(page) || page < 1)) {
      return err({ field: 'page', message: 'Page must be at least 1', type: 'validation' });
    }

    return ok(this);
  }

  build(): QueryParams {
    return { ...this.params };
  }
}
