import { err, ok, type Result } from 'neverthrow';
import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';

import type { QueryParams } from '../core/http-utils.js';
import type { ApiError } from '../errors.js';
import { collectAll, count, paginate, type PageFetcher } from '../pagination.js';

const notFound: ApiError = { type: 'not_found' };
const serverError: ApiError = { code: 500, message: 'boom', type: 'api' };

/**
 * Serves canned page bodies keyed by target (endpoint or cursor)
 */
const stubFetcher = (pages: Record<string, Result<unknown, ApiError>>) => {
  const calls: { query: QueryParams | undefined; target: string }[] = [];
  const fetcher: PageFetcher = {
    fetchPage: vi.fn((target: string, query: QueryParams | undefined) => {
      calls.push({ query, target });
      return Promise.resolve(pages[target] ?? err(notFound));
    }),
  };
  return { calls, fetcher };
};

const drain = async <T>(items: AsyncIterable<T>): Promise<T[]> => {
  const collected: T[] = [];
  for await (const item of items) {
    collected.push(item);
  }
  return collected;
};

const itemSchema = z.object({ id: z.string() });

describe('paginate', () => {
  it('should follow next_page across pages and yield items in order', async () => {
    const { calls, fetcher } = stubFetcher({
      '/orders': ok({ data: [{ id: 'a' }, { id: 'b' }], next_page: '/orders?cursor=2' }),
      '/orders?cursor=2': ok({ data: [{ id: 'c' }], next_page: null }),
    });

    const results = await drain(paginate(fetcher, '/orders', { query: { limit: 2 }, schema: itemSchema }));

    expect(results.map((r) => r._unsafeUnwrap().id)).toEqual(['a', 'b', 'c']);
    expect(calls).toEqual([
      { query: { limit: 2 }, target: '/orders' },
      { query: undefined, target: '/orders?cursor=2' },
    ]);
  });

  it('should yield nothing for an empty first page', async () => {
    const { calls, fetcher } = stubFetcher({ '/orders': ok({ data: [], next_page: '/orders?cursor=2' }) });

    expect(await drain(paginate(fetcher, '/orders'))).toEqual([]);
    expect(calls).toHaveLength(1);
  });

  it('should fall back to next when next_page is absent', async () => {
    const { fetcher } = stubFetcher({
      '/orders': ok({ data: [{ id: 'a' }], next: 'https://api.example.com/orders?cursor=x' }),
      'https://api.example.com/orders?cursor=x': ok({ data: [{ id: 'b' }] }),
    });

    const items = await collectAll(paginate(fetcher, '/orders', { schema: itemSchema }));
    expect(items._unsafeUnwrap()).toEqual([{ id: 'a' }, { id: 'b' }]);
  });

  it('should prefer next_page over next', async () => {
    const { calls, fetcher } = stubFetcher({
      '/orders': ok({ data: [{ id: 'a' }], next: '/wrong', next_page: '/right' }),
      '/right': ok({ data: [{ id: 'b' }] }),
    });

    await drain(paginate(fetcher, '/orders'));
    expect(calls.map((call) => call.target)).toEqual(['/orders', '/right']);
  });

  it('should stop when the cursor points at the page just fetched', async () => {
    const { calls, fetcher } = stubFetcher({ '/orders': ok({ data: [{ id: 'a' }], next_page: '/orders' }) });

    expect(await drain(paginate(fetcher, '/orders'))).toHaveLength(1);
    expect(calls).toHaveLength(1);
  });

  it('should yield a page error once and end', async () => {
    const { fetcher } = stubFetcher({
      '/orders': ok({ data: [{ id: 'a' }], next_page: '/orders?cursor=2' }),
      '/orders?cursor=2': err(serverError),
    });

    const results = await drain(paginate(fetcher, '/orders', { schema: itemSchema }));

    expect(results).toHaveLength(2);
    expect(results[0]?._unsafeUnwrap()).toEqual({ id: 'a' });
    expect(results[1]?._unsafeUnwrapErr()).toEqual({ code: 500, message: 'boom', type: 'api' });
  });

  it('should report an invalid item and keep going by default', async () => {
    const { fetcher } = stubFetcher({
      '/orders': ok({ data: [{ id: 'a' }, { id: 42 }, { id: 'c' }] }),
    });

    const results = await drain(paginate(fetcher, '/orders', { schema: itemSchema }));

    expect(results).toHaveLength(3);
    expect(results[1]?._unsafeUnwrapErr()).toMatchObject({ code: 'invalid_item', field: '1.id', type: 'validation' });
    expect(results[2]?._unsafeUnwrap()).toEqual({ id: 'c' });
  });

  it('should stop after an invalid item when asked to', async () => {
    const { fetcher } = stubFetcher({
      '/orders': ok({ data: [{ id: 'a' }, { id: 42 }, { id: 'c' }] }),
    });

    const results = await drain(paginate(fetcher, '/orders', { onItemError: 'stop', schema: itemSchema }));

    expect(results).toHaveLength(2);
    expect(results[1]?.isErr()).toBe(true);
  });

  it('should reject a body without a data array', async () => {
    const { fetcher } = stubFetcher({ '/orders': ok({ items: [] }) });

    const results = await drain(paginate(fetcher, '/orders'));

    expect(results).toHaveLength(1);
    expect(results[0]?._unsafeUnwrapErr()).toMatchObject({ code: 'invalid_page', type: 'validation' });
  });

  it('should not fetch anything until iterated', () => {
    const { fetcher } = stubFetcher({});
    paginate(fetcher, '/orders');
    expect(fetcher.fetchPage).not.toHaveBeenCalled();
  });
});

describe('collectAll', () => {
  it('should return the first error', async () => {
    const { fetcher } = stubFetcher({});
    const result = await collectAll(paginate(fetcher, '/orders'));
    expect(result._unsafeUnwrapErr()).toEqual({ type: 'not_found' });
  });
});

describe('count', () => {
  it('should request count_only and read count', async () => {
    const fetchPage = vi.fn().mockResolvedValue(ok({ count: 17 }));
    const result = await count({ fetchPage }, '/orders', { status: 'open' });

    expect(result._unsafeUnwrap()).toBe(17);
    expect(fetchPage).toHaveBeenCalledWith('/orders', { count_only: true, status: 'open' }, undefined);
  });

  it('should accept total_count', async () => {
    const fetchPage = vi.fn().mockResolvedValue(ok({ total_count: 3 }));
    expect((await count({ fetchPage }, '/orders'))._unsafeUnwrap()).toBe(3);
  });

  it('should fail when neither field is present', async () => {
    const fetchPage = vi.fn().mockResolvedValue(ok({ data: [] }));
    expect((await count({ fetchPage }, '/orders'))._unsafeUnwrapErr()).toMatchObject({
      code: 'invalid_response',
      type: 'validation',
    });
  });
});
