import { getLogger } from '@stateset/logger';
import { err, ok, type Result } from 'neverthrow';
import { z, type ZodType } from 'zod';

import type { QueryParams } from './core/http-utils.js';
import type { ApiError } from './errors.js';
import type { PaginateOptions } from './types.js';

const logger = getLogger('Pagination');

/**
 * Anything able to GET one page: the client's executor in production, a stub
 * in tests.
 */
export interface PageFetcher {
  fetchPage(
    target: string,
    query: QueryParams | undefined,
    signal: AbortSignal | undefined
  ): Promise<Result<unknown, ApiError>>;
}

const listEnvelopeSchema = z
  .object({
    data: z.array(z.unknown()),
    next: z.string().nullish(),
    next_page: z.string().nullish(),
  })
  .passthrough();

const countEnvelopeSchema = z.object({
  count: z.number().int().nonnegative().optional(),
  total_count: z.number().int().nonnegative().optional(),
});

const formatIssuePath = (index: number, path: (string | number)[]): string =>
  path.length === 0 ? String(index) : `${index}.${path.join('.')}`;

/**
 * Lazily walk a cursor-paginated list, yielding one Result per item.
 *
 * The first page is `endpoint` with `options.query`; every later page is the
 * server-provided cursor, used verbatim. A page-level failure is yielded once
 * and ends the sequence.
 */
export function paginate<T>(
  fetcher: PageFetcher,
  endpoint: string,
  options: PaginateOptions<T> & { schema: ZodType<T> }
): AsyncIterableIterator<Result<T, ApiError>>;
export function paginate(
  fetcher: PageFetcher,
  endpoint: string,
  options?: PaginateOptions<unknown>
): AsyncIterableIterator<Result<unknown, ApiError>>;
export async function* paginate(
  fetcher: PageFetcher,
  endpoint: string,
  options: PaginateOptions<unknown> = {}
): AsyncIterableIterator<Result<unknown, ApiError>> {
  const { schema, signal } = options;
  const stopOnItemError = options.onItemError === 'stop';

  let target = endpoint;
  let query = options.query;
  let pageNumber = 0;

  while (true) {
    pageNumber++;
    logger.debug(`Fetching page - Endpoint: ${endpoint}, Page: ${pageNumber}`);

    const pageResult = await fetcher.fetchPage(target, query, signal);
    if (pageResult.isErr()) {
      yield err(pageResult.error);
      return;
    }

    const envelope = listEnvelopeSchema.safeParse(pageResult.value);
    if (!envelope.success) {
      yield err({
        code: 'invalid_page',
        message: `Malformed list response: ${envelope.error.issues[0]?.message ?? 'unexpected shape'}`,
        type: 'validation',
      });
      return;
    }

    const { data } = envelope.data;
    for (const [index, item] of data.entries()) {
      if (!schema) {
        yield ok(item);
        continue;
      }

      const parsed = schema.safeParse(item);
      if (parsed.success) {
        yield ok(parsed.data);
        continue;
      }

      const issue = parsed.error.issues[0];
      yield err({
        code: 'invalid_item',
        field: formatIssuePath(index, issue?.path ?? []),
        message: issue?.message ?? 'Invalid item',
        type: 'validation',
      });
      if (stopOnItemError) {
        return;
      }
    }

    const cursor = envelope.data.next_page ?? envelope.data.next ?? undefined;
    if (data.length === 0 || !cursor || cursor === target) {
      logger.debug(`Pagination finished - Endpoint: ${endpoint}, Pages: ${pageNumber}`);
      return;
    }

    target = cursor;
    query = undefined;
  }
}

/**
 * Drain a paginated list into memory, stopping at the first error.
 */
export async function collectAll<T>(items: AsyncIterable<Result<T, ApiError>>): Promise<Result<T[], ApiError>> {
  const collected: T[] = [];
  for await (const item of items) {
    if (item.isErr()) {
      return err(item.error);
    }
    collected.push(item.value);
  }
  return ok(collected);
}

/**
 * Ask the server for the size of a list without fetching it.
 */
export async function count(
  fetcher: PageFetcher,
  endpoint: string,
  query: QueryParams = {},
  signal?: AbortSignal
): Promise<Result<number, ApiError>> {
  const result = await fetcher.fetchPage(endpoint, { ...query, count_only: true }, signal);
  if (result.isErr()) {
    return err(result.error);
  }

  const parsed = countEnvelopeSchema.safeParse(result.value);
  const total = parsed.success ? (parsed.data.count ?? parsed.data.total_count) : undefined;
  if (total === undefined) {
    return err({ code: 'invalid_response', message: 'Count response missing count field', type: 'validation' });
  }
  return ok(total);
}
