/**
 * Paged fetch with page-size backoff
 *
 * Walks an offset/limit search until the service reports `next_offset = -1`,
 * loading the detail record of every summary on the way. When the service
 * rejects the page size ("page limit exceeded") the size is halved and the
 * same offset is retried; reaching the floor is fatal.
 */

import { DomainApiError, PaginationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export const END_OF_RESULTS = -1;
export const DEFAULT_PAGE_SIZE = 32;
export const MIN_PAGE_SIZE = 2;

export interface PageRequest {
  offset: number;
  limit: number;
}

export interface Page<S> {
  items: readonly S[];
  nextOffset: number;
}

export interface AggregateOptions<S, D, K extends string> {
  fetchPage(request: PageRequest): Promise<Page<S>>;
  fetchDetail(summary: S): Promise<D>;
  /** Bucket for each detail record. */
  partition: (detail: D) => K;
  initialPageSize?: number;
  minPageSize?: number;
}

export function isPageLimitExceeded(error: unknown): error is DomainApiError {
  return error instanceof DomainApiError && error.message.toLowerCase().includes('page limit exceeded');
}

export async function aggregatePages<S, D, K extends string>(
  options: AggregateOptions<S, D, K>
): Promise<Map<K, D[]>> {
  const minPageSize = options.minPageSize ?? MIN_PAGE_SIZE;
  let pageSize = options.initialPageSize ?? DEFAULT_PAGE_SIZE;
  let offset = 0;

  const result = new Map<K, D[]>();

  for (;;) {
    let page: Page<S>;
    try {
      page = await options.fetchPage({ offset, limit: pageSize });
    } catch (error) {
      if (!isPageLimitExceeded(error)) {
        throw error;
      }

      const nextSize = Math.floor(pageSize / 2);
      if (nextSize <= minPageSize) {
        throw new PaginationError(
          `Page size backoff reached the floor (${minPageSize}) at offset ${offset}: ${error.message}`,
          nextSize,
          { cause: error }
        );
      }

      logger.debug(`Page limit exceeded at size ${pageSize}, retrying offset ${offset} with ${nextSize}`);
      pageSize = nextSize;
      continue;
    }

    for (const summary of page.items) {
      const detail = await options.fetchDetail(summary);
      const bucket = options.partition(detail);
      const collected = result.get(bucket);
      if (collected) {
        collected.push(detail);
      } else {
        result.set(bucket, [detail]);
      }
    }

    if (page.nextOffset === END_OF_RESULTS) {
      return result;
    }
    if (page.nextOffset <= offset) {
      throw new PaginationError(
        `Service returned next_offset ${page.nextOffset} at offset ${offset}; the walk would not advance`,
        pageSize
      );
    }
    offset = page.nextOffset;
  }
}
