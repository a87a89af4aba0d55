// ABOUTME: Cursor-driven lazy sequences over list endpoints.
// ABOUTME: Cursors stay internal; a sequence restarts only by calling paginate again.

import type { Logger } from './logger.js';

export interface Page<T> {
  items: T[];
  nextCursor?: string;
}

export type PageFetcher<T> = (request: { cursor?: string; pageSize: number }) => Promise<Page<T>>;

export interface PaginateOptions<T> {
  pageSize: number;
  limit?: number;
  /** Identity used to drop items an overlapping page repeats. */
  keyOf?: (item: T) => string;
  logger?: Logger;
  label?: string;
}

/**
 * Lazily walk a cursor-paginated endpoint. Page N+1 is requested only after
 * page N resolved; a failed page rejects the pending `next()` call and ends
 * the sequence, leaving items already yielded untouched.
 */
export async function* paginate<T>(fetchPage: PageFetcher<T>, options: PaginateOptions<T>): AsyncGenerator<T, void> {
  const { pageSize, limit, keyOf, logger, label = 'paginate' } = options;
  if (limit !== undefined && limit <= 0) {
    return;
  }

  const seen = new Set<string>();
  let cursor: string | undefined;
  let yielded = 0;
  let page = 0;

  while (true) {
    const requestSize = limit === undefined ? pageSize : Math.min(pageSize, limit - yielded);
    const result = await fetchPage({ cursor, pageSize: requestSize });
    page += 1;
    logger?.debug('pagination', 'page_fetched', { label, page, items: result.items.length });

    for (const item of result.items) {
      if (keyOf) {
        const key = keyOf(item);
        if (seen.has(key)) {
          continue;
        }
        seen.add(key);
      }
      yield item;
      yielded += 1;
      if (limit !== undefined && yielded >= limit) {
        return;
      }
    }

    const next = result.nextCursor;
    // A bottom cursor comes back even on the last page, so an empty page also ends the walk.
    if (!next || next === cursor || result.items.length === 0) {
      return;
    }
    cursor = next;
  }
}

export async function collect<T>(sequence: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of sequence) {
    items.push(item);
  }
  return items;
}
