import { describe, expect, it, vi } from 'vitest';
import { collect, type Page, paginate } from '../src/lib/pagination.js';

type Item = { id: string };

function pages(...list: Page<Item>[]) {
  return vi.fn(async (request: { cursor?: string; pageSize: number }) => {
    const index = request.cursor === undefined ? 0 : Number(request.cursor.replace('c', ''));
    const page = list[index];
    if (!page) {
      throw new Error(`No page for cursor ${request.cursor}`);
    }
    return page;
  });
}

const items = (...ids: string[]): Item[] => ids.map((id) => ({ id }));

describe('paginate', () => {
  it('follows cursors until the last page', async () => {
    const fetchPage = pages(
      { items: items('1', '2'), nextCursor: 'c1' },
      { items: items('3'), nextCursor: 'c2' },
      { items: [], nextCursor: 'c3' },
    );

    const result = await collect(paginate(fetchPage, { pageSize: 2 }));

    expect(result.map((item) => item.id)).toEqual(['1', '2', '3']);
    expect(fetchPage.mock.calls.map(([request]) => request.cursor)).toEqual([undefined, 'c1', 'c2']);
  });

  it('stops when the cursor repeats', async () => {
    const fetchPage = vi.fn(async () => ({ items: items('1'), nextCursor: 'same' }));
    const result = await collect(paginate(fetchPage, { pageSize: 1, keyOf: (item) => item.id }));

    expect(result).toEqual(items('1'));
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });

  it('stops without a next cursor', async () => {
    const fetchPage = pages({ items: items('1', '2') });
    expect(await collect(paginate(fetchPage, { pageSize: 5 }))).toEqual(items('1', '2'));
    expect(fetchPage).toHaveBeenCalledTimes(1);
  });

  it('drops items repeated across overlapping pages', async () => {
    const fetchPage = pages(
      { items: items('1', '2'), nextCursor: 'c1' },
      { items: items('2', '3') },
    );

    const result = await collect(paginate(fetchPage, { pageSize: 2, keyOf: (item) => item.id }));

    expect(result.map((item) => item.id)).toEqual(['1', '2', '3']);
  });

  it('stops at the limit without fetching further pages', async () => {
    const fetchPage = pages(
      { items: items('1', '2'), nextCursor: 'c1' },
      { items: items('3', '4'), nextCursor: 'c2' },
      { items: items('5') },
    );

    const result = await collect(paginate(fetchPage, { pageSize: 2, limit: 3 }));

    expect(result.map((item) => item.id)).toEqual(['1', '2', '3']);
    expect(fetchPage.mock.calls.map(([request]) => request.pageSize)).toEqual([2, 1]);
  });

  it('yields nothing for a non-positive limit', async () => {
    const fetchPage = pages({ items: items('1') });
    expect(await collect(paginate(fetchPage, { pageSize: 2, limit: 0 }))).toEqual([]);
    expect(fetchPage).not.toHaveBeenCalled();
  });

  it('is lazy: nothing is fetched until iteration starts', async () => {
    const fetchPage = pages({ items: items('1'), nextCursor: 'c1' }, { items: items('2') });
    const sequence = paginate(fetchPage, { pageSize: 1 });

    expect(fetchPage).not.toHaveBeenCalled();
    const first = await sequence.next();
    expect(first.value).toEqual({ id: '1' });
    expect(fetchPage).toHaveBeenCalledTimes(1);
  });

  it('keeps yielded items when a later page fails', async () => {
    const fetchPage = pages({ items: items('1'), nextCursor: 'c9' });
    const seen: string[] = [];

    await expect(
      (async () => {
        for await (const item of paginate(fetchPage, { pageSize: 1 })) {
          seen.push(item.id);
        }
      })(),
    ).rejects.toThrow('No page for cursor c9');
    expect(seen).toEqual(['1']);
  });
});
