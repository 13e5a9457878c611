import { describe, it, expect, vi } from 'vitest';
import { collectPages, streamPages } from '../client/paginate.js';

function pagesOf(...pages: number[][]) {
  const fetchPage = vi.fn<(page: number) => Promise<number[]>>();
  for (const page of pages) {
    fetchPage.mockResolvedValueOnce(page);
  }
  return fetchPage;
}

describe('streamPages()', () => {
  it('should stop after a short first page', async () => {
    const fetchPage = pagesOf([1, 2]);

    const pages = await collectPages(streamPages(fetchPage, 3));

    expect(pages).toEqual([1, 2]);
    expect(fetchPage).toHaveBeenCalledTimes(1);
    expect(fetchPage).toHaveBeenCalledWith(1);
  });

  it('should continue while pages are full', async () => {
    const fetchPage = pagesOf([1, 2, 3], [4, 5, 6], [7]);

    const records = await collectPages(streamPages(fetchPage, 3));

    expect(records).toEqual([1, 2, 3, 4, 5, 6, 7]);
    expect(fetchPage).toHaveBeenCalledTimes(3);
    expect(fetchPage).toHaveBeenNthCalledWith(2, 2);
    expect(fetchPage).toHaveBeenNthCalledWith(3, 3);
  });

  it('should treat an empty page as the last', async () => {
    const fetchPage = pagesOf([1, 2], []);

    const records = await collectPages(streamPages(fetchPage, 2));

    expect(records).toEqual([1, 2]);
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });

  it('should not request the next page before the current one is consumed', async () => {
    const fetchPage = pagesOf([1, 2], [3]);
    const pages = streamPages(fetchPage, 2);

    const first = await pages.next();

    expect(first.value).toEqual([1, 2]);
    expect(fetchPage).toHaveBeenCalledTimes(1);

    await pages.return();
    expect(fetchPage).toHaveBeenCalledTimes(1);
  });
});

describe('collectPages()', () => {
  it('should reject with the first failure and return nothing', async () => {
    const failure = new Error('page 2 failed');
    const fetchPage = vi.fn<(page: number) => Promise<number[]>>()
      .mockResolvedValueOnce([1, 2])
      .mockRejectedValueOnce(failure);

    await expect(collectPages(streamPages(fetchPage, 2))).rejects.toBe(failure);
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });
});
