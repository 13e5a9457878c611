/**
 * Page-number pagination
 *
 * The API has no "more pages" flag. A page shorter than the page size is the
 * last one, so the page size here has to be the one the API serves.
 */

/** Rows per page the API returns when no `limit` is sent */
export const DEFAULT_PAGE_SIZE = 5000;

/**
 * Request pages 1, 2, ... one at a time until a short page
 *
 * The next page is requested only after the previous one has been yielded.
 * An empty page counts as short.
 *
 * @param fetchPage - Fetches and decodes one page (1-based)
 * @param pageSize - A page with fewer records than this is the last
 */
export async function* streamPages<R>(
  fetchPage: (page: number) => Promise<R[]>,
  pageSize: number
): AsyncGenerator<R[], void, undefined> {
  for (let page = 1; ; page++) {
    const records = await fetchPage(page);
    yield records;

    if (records.length < pageSize) {
      return;
    }
  }
}

/**
 * Collect every page into one array, in arrival order
 *
 * Rejects with the first error; records from earlier pages are dropped.
 */
export async function collectPages<R>(pages: AsyncIterable<R[]>): Promise<R[]> {
  const all: R[] = [];
  for await (const records of pages) {
    for (const record of records) {
      all.push(record);
    }
  }
  return all;
}
