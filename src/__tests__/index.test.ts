import { describe, it, expect, vi } from 'vitest';
import {
  AcledClient,
  CalendarDate,
  QueryBuilder,
  Region,
  Where,
  acledQueryToParameters,
  DEFAULT_PAGE_SIZE,
} from '../index.js';
import type { AcledQuery, Transport } from '../index.js';

describe('public API', () => {
  it('should encode the documented example query', () => {
    const query: AcledQuery = {
      region: Where.matches(Region.MiddleAfrica),
      date: Where.greaterThan(CalendarDate.of(2024, 2, 28)),
    };

    expect(acledQueryToParameters(query)).toEqual([
      ['region', '2'],
      ['event_date_where', '>'],
      ['event_date', '2024-02-28'],
    ]);
  });

  it('should use 5000 as the default page size', () => {
    expect(DEFAULT_PAGE_SIZE).toBe(5000);
  });

  it('should fetch through a builder query', async () => {
    const getJson = vi.fn<Transport['getJson']>().mockResolvedValueOnce({
      success: true,
      count: 0,
      data: [],
    });
    const client = new AcledClient({ key: 'test-key', email: 'test@example.com', transport: { getJson } });

    const events = await client.getAcled(
      new QueryBuilder<AcledQuery>().where('country', Where.matches('Germany'))
    );

    expect(events).toEqual([]);
    expect(getJson).toHaveBeenCalledWith('https://api.acleddata.com', 'acled/read', [
      ['country', 'Germany'],
      ['key', 'test-key'],
      ['email', 'test@example.com'],
    ]);
  });
});
