/**
 * QueryBuilder - Fluent interface for assembling an endpoint query
 *
 * A plain object literal works just as well; the builder is for queries put
 * together step by step, or derived from a shared base with `clone()`.
 *
 * @example
 * ```typescript
 * const base = new QueryBuilder<AcledQuery>()
 *   .where('country', Where.matches('Sudan'));
 *
 * const recent = base.clone()
 *   .where('date', Where.greaterThanOrEqual(CalendarDate.of(2024, 1, 1)));
 *
 * const events = await client.getAcled(recent);
 * ```
 */

import type { FilterMap } from './types.js';

export class QueryBuilder<Q extends FilterMap<Q>> {
  private filters: Partial<Q> = {};

  /**
   * Set the filter for a field, replacing any earlier one
   *
   * @example
   * .where('year', Where.between(2020, 2023))
   */
  where<K extends keyof Q>(field: K, filter: Q[K]): this {
    this.filters[field] = filter;
    return this;
  }

  /**
   * Drop the filter for a field
   */
  clear(field: keyof Q): this {
    delete this.filters[field];
    return this;
  }

  /**
   * The query as a plain object; fields never set are absent
   */
  build(): Partial<Q> {
    return { ...this.filters };
  }

  /**
   * Clone this query builder (useful for creating variants)
   */
  clone(): QueryBuilder<Q> {
    const copy = new QueryBuilder<Q>();
    copy.filters = { ...this.filters };
    return copy;
  }
}
