/**
 * Core type definitions for the query builder module
 */

/** A single URL query parameter, kept as an ordered pair */
export type QueryParameter = readonly [key: string, value: string];

/** Operators sent in the `<field>_where` parameter */
export type WhereOperator = '=' | 'LIKE' | '>' | '>=' | 'BETWEEN';

/** Field is left out of the query */
export interface UnspecifiedFilter {
  readonly kind: 'unspecified';
}

/** Uses whatever comparison the API configures for the field (usually `=` or `LIKE`) */
export interface MatchesFilter<T> {
  readonly kind: 'matches';
  readonly value: T;
}

/** Exact match (`=`) */
export interface EqualFilter<T> {
  readonly kind: 'equal';
  readonly value: T;
}

/** Pattern match (`LIKE`); `*` is the wildcard */
export interface LikeFilter<T> {
  readonly kind: 'like';
  readonly value: T;
}

/** Numeric or date value is greater than (`>`) */
export interface GreaterThanFilter<T> {
  readonly kind: 'greaterThan';
  readonly value: T;
}

/** Numeric or date value is greater than or equal (`>=`) */
export interface GreaterThanOrEqualFilter<T> {
  readonly kind: 'greaterThanOrEqual';
  readonly value: T;
}

/** Inclusive range (`BETWEEN`) */
export interface BetweenFilter<T> {
  readonly kind: 'between';
  readonly from: T;
  readonly to: T;
}

/** Union of all per-field filters */
export type Where<T> =
  | UnspecifiedFilter
  | MatchesFilter<T>
  | EqualFilter<T>
  | LikeFilter<T>
  | GreaterThanFilter<T>
  | GreaterThanOrEqualFilter<T>
  | BetweenFilter<T>;

/**
 * Renders one kind of scalar as query parameter text
 *
 * Each query field names its parameter type, so encoding never has to
 * inspect a value at run time to know how to print it.
 */
export interface ParameterType<T> {
  render(value: T): string;
}

/** Shape shared by all endpoint query types: every field optional */
export type FilterMap<Q> = { [K in keyof Q]?: Where<unknown> };
