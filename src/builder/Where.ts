/**
 * Where - Constructors and encoding for per-field filters
 *
 * Every filter becomes at most two query parameters: the operator in
 * `<field>_where` (omitted for `matches`) followed by the value in `<field>`.
 *
 * @example
 * ```typescript
 * whereToParameters('event_date', Where.greaterThan(CalendarDate.of(2024, 2, 28)), dateParameter);
 * // [['event_date_where', '>'], ['event_date', '2024-02-28']]
 * ```
 */

import type {
  ParameterType,
  QueryParameter,
  UnspecifiedFilter,
  Where as WhereFilter,
  WhereOperator,
} from './types.js';

export type Where<T> = WhereFilter<T>;

const UNSPECIFIED: UnspecifiedFilter = { kind: 'unspecified' };

/** Separator between the two ends of a `between` range */
export const RANGE_SEPARATOR = '|';

export const Where = {
  unspecified<T>(): WhereFilter<T> {
    return UNSPECIFIED;
  },
  matches<T>(value: T): WhereFilter<T> {
    return { kind: 'matches', value };
  },
  equal<T>(value: T): WhereFilter<T> {
    return { kind: 'equal', value };
  },
  like<T>(value: T): WhereFilter<T> {
    return { kind: 'like', value };
  },
  greaterThan<T>(value: T): WhereFilter<T> {
    return { kind: 'greaterThan', value };
  },
  greaterThanOrEqual<T>(value: T): WhereFilter<T> {
    return { kind: 'greaterThanOrEqual', value };
  },
  between<T>(from: T, to: T): WhereFilter<T> {
    return { kind: 'between', from, to };
  },
} as const;

/**
 * Converts one field's filter into query parameters
 *
 * @param name - Parameter name of the field as the API knows it
 * @param filter - The filter; undefined is treated as unspecified
 * @param type - How values of this field are rendered
 * @throws RangeError if an integer field holds a value that is not a safe integer
 */
export function whereToParameters<T>(
  name: string,
  filter: WhereFilter<T> | undefined,
  type: ParameterType<T>
): QueryParameter[] {
  if (filter === undefined) {
    return [];
  }

  const withOperator = (operator: WhereOperator, value: string): QueryParameter[] => [
    [`${name}_where`, operator],
    [name, value],
  ];

  switch (filter.kind) {
    case 'unspecified':
      return [];
    case 'matches':
      return [[name, type.render(filter.value)]];
    case 'equal':
      return withOperator('=', type.render(filter.value));
    case 'like':
      return withOperator('LIKE', type.render(filter.value));
    case 'greaterThan':
      return withOperator('>', type.render(filter.value));
    case 'greaterThanOrEqual':
      return withOperator('>=', type.render(filter.value));
    case 'between':
      return withOperator(
        'BETWEEN',
        `${type.render(filter.from)}${RANGE_SEPARATOR}${type.render(filter.to)}`
      );
  }
}
