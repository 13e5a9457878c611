/**
 * Builder module - Per-field filters and their query parameter encoding
 */

export { QueryBuilder } from './QueryBuilder.js';
export { Where, whereToParameters, RANGE_SEPARATOR } from './Where.js';
export {
  stringParameter,
  integerParameter,
  dateParameter,
  regionParameter,
} from './parameters.js';
export type {
  QueryParameter,
  WhereOperator,
  ParameterType,
  FilterMap,
  UnspecifiedFilter,
  MatchesFilter,
  EqualFilter,
  LikeFilter,
  GreaterThanFilter,
  GreaterThanOrEqualFilter,
  BetweenFilter,
} from './types.js';
