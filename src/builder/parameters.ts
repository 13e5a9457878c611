/**
 * Parameter types for the scalars the API filters on
 */

import type { ParameterType } from './types.js';
import type { CalendarDate } from '../values/CalendarDate.js';
import type { Region } from '../values/Region.js';

/** Strings are sent verbatim */
export const stringParameter: ParameterType<string> = {
  render: (value) => value,
};

/**
 * Integers as decimal text
 *
 * @throws RangeError if the value is not a safe integer (`NaN`, `2020.5`, `1e21`)
 */
export const integerParameter: ParameterType<number> = {
  render: (value) => {
    if (!Number.isSafeInteger(value)) {
      throw new RangeError(`Not a safe integer: ${String(value)}`);
    }
    return String(value);
  },
};

/** Dates as `YYYY-MM-DD` */
export const dateParameter: ParameterType<CalendarDate> = {
  render: (value) => value.toString(),
};

/** Regions by numeric code, never by name */
export const regionParameter: ParameterType<Region> = {
  render: (value) => String(value),
};
