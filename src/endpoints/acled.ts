/**
 * The `acled` endpoint: conflict and protest events
 *
 * @example
 * ```typescript
 * // All events in Afghanistan since 2022
 * const events = await client.getAcled({
 *   country: Where.matches('Afghanistan'),
 *   year: Where.greaterThanOrEqual(2022),
 * });
 * ```
 */

import { z } from 'zod';
import type { QueryParameter, Where } from '../builder/types.js';
import { whereToParameters } from '../builder/Where.js';
import {
  dateParameter,
  integerParameter,
  regionParameter,
  stringParameter,
} from '../builder/parameters.js';
import { CalendarDate } from '../values/CalendarDate.js';
import { parseRegion } from '../values/Region.js';
import type { Region } from '../values/Region.js';
import { parseDecimal, parseInteger } from '../values/scalars.js';
import type { Endpoint } from './types.js';
import { requireField } from './fields.js';

/** Query filters for the `acled` endpoint; all optional */
export interface AcledQuery {
  /** Country or territory name (`country`) */
  country?: Where<string>;
  /** Event identifier (`event_id_cnty`) */
  id?: Where<string>;
  /** Year the event took place (`year`) */
  year?: Where<number>;
  /** Region, sent by its numeric code (`region`) */
  region?: Where<Region>;
  /** Date the event took place (`event_date`) */
  date?: Where<CalendarDate>;
  /** Upload time as a unix timestamp (`timestamp`) */
  timestamp?: Where<number>;
}

/** An event returned by the `acled` endpoint */
export interface AcledEvent {
  /**
   * Event identifier: a number plus the country acronym. Stays the same when
   * the event is updated. From `event_id_cnty`.
   */
  id: string;
  /** Unix timestamp of the last upload of this event */
  timestamp: number;
  /** Date the event took place. From `event_date`. */
  date: CalendarDate;
  /** Nature of the event */
  eventType: string;
  /** Subcategory of `eventType`. From `sub_event_type`. */
  subEventType: string;
  /** Disorder category the event belongs to */
  disorderType: string;
  region: Region;
  /** Country or territory the event took place in */
  country: string;
  /** First-level sub-national region. From `admin1`. */
  administrativeRegion: string;
  latitude: number;
  longitude: number;
  /** Short description. From `notes`. */
  note: string;
}

/** An `acled` record as sent */
export const acledRecordSchema = z.object({
  event_id_cnty: z.string(),
  event_date: z.string(),
  timestamp: z.string(),
  disorder_type: z.string(),
  event_type: z.string(),
  sub_event_type: z.string(),
  country: z.string(),
  region: z.string(),
  admin1: z.string(),
  latitude: z.string(),
  longitude: z.string(),
  notes: z.string(),
});

export type AcledRecord = z.infer<typeof acledRecordSchema>;

/**
 * Encode an `acled` query
 *
 * Order: country, event_id_cnty, year, region, event_date, timestamp
 */
export function acledQueryToParameters(query: AcledQuery): QueryParameter[] {
  return [
    ...whereToParameters('country', query.country, stringParameter),
    ...whereToParameters('event_id_cnty', query.id, stringParameter),
    ...whereToParameters('year', query.year, integerParameter),
    ...whereToParameters('region', query.region, regionParameter),
    ...whereToParameters('event_date', query.date, dateParameter),
    ...whereToParameters('timestamp', query.timestamp, integerParameter),
  ];
}

/**
 * Convert a raw `acled` record
 *
 * @throws ParseError for the first of event_date, timestamp, region,
 *   latitude, longitude that does not parse
 */
export function toAcledEvent(raw: AcledRecord): AcledEvent {
  const date = requireField('event_date', CalendarDate.parse(raw.event_date));
  const timestamp = requireField('timestamp', parseInteger(raw.timestamp));
  const region = requireField('region', parseRegion(raw.region));
  const latitude = requireField('latitude', parseDecimal(raw.latitude));
  const longitude = requireField('longitude', parseDecimal(raw.longitude));

  return {
    id: raw.event_id_cnty,
    timestamp,
    date,
    eventType: raw.event_type,
    subEventType: raw.sub_event_type,
    disorderType: raw.disorder_type,
    region,
    country: raw.country,
    administrativeRegion: raw.admin1,
    latitude,
    longitude,
    note: raw.notes,
  };
}

export const acledEndpoint: Endpoint<AcledQuery, AcledRecord, AcledEvent> = {
  name: 'acled',
  rawRecord: acledRecordSchema,
  toParameters: acledQueryToParameters,
  convert: toAcledEvent,
};
