/**
 * The `deleted` endpoint: events removed from the dataset
 *
 * @example
 * ```typescript
 * const removed = await client.getDeleted({
 *   timestamp: Where.greaterThanOrEqual(1710025200),
 * });
 * ```
 */

import { z } from 'zod';
import type { QueryParameter, Where } from '../builder/types.js';
import { whereToParameters } from '../builder/Where.js';
import { integerParameter, stringParameter } from '../builder/parameters.js';
import { parseInteger } from '../values/scalars.js';
import type { Endpoint } from './types.js';
import { requireField } from './fields.js';

/** Query filters for the `deleted` endpoint; all optional */
export interface DeletedQuery {
  /** Event identifier (`event_id_cnty`) */
  id?: Where<string>;
  /** Deletion time as a unix timestamp (`deleted_timestamp`) */
  timestamp?: Where<number>;
}

/** An event returned by the `deleted` endpoint */
export interface DeletedEvent {
  /** Identifier of the deleted event. From `event_id_cnty`. */
  id: string;
  /** Unix timestamp of the deletion. From `deleted_timestamp`. */
  timestamp: number;
}

export const deletedRecordSchema = z.object({
  event_id_cnty: z.string(),
  deleted_timestamp: z.string(),
});

export type DeletedRecord = z.infer<typeof deletedRecordSchema>;

export function deletedQueryToParameters(query: DeletedQuery): QueryParameter[] {
  return [
    ...whereToParameters('event_id_cnty', query.id, stringParameter),
    ...whereToParameters('deleted_timestamp', query.timestamp, integerParameter),
  ];
}

export function toDeletedEvent(raw: DeletedRecord): DeletedEvent {
  return {
    id: raw.event_id_cnty,
    timestamp: requireField('deleted_timestamp', parseInteger(raw.deleted_timestamp)),
  };
}

export const deletedEndpoint: Endpoint<DeletedQuery, DeletedRecord, DeletedEvent> = {
  name: 'deleted',
  rawRecord: deletedRecordSchema,
  toParameters: deletedQueryToParameters,
  convert: toDeletedEvent,
};
