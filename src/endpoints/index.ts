/**
 * Endpoints module - Query types, record types and converters per endpoint
 */

export {
  acledEndpoint,
  acledRecordSchema,
  acledQueryToParameters,
  toAcledEvent,
} from './acled.js';
export type { AcledQuery, AcledEvent, AcledRecord } from './acled.js';
export {
  deletedEndpoint,
  deletedRecordSchema,
  deletedQueryToParameters,
  toDeletedEvent,
} from './deleted.js';
export type { DeletedQuery, DeletedEvent, DeletedRecord } from './deleted.js';
export type { Endpoint } from './types.js';
