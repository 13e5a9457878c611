import type { AcledRecord } from '../../endpoints/acled.js';
import type { DeletedRecord } from '../../endpoints/deleted.js';

export function acledRecord(overrides: Partial<AcledRecord> = {}): AcledRecord {
  return {
    event_id_cnty: 'SDN1001',
    event_date: '2024-03-01',
    timestamp: '1709300000',
    disorder_type: 'Political violence',
    event_type: 'Battles',
    sub_event_type: 'Armed clash',
    country: 'Sudan',
    region: 'Northern Africa',
    admin1: 'Khartoum',
    latitude: '15.5007',
    longitude: '32.5599',
    notes: 'Test event.',
    ...overrides,
  };
}

export function deletedRecord(id: string, deletedTimestamp = '1710025200'): DeletedRecord {
  return { event_id_cnty: id, deleted_timestamp: deletedTimestamp };
}

/** `count` deleted records with ids `${prefix}0`, `${prefix}1`, ... */
export function deletedRecords(count: number, prefix = 'DEL'): DeletedRecord[] {
  return Array.from({ length: count }, (_, index) => deletedRecord(`${prefix}${String(index)}`));
}

export function dataEnvelope(data: unknown[]): Record<string, unknown> {
  return { status: 200, success: true, count: data.length, data };
}

export function errorEnvelope(message: string): Record<string, unknown> {
  return { status: 400, success: false, count: 0, error: { message } };
}
