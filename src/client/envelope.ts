/**
 * Response envelope matching
 *
 * The API wraps every page in one of two objects and does not say which:
 *
 *   { success: true,  count: n, data: [...] }
 *   { success: false, count: 0, error: { message } }
 *
 * The success shape is tried first; the failure shape only when `data` is
 * not an array of well-formed records.
 */

import { z } from 'zod';
import type { Envelope } from './types.js';
import { ApiError, EnvelopeContractError } from './errors.js';

const errorShape = z.object({
  success: z.boolean(),
  count: z.number(),
  error: z.object({ message: z.string() }),
});

const dataShape = z.object({
  success: z.boolean(),
  count: z.number(),
  data: z.array(z.unknown()),
});

/** Every item must match; one bad item and the page is not a data page */
function parseRecords<Raw>(items: unknown[], record: z.ZodType<Raw>): Raw[] | null {
  const records: Raw[] = [];
  for (const item of items) {
    const parsed = record.safeParse(item);
    if (!parsed.success) {
      return null;
    }
    records.push(parsed.data);
  }
  return records;
}

/**
 * Work out which shape a page has
 *
 * @param body - Parsed JSON body
 * @param record - Schema of one raw record
 * @throws EnvelopeContractError if neither shape matches
 */
export function matchEnvelope<Raw>(body: unknown, record: z.ZodType<Raw>): Envelope<Raw> {
  const page = dataShape.safeParse(body);
  if (page.success) {
    const records = parseRecords(page.data.data, record);
    if (records !== null) {
      return { shape: 'data', success: page.data.success, count: page.data.count, data: records };
    }
  }

  const error = errorShape.safeParse(body);
  if (error.success) {
    return { shape: 'error', ...error.data };
  }

  throw new EnvelopeContractError(
    'Response matches neither the data nor the error envelope',
    body
  );
}

/**
 * Decode one page into typed records
 *
 * A single record that fails conversion fails the whole page.
 *
 * @param body - Parsed JSON body
 * @param record - Schema of one raw record
 * @param convert - Turns a raw record into a typed one, throwing ParseError
 * @throws ApiError when the page is the failure envelope
 * @throws EnvelopeContractError when `success`/`count` contradict the contents
 */
export function decodeEnvelope<Raw, R>(
  body: unknown,
  record: z.ZodType<Raw>,
  convert: (raw: Raw) => R
): R[] {
  const envelope = matchEnvelope(body, record);

  switch (envelope.shape) {
    case 'data':
      if (!envelope.success || envelope.count !== envelope.data.length) {
        throw new EnvelopeContractError(
          `Data envelope has success=${String(envelope.success)} and count=${String(envelope.count)} for ${String(envelope.data.length)} record(s)`,
          body
        );
      }
      return envelope.data.map(convert);

    case 'error':
      if (envelope.success || envelope.count !== 0) {
        throw new EnvelopeContractError(
          `Error envelope has success=${String(envelope.success)} and count=${String(envelope.count)}`,
          body
        );
      }
      throw new ApiError(envelope.error.message);
  }
}
