/**
 * Everything the client needs to know about one endpoint
 */

import type { z } from 'zod';
import type { QueryParameter } from '../builder/types.js';

export interface Endpoint<Q, Raw, R> {
  /** Path segment, e.g. 'acled' for `/acled/read` */
  readonly name: string;

  /** Shape of one record as sent: every scalar a string */
  readonly rawRecord: z.ZodType<Raw>;

  /** Encode a query; field order is fixed per endpoint */
  toParameters(query: Partial<Q>): QueryParameter[];

  /**
   * Turn a raw record into the typed one
   * @throws ParseError naming the first field that does not parse
   */
  convert(raw: Raw): R;
}
