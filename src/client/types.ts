/**
 * Type definitions for the client module
 */

import type { QueryParameter } from '../builder/types.js';

/**
 * Performs the HTTP GET for one page
 *
 * Implementations resolve with the parsed JSON body and reject when the
 * exchange fails. The client does not wrap or retry their errors.
 */
export interface Transport {
  getJson(baseUrl: string, path: string, parameters: readonly QueryParameter[]): Promise<unknown>;
}

/** Client configuration options */
export interface ClientConfig {
  /** API access key */
  key: string;

  /** Email address the key is registered to */
  email: string;

  /**
   * Base URL for the API
   * @default 'https://api.acleddata.com'
   */
  baseUrl?: string;

  /**
   * Rows per page. A page with fewer rows ends pagination, so this must be
   * what the API actually returns per page; any other value is sent as `limit`.
   * @default 5000
   */
  pageSize?: number;

  /**
   * HTTP transport
   * @default FetchTransport
   */
  transport?: Transport;
}

/** Success envelope, as sent */
export interface DataEnvelope<Raw> {
  shape: 'data';
  success: boolean;
  count: number;
  data: Raw[];
}

/** Failure envelope, as sent */
export interface ErrorEnvelope {
  shape: 'error';
  success: boolean;
  count: number;
  error: { message: string };
}

/** One page of a response; `shape` records which structure matched */
export type Envelope<Raw> = DataEnvelope<Raw> | ErrorEnvelope;
