/**
 * Default transport on top of the global `fetch`
 */

import type { QueryParameter } from '../builder/types.js';
import type { Transport } from './types.js';
import { TransportError } from './errors.js';

export class FetchTransport implements Transport {
  /**
   * GET `{baseUrl}/{path}?{parameters}` and parse the body as JSON
   *
   * The status code is not checked when the body is JSON: the API reports
   * its own errors inside the response envelope.
   *
   * @throws TransportError if the request fails or the body is not JSON
   */
  async getJson(
    baseUrl: string,
    path: string,
    parameters: readonly QueryParameter[]
  ): Promise<unknown> {
    const query = new URLSearchParams(parameters.map<[string, string]>(([key, value]) => [key, value]));
    const url = `${baseUrl}/${path}?${query.toString()}`;

    let response: Response;
    try {
      response = await fetch(url, { headers: { Accept: 'application/json' } });
    } catch (error) {
      throw new TransportError(`HTTP request failed: ${describe(error)}`, null, { cause: error });
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new TransportError(`HTTP request failed: ${describe(error)}`, response.status, {
        cause: error,
      });
    }

    try {
      return JSON.parse(text) as unknown;
    } catch (error) {
      const status = `${String(response.status)} ${response.statusText}`.trim();
      throw new TransportError(`Response body is not JSON (HTTP ${status})`, response.status, {
        cause: error,
      });
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
