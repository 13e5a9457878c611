/**
 * AcledClient - HTTP client for the ACLED API (api.acleddata.com)
 *
 * @example
 * ```typescript
 * import { AcledClient, Where, Region, CalendarDate } from 'acled-sdk';
 *
 * const client = new AcledClient({ key: 'my-key', email: 'me@example.com' });
 *
 * // Every page, as one array
 * const events = await client.getAcled({
 *   region: Where.matches(Region.MiddleAfrica),
 *   date: Where.greaterThan(CalendarDate.of(2024, 2, 28)),
 * });
 *
 * // Or record by record as pages arrive
 * for await (const deleted of client.streamDeleted()) {
 *   console.log(deleted.id);
 * }
 * ```
 */

import type { FilterMap, QueryParameter } from '../builder/types.js';
import { QueryBuilder } from '../builder/QueryBuilder.js';
import type { Endpoint } from '../endpoints/types.js';
import { acledEndpoint } from '../endpoints/acled.js';
import type { AcledEvent, AcledQuery } from '../endpoints/acled.js';
import { deletedEndpoint } from '../endpoints/deleted.js';
import type { DeletedEvent, DeletedQuery } from '../endpoints/deleted.js';
import type { ClientConfig, Transport } from './types.js';
import { ConfigurationError } from './errors.js';
import { decodeEnvelope } from './envelope.js';
import { collectPages, streamPages, DEFAULT_PAGE_SIZE } from './paginate.js';
import { FetchTransport } from './transport.js';

/** Default configuration values */
const DEFAULT_BASE_URL = 'https://api.acleddata.com';

/** A query object, or a builder that produces one */
export type QueryInput<Q extends FilterMap<Q>> = Q | QueryBuilder<Q>;

export class AcledClient {
  private readonly baseUrl: string;
  private readonly key: string;
  private readonly email: string;
  private readonly pageSize: number;
  private readonly transport: Transport;

  constructor(config: ClientConfig) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/$/, '');
    this.key = config.key;
    this.email = config.email;
    this.pageSize = config.pageSize ?? DEFAULT_PAGE_SIZE;
    this.transport = config.transport ?? new FetchTransport();

    if (!Number.isInteger(this.pageSize) || this.pageSize < 1) {
      throw new ConfigurationError(
        `pageSize must be a positive integer, got ${String(this.pageSize)}`
      );
    }
  }

  /**
   * Query the `acled` endpoint for events, following every page
   *
   * @param query - Filters; all events when omitted
   * @returns All matching events in the order the API sent them
   * @throws ApiError, ParseError, TransportError or EnvelopeContractError;
   *   no events are returned when any page fails
   */
  async getAcled(query: QueryInput<AcledQuery> = {}): Promise<AcledEvent[]> {
    return this.fetchAll(acledEndpoint, query);
  }

  /**
   * Query the `deleted` endpoint for deleted events, following every page
   *
   * @example
   * const removed = await client.getDeleted({ timestamp: Where.greaterThanOrEqual(1710025200) });
   */
  async getDeleted(query: QueryInput<DeletedQuery> = {}): Promise<DeletedEvent[]> {
    return this.fetchAll(deletedEndpoint, query);
  }

  /**
   * Stream `acled` events as each page arrives
   *
   * Unlike `getAcled()`, events from pages before a failing one have
   * already been handed out when the error is thrown.
   */
  streamAcled(query: QueryInput<AcledQuery> = {}): AsyncGenerator<AcledEvent, void, undefined> {
    return this.stream(acledEndpoint, query);
  }

  /**
   * Stream `deleted` events as each page arrives
   */
  streamDeleted(query: QueryInput<DeletedQuery> = {}): AsyncGenerator<DeletedEvent, void, undefined> {
    return this.stream(deletedEndpoint, query);
  }

  /**
   * Fetch every page of an endpoint into one array (all or nothing)
   */
  async fetchAll<Q extends FilterMap<Q>, Raw, R>(
    endpoint: Endpoint<Q, Raw, R>,
    query: QueryInput<Q>
  ): Promise<R[]> {
    return collectPages(this.pages(endpoint, query));
  }

  /**
   * Yield the records of an endpoint one at a time, fetching pages lazily
   */
  async *stream<Q extends FilterMap<Q>, Raw, R>(
    endpoint: Endpoint<Q, Raw, R>,
    query: QueryInput<Q>
  ): AsyncGenerator<R, void, undefined> {
    for await (const records of this.pages(endpoint, query)) {
      yield* records;
    }
  }

  private pages<Q extends FilterMap<Q>, Raw, R>(
    endpoint: Endpoint<Q, Raw, R>,
    query: QueryInput<Q>
  ): AsyncGenerator<R[], void, undefined> {
    const filters = query instanceof QueryBuilder ? query.build() : query;
    const parameters = endpoint.toParameters(filters);

    return streamPages((page) => this.fetchPage(endpoint, parameters, page), this.pageSize);
  }

  /**
   * Fetch and decode one page
   */
  private async fetchPage<Q, Raw, R>(
    endpoint: Endpoint<Q, Raw, R>,
    parameters: readonly QueryParameter[],
    page: number
  ): Promise<R[]> {
    const body = await this.transport.getJson(this.baseUrl, `${endpoint.name}/read`, [
      ...parameters,
      ...this.requestParameters(page),
    ]);

    return decodeEnvelope(body, endpoint.rawRecord, (raw) => endpoint.convert(raw));
  }

  /**
   * Credentials, page size and page number, appended after the filters
   */
  private requestParameters(page: number): QueryParameter[] {
    const parameters: QueryParameter[] = [
      ['key', this.key],
      ['email', this.email],
    ];

    if (this.pageSize !== DEFAULT_PAGE_SIZE) {
      parameters.push(['limit', String(this.pageSize)]);
    }
    if (page > 1) {
      parameters.push(['page', String(page)]);
    }

    return parameters;
  }
}
