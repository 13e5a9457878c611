/**
 * acled-sdk - TypeScript client for the ACLED conflict data API (api.acleddata.com)
 *
 * @packageDocumentation
 *
 * @example
 * ```typescript
 * import { AcledClient, QueryBuilder, Where, loadConfig } from 'acled-sdk';
 * import type { AcledQuery } from 'acled-sdk';
 *
 * // Reads ACLED_API_KEY and ACLED_EMAIL
 * const client = new AcledClient(loadConfig());
 *
 * // Plain query object
 * const events = await client.getAcled({
 *   country: Where.matches('Germany'),
 *   year: Where.between(2020, 2023),
 * });
 *
 * // Or with the fluent builder
 * const query = new QueryBuilder<AcledQuery>()
 *   .where('country', Where.like('Sud*'))
 *   .where('timestamp', Where.greaterThan(1710025200));
 *
 * for await (const event of client.streamAcled(query)) {
 *   console.log(event.id, event.date.toString());
 * }
 * ```
 */

export * from './builder/index.js';

export { CalendarDate } from './values/CalendarDate.js';
export { Region, regionName, parseRegion, regionFromCode } from './values/Region.js';

export * from './endpoints/index.js';

export * from './client/index.js';
