/**
 * Client module - HTTP client for the ACLED API
 */

export { AcledClient } from './AcledClient.js';
export type { QueryInput } from './AcledClient.js';
export { FetchTransport } from './transport.js';
export { loadConfig } from './config.js';
export { matchEnvelope, decodeEnvelope } from './envelope.js';
export { streamPages, collectPages, DEFAULT_PAGE_SIZE } from './paginate.js';
export {
  AcledError,
  TransportError,
  ApiError,
  ParseError,
  ConfigurationError,
  EnvelopeContractError,
} from './errors.js';
export type {
  ClientConfig,
  Transport,
  Envelope,
  DataEnvelope,
  ErrorEnvelope,
} from './types.js';
