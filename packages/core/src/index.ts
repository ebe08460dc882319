// Domain types
export * from './types/index.js';

// Interfaces and contracts
export * from './interfaces/index.js';

// Errors
export {
  RequestError,
  PreconditionError,
  EncodingError,
  MalformedPartsError,
  type BodyError,
  type InvalidPart,
} from './errors/index.js';
export { HttpError } from './http/errors.js';

// Body construction
export * from './body/index.js';

// MIME resolution
export { getMimeType, getExtensions, DEFAULT_MIME_TYPE, type MimeLookupMode } from './mime/index.js';

// Request chain
export * from './request/index.js';

// Transports (convenience exports)
export { createAxiosTransport, type AxiosTransportOptions } from './http/axios-client.js';
export { createFetchTransport, type FetchTransportOptions } from './http/fetch-client.js';
export { toFormData, type FormDataOptions } from './http/form-data.js';
export { resolveTransportOptions, DEFAULT_TIMEOUT_MS, type TransportOptions, type ResolvedTransportOptions } from './http/config.js';

// Utilities
export { createConsoleLogger, sanitizeHeadersForLog, errorToLog, truncateString } from './utils/index.js';
