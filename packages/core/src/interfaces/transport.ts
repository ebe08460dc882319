import type { HttpMethod, Part } from '../types/request.js';

/**
 * Wire-ready body handed to a transport
 * - "none": no body
 * - "raw": serialized payload; its content-type is already in the request headers
 * - "multipart": parts to encode as multipart/form-data (boundary chosen by the transport)
 */
export type PreparedBody =
  | { readonly type: 'none' }
  | { readonly type: 'raw'; readonly payload: string }
  | { readonly type: 'multipart'; readonly parts: readonly Part[] };

/**
 * Finished request produced from a RequestConfig
 */
export interface PreparedRequest {
  readonly method: HttpMethod;
  /** Absolute URL including the query string */
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: PreparedBody;
  /** Per-request timeout in milliseconds; transports fall back to their default, 0 disables it */
  readonly timeout?: number;
}

/**
 * Standardized HTTP response
 *
 * All Transport implementations (axios, fetch, custom) normalize to this shape.
 */
export interface HttpResponse<T = unknown> {
  /**
   * HTTP status code (e.g., 200, 404, 500)
   */
  status: number;

  /**
   * Response headers (lower-cased keys, values are strings or string arrays)
   */
  headers: Record<string, string | string[]>;

  /**
   * Response body as decoded by the transport
   * - JSON content types: parsed value
   * - anything else: text
   */
  body: T;

  /**
   * Request that was sent, with sensitive headers masked.
   * Only present when the transport was created with captureRequest.
   */
  request?: {
    method: string;
    url: string;
    headers?: Record<string, string>;
  };
}

/**
 * Transport
 * Pluggable network layer that performs the actual I/O for a prepared request.
 * Rejects with HttpError for non-2xx responses and network failures.
 */
export interface Transport {
  send<T = unknown>(request: PreparedRequest): Promise<HttpResponse<T>>;
}
