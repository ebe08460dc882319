import type { HttpResponse, PreparedBody, PreparedRequest, Transport } from '../interfaces/transport.js';
import { describeBodyForLog, errorToLog, sanitizeHeadersForLog, truncateString } from '../utils/logging.js';
import { effectiveTimeoutMs, resolveTransportOptions, type TransportOptions } from './config.js';
import { HttpError } from './errors.js';
import { toFormData, type FormDataOptions } from './form-data.js';

export interface FetchTransportOptions extends TransportOptions, FormDataOptions {
  // fetchFn can be provided for environments where `fetch` is not global
  fetchFn?: typeof fetch;
}

function parseResponseText(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function decodeBody(text: string, contentType: string): unknown {
  if (contentType.includes('json')) return parseResponseText(text);
  return text;
}

export function createFetchTransport(opts: FetchTransportOptions = {}): Transport {
  const fetchFn = opts.fetchFn ?? globalThis.fetch;
  if (typeof fetchFn !== 'function') throw new Error('fetch is not available in this environment; provide fetchFn');

  const resolved = resolveTransportOptions(opts);
  const log = resolved.logger;

  async function toBody(body: PreparedBody): Promise<string | FormData | undefined> {
    switch (body.type) {
      case 'none':
        return undefined;
      case 'raw':
        return body.payload;
      case 'multipart':
        return toFormData(body.parts, { readFile: opts.readFile });
    }
  }

  return {
    async send<T = unknown>(request: PreparedRequest): Promise<HttpResponse<T>> {
      const body = await toBody(request.body);
      const timeout = effectiveTimeoutMs(request.timeout, resolved.defaultTimeoutMs);
      if (resolved.debug) {
        log.debug('request', {
          method: request.method,
          url: request.url,
          headers: sanitizeHeadersForLog(request.headers),
          ...describeBodyForLog(request.body, resolved.debugFullBody),
        });
      }

      let res: Response;
      try {
        res = await fetchFn(request.url, {
          method: request.method,
          headers: { ...request.headers },
          body,
          signal: timeout > 0 ? AbortSignal.timeout(timeout) : undefined,
        });
      } catch (cause) {
        const error = new HttpError(cause instanceof Error ? cause.message : String(cause), { cause });
        if (resolved.debug) log.debug('error', errorToLog(error));
        throw error;
      }

      const text = await res.text();
      const headers = Object.fromEntries(res.headers);
      if (resolved.debug) {
        log.debug('response', {
          status: res.status,
          headers: sanitizeHeadersForLog(headers),
          bodyPreview: resolved.debugFullBody ? truncateString(text, 200) : undefined,
        });
      }

      const data = decodeBody(text, res.headers.get('content-type') ?? '');
      if (!res.ok) {
        const error = new HttpError(`${res.status} ${res.statusText}`, {
          status: res.status,
          response: { status: res.status, statusText: res.statusText, data, headers },
        });
        if (resolved.debug) log.debug('error', errorToLog(error));
        throw error;
      }

      return {
        status: res.status,
        headers,
        // the transport cannot check the caller's T; decoded JSON or text is passed through
        body: data as T,
        ...(resolved.captureRequest && {
          request: { method: request.method, url: request.url, headers: sanitizeHeadersForLog(request.headers) },
        }),
      };
    },
  };
}

export default createFetchTransport;
