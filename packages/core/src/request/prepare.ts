/**
 * Turns a finished RequestConfig into the wire-ready shape transports consume
 */

import { encodeQuery } from '../body/encoders.js';
import { PreconditionError } from '../errors/index.js';
import type { PreparedBody, PreparedRequest } from '../interfaces/transport.js';
import { isMultipartBody, type FieldPart, type Part, type RequestConfig } from '../types/request.js';
import { err, ok, type Result } from '../types/result.js';

export const FILES_REQUIRE_FORM_BODY_MESSAGE =
  'Files can only be attached to url_encoded or multipart bodies';

function withQuery(url: string, query: RequestConfig['query']): string {
  if (!query || query.length === 0) return url;
  const hashAt = url.indexOf('#');
  const path = hashAt === -1 ? url : url.slice(0, hashAt);
  const fragment = hashAt === -1 ? '' : url.slice(hashAt);
  const separator = path.includes('?') ? (path.endsWith('?') || path.endsWith('&') ? '' : '&') : '?';
  return `${path}${separator}${encodeQuery(query)}${fragment}`;
}

function decodeFormFields(payload: string): FieldPart[] {
  return Array.from(new URLSearchParams(payload), ([name, value]): FieldPart => [name, value]);
}

/**
 * Build the PreparedRequest.
 * Attached files turn the body into multipart: existing parts first, a
 * url_encoded body decoded into fields, then the files.
 */
export function prepareRequest(config: RequestConfig): Result<PreparedRequest, PreconditionError> {
  const headers: Record<string, string> = { ...config.headers };
  let body: PreparedBody = { type: 'none' };

  if (config.files !== undefined) {
    let leading: readonly Part[] = [];
    if (config.body !== undefined) {
      if (isMultipartBody(config.body)) {
        leading = config.body;
      } else if (config.body.kind === 'url_encoded') {
        leading = decodeFormFields(config.body.payload);
      } else {
        return err(new PreconditionError(FILES_REQUIRE_FORM_BODY_MESSAGE));
      }
    }
    body = { type: 'multipart', parts: [...leading, ...config.files] };
  } else if (config.body !== undefined) {
    if (isMultipartBody(config.body)) {
      body = { type: 'multipart', parts: config.body };
    } else {
      const [name, value] = config.body.header;
      headers[name] = value;
      body = { type: 'raw', payload: config.body.payload };
    }
  }

  // the transport picks the multipart boundary and writes its own content-type
  if (body.type === 'multipart') delete headers['content-type'];

  return ok({
    method: config.method,
    url: withQuery(config.url, config.query),
    headers,
    body,
    ...(config.timeout !== undefined && { timeout: config.timeout }),
  });
}
