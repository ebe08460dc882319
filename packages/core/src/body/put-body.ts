/**
 * Body builder
 * Serializes request content for a declared content kind and attaches the
 * matching content-type header. Pure: never mutates the request it is given.
 */

import {
  EncodingError,
  MalformedPartsError,
  PreconditionError,
  type BodyError,
} from '../errors/index.js';
import { getMimeType } from '../mime/index.js';
import type {
  Body,
  BodyTarget,
  ContentKind,
  ContentTypeHeader,
  FormFields,
  Part,
} from '../types/request.js';
import { err, ok, type Result } from '../types/result.js';
import { encodeJson, encodeQuery, isFormFields } from './encoders.js';
import { validateParts } from './parts.js';

export const URL_ENCODED_MIME_TYPE = 'application/x-www-form-urlencoded';

export const FILES_ATTACHED_MESSAGE =
  'Body must be of type :url_encoded or :multipart when files are attached';

export type BodyResult<R extends BodyTarget> = Result<R & { readonly body: Body }, BodyError>;

/**
 * Put `content` on the request as its body.
 *
 * - json: non-string content is JSON encoded
 * - url_encoded: non-string content is form encoded
 * - multipart: every part is validated and stored unchanged
 * - anything else is an extension or MIME token; content must be a string
 *
 * @example
 * putBody({}, { name: 'value' }, 'url_encoded')
 * // { ok: true, value: { body: { kind: 'url_encoded', header: ['content-type', 'application/x-www-form-urlencoded'], payload: 'name=value' } } }
 */
export function putBody<R extends BodyTarget>(request: R, content: unknown, kind: 'json'): BodyResult<R>;
export function putBody<R extends BodyTarget>(request: R, content: string | FormFields, kind: 'url_encoded'): BodyResult<R>;
export function putBody<R extends BodyTarget>(request: R, parts: readonly unknown[], kind: 'multipart'): BodyResult<R>;
export function putBody<R extends BodyTarget>(request: R, content: unknown, kind: ContentKind): BodyResult<R>;
export function putBody<R extends BodyTarget>(request: R, content: unknown, kind: ContentKind): BodyResult<R> {
  if (request.files !== undefined && kind !== 'url_encoded' && kind !== 'multipart') {
    return err(new PreconditionError(FILES_ATTACHED_MESSAGE));
  }

  switch (kind) {
    case 'json': {
      if (typeof content === 'string') return withBody(request, single('json', getMimeType('json'), content));
      const encoded = encodeJson(content);
      if (!encoded.ok) return encoded;
      return withBody(request, single('json', getMimeType('json'), encoded.value));
    }

    case 'url_encoded': {
      if (typeof content === 'string') return withBody(request, single('url_encoded', URL_ENCODED_MIME_TYPE, content));
      if (!isFormFields(content)) {
        return err(new EncodingError('url_encoded content must be a string or a flat map of string, number or boolean values'));
      }
      return withBody(request, single('url_encoded', URL_ENCODED_MIME_TYPE, encodeQuery(content)));
    }

    case 'multipart': {
      if (!Array.isArray(content)) {
        return err(new MalformedPartsError([{ value: content, guidance: 'multipart content must be an array of parts' }]));
      }
      const { valid, invalid } = validateParts(content);
      if (invalid.length > 0) return err(new MalformedPartsError(invalid));
      const parts: readonly Part[] = valid;
      return withBody(request, parts);
    }

    default: {
      if (typeof content !== 'string') {
        return err(new EncodingError(`Content for '${kind}' bodies must be a string, got ${typeof content}`));
      }
      const mimeType = getMimeType(kind, 'ext');
      return withBody(request, single(mimeType, mimeType, content));
    }
  }
}

function contentHeader(mimeType: string): ContentTypeHeader {
  return ['content-type', mimeType];
}

function single(kind: string, mimeType: string, payload: string): Body {
  return { kind, header: contentHeader(mimeType), payload };
}

function withBody<R extends BodyTarget>(request: R, body: Body): BodyResult<R> {
  return ok({ ...request, body });
}
