/**
 * Fluent request construction
 *
 * Every step returns a new RequestBuilder. A failed step leaves the error in
 * the chain; later steps are skipped and `send` rejects with that error
 * without reaching the transport.
 *
 * ```typescript
 * const response = await createRequest('POST', 'https://api.example.test/upload')
 *   .auth({ type: 'bearer', token: 'test-token' })
 *   .body([['title', 'Quarterly report']], 'multipart')
 *   .files([['file', './report.pdf', {}, []]])
 *   .send(createAxiosTransport());
 * ```
 */

import { toFieldPairs } from '../body/encoders.js';
import { validateFileParts } from '../body/parts.js';
import { putBody } from '../body/put-body.js';
import { MalformedPartsError, PreconditionError, RequestError } from '../errors/index.js';
import { TimeoutSchema } from '../http/config.js';
import type { Logger } from '../interfaces/logger.js';
import type { HttpResponse, Transport } from '../interfaces/transport.js';
import {
  isMultipartBody,
  type AuthCredentials,
  type ContentKind,
  type FormFields,
  type HttpMethod,
  type RequestConfig,
} from '../types/request.js';
import { err, ok, type Result } from '../types/result.js';
import { errorToLog } from '../utils/logging.js';
import { formatAuthorization } from './auth.js';
import { FILES_REQUIRE_FORM_BODY_MESSAGE, prepareRequest } from './prepare.js';

export interface RequestOptions {
  headers?: Readonly<Record<string, string>>;
  query?: FormFields;
  auth?: AuthCredentials;
  timeout?: number;
}

export interface SendOptions {
  logger?: Logger;
}

export const INVALID_TIMEOUT_MESSAGE = 'Timeout must be a positive whole number of milliseconds';

type Step = (config: RequestConfig) => Result<RequestConfig, RequestError>;

function lowerCaseKeys(headers: Readonly<Record<string, string>>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) out[name.toLowerCase()] = value;
  return out;
}

export class RequestBuilder {
  private constructor(private readonly state: Result<RequestConfig, RequestError>) {}

  static from(config: RequestConfig): RequestBuilder {
    return new RequestBuilder(ok(config));
  }

  /** The chain's current value: the config so far, or the first error */
  result(): Result<RequestConfig, RequestError> {
    return this.state;
  }

  get config(): RequestConfig | undefined {
    return this.state.ok ? this.state.value : undefined;
  }

  get error(): RequestError | undefined {
    return this.state.ok ? undefined : this.state.error;
  }

  header(name: string, value: string): RequestBuilder {
    return this.headers({ [name]: value });
  }

  headers(headers: Readonly<Record<string, string>>): RequestBuilder {
    return this.step((config) => ok({ ...config, headers: { ...config.headers, ...lowerCaseKeys(headers) } }));
  }

  auth(credentials: AuthCredentials): RequestBuilder {
    return this.header('authorization', formatAuthorization(credentials));
  }

  query(params: FormFields): RequestBuilder {
    return this.step((config) => ok({ ...config, query: [...(config.query ?? []), ...toFieldPairs(params)] }));
  }

  /** Per-request timeout; must be a positive whole number of milliseconds */
  timeout(ms: number): RequestBuilder {
    return this.step((config) => {
      if (!TimeoutSchema.safeParse(ms).success) {
        return err(new PreconditionError(`${INVALID_TIMEOUT_MESSAGE}, got ${ms}`));
      }
      return ok({ ...config, timeout: ms });
    });
  }

  body(content: unknown, kind: 'json'): RequestBuilder;
  body(content: string | FormFields, kind: 'url_encoded'): RequestBuilder;
  body(parts: readonly unknown[], kind: 'multipart'): RequestBuilder;
  body(content: string, kind: ContentKind): RequestBuilder;
  body(content: unknown, kind: ContentKind): RequestBuilder {
    return this.step((config) => putBody(config, content, kind));
  }

  /**
   * Attach file parts (["file", filename, extra, headers]).
   * They are merged into a multipart body when the request is sent.
   */
  files(parts: readonly unknown[]): RequestBuilder {
    return this.step((config) => {
      if (config.body !== undefined && !isMultipartBody(config.body) && config.body.kind !== 'url_encoded') {
        return err(new PreconditionError(FILES_REQUIRE_FORM_BODY_MESSAGE));
      }
      const { valid, invalid } = validateFileParts(parts);
      if (invalid.length > 0) return err(new MalformedPartsError(invalid));
      return ok({ ...config, files: [...(config.files ?? []), ...valid] });
    });
  }

  /**
   * Dispatch through the transport. Rejects with the chain's error if any step failed.
   */
  async send<T = unknown>(transport: Transport, options: SendOptions = {}): Promise<HttpResponse<T>> {
    if (!this.state.ok) {
      options.logger?.warn('request not sent', errorToLog(this.state.error));
      throw this.state.error;
    }

    const prepared = prepareRequest(this.state.value);
    if (!prepared.ok) {
      options.logger?.warn('request not sent', errorToLog(prepared.error));
      throw prepared.error;
    }

    options.logger?.debug('sending request', { method: prepared.value.method, url: prepared.value.url });
    return transport.send<T>(prepared.value);
  }

  private step(fn: Step): RequestBuilder {
    if (!this.state.ok) return this;
    return new RequestBuilder(fn(this.state.value));
  }
}

/**
 * Start a request chain
 */
export function createRequest(method: HttpMethod, url: string, options: RequestOptions = {}): RequestBuilder {
  let builder = RequestBuilder.from({ method, url, headers: {} });
  if (options.headers) builder = builder.headers(options.headers);
  if (options.auth) builder = builder.auth(options.auth);
  if (options.query) builder = builder.query(options.query);
  if (options.timeout !== undefined) builder = builder.timeout(options.timeout);
  return builder;
}
