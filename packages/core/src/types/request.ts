/**
 * Request domain types
 * Shapes produced by the request builder and consumed by transports
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS';

/**
 * Keeps editor completion for the known literals while accepting any string
 */
export type LooseAutocomplete<T extends string> = T | (string & {});

/**
 * Declared category of body content.
 * Anything beyond the three structured kinds is a file extension or MIME token
 * ("xml", "txt", "text/csv") resolved through the MIME table.
 */
export type ContentKind = LooseAutocomplete<'json' | 'url_encoded' | 'multipart'>;

export type ContentTypeHeader = readonly ['content-type', string];

/**
 * Plain form field: [name, data]
 */
export type FieldPart = readonly [name: string, data: string];

export type PartHeaders = ReadonlyArray<readonly [name: string, value: string]>;

/**
 * File attachment: ["file", filename, extra, headers]
 *
 * `extra.name` overrides the form field name (default "file") and
 * `extra.content` supplies the bytes inline instead of reading `filename` from disk.
 */
export type FilePart = readonly [
  marker: 'file',
  filename: string,
  extra: Readonly<Record<string, unknown>>,
  headers: PartHeaders,
];

export type Part = FieldPart | FilePart;

/**
 * Serialized single-part body
 */
export interface SingleBody {
  /** Declared kind for json/url_encoded, resolved MIME type otherwise */
  readonly kind: string;
  readonly header: ContentTypeHeader;
  readonly payload: string;
}

export type MultipartBody = readonly Part[];

export type Body = SingleBody | MultipartBody;

export type FormValue = string | number | boolean;

/**
 * Structured input for url-encoded bodies and query strings
 */
export type FormFields =
  | Readonly<Record<string, FormValue>>
  | ReadonlyArray<readonly [string, FormValue]>;

/**
 * Minimal shape the body builder needs from a request
 */
export interface BodyTarget {
  readonly body?: Body;
  readonly files?: readonly FilePart[];
}

export type AuthCredentials =
  | { readonly type: 'bearer'; readonly token: string }
  | { readonly type: 'basic'; readonly username: string; readonly password: string };

/**
 * In-progress request assembled by the fluent chain
 */
export interface RequestConfig extends BodyTarget {
  readonly method: HttpMethod;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly query?: ReadonlyArray<readonly [string, FormValue]>;
  readonly timeout?: number;
}

export function isMultipartBody(body: Body): body is MultipartBody {
  return Array.isArray(body);
}
