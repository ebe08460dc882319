/**
 * Content encoders used by the body builder and the query string step
 */

import { EncodingError } from '../errors/index.js';
import type { FormFields, FormValue } from '../types/request.js';
import { err, ok, type Result } from '../types/result.js';

/**
 * Encode a value as JSON.
 * Fails when JSON.stringify throws (cycles, BigInt) or produces nothing
 * (undefined, functions, symbols).
 */
export function encodeJson(value: unknown): Result<string, EncodingError> {
  let encoded: string | undefined;
  try {
    encoded = JSON.stringify(value);
  } catch (cause) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return err(new EncodingError(`Unable to encode JSON body: ${reason}`, { cause }));
  }
  if (encoded === undefined) {
    return err(new EncodingError(`Unable to encode JSON body: ${typeof value} is not serializable`));
  }
  return ok(encoded);
}

export function isFormFields(value: unknown): value is FormFields {
  if (Array.isArray(value)) {
    return value.every(
      (pair) => Array.isArray(pair) && pair.length === 2 && typeof pair[0] === 'string' && isFormValue(pair[1])
    );
  }
  if (value === null || typeof value !== 'object') return false;
  const proto = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) return false;
  return Object.values(value).every(isFormValue);
}

function isFormValue(value: unknown): boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function isPairList(fields: FormFields): fields is ReadonlyArray<readonly [string, FormValue]> {
  return Array.isArray(fields);
}

/**
 * Flatten form fields into ordered [key, value] string pairs
 */
export function toFieldPairs(fields: FormFields): Array<[string, string]> {
  const entries: ReadonlyArray<readonly [string, FormValue]> = isPairList(fields)
    ? fields
    : Object.entries(fields);
  return entries.map(([key, value]): [string, string] => [key, String(value)]);
}

/**
 * Form URL-encode key/value pairs (application/x-www-form-urlencoded, space as "+")
 */
export function encodeQuery(fields: FormFields): string {
  return new URLSearchParams(toFieldPairs(fields)).toString();
}
