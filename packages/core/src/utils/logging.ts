/**
 * Logging Utilities - safe, redacted views of requests and errors
 */

import type { Logger } from '../interfaces/logger.js';
import type { PreparedBody } from '../interfaces/transport.js';

const SENSITIVE_HEADERS = ['authorization', 'proxy-authorization', 'api-key', 'x-api-key', 'password', 'token', 'cookie', 'set-cookie'];

/**
 * Console-backed logger, used when none is injected
 */
export function createConsoleLogger(prefix: string = '[http]'): Logger {
  return {
    debug: (m, meta) => console.debug(`${prefix}[debug]`, m, meta),
    info: (m, meta) => console.info(`${prefix}[info]`, m, meta),
    warn: (m, meta) => console.warn(`${prefix}[warn]`, m, meta),
    error: (m, meta) => console.error(`${prefix}[error]`, m, meta),
  };
}

/**
 * Truncate a string to a maximum length
 * If the string exceeds maxLength, appends "..." to indicate truncation.
 */
export function truncateString(str: string, maxLength: number = 500): string {
  if (str.length <= maxLength) return str;
  return str.substring(0, maxLength) + '...';
}

/**
 * Mask values of headers that typically carry credentials
 */
export function sanitizeHeadersForLog(headers?: Readonly<Record<string, unknown>>): Record<string, string> | undefined {
  if (!headers) return undefined;

  const sanitized: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    sanitized[key] = SENSITIVE_HEADERS.includes(key.toLowerCase()) ? 'REDACTED' : String(value);
  }
  return sanitized;
}

/**
 * Describe a prepared body for a debug log entry.
 * Payloads are only included when `full` is set; file contents never are.
 */
export function describeBodyForLog(body: PreparedBody, full: boolean): Record<string, unknown> {
  switch (body.type) {
    case 'none':
      return { bodyType: 'none' };
    case 'raw':
      return full
        ? { bodyType: 'raw', bodyLength: body.payload.length, body: truncateString(body.payload) }
        : { bodyType: 'raw', bodyLength: body.payload.length };
    case 'multipart':
      return {
        bodyType: 'multipart',
        parts: body.parts.map((part) => (part[0] === 'file' && part.length === 4 ? `file:${part[1]}` : `field:${part[0]}`)),
      };
  }
}

/**
 * Create a safe log object from an error
 * Keeps the fields integrators filter on (category, status) next to the message.
 */
export function errorToLog(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const entry: Record<string, unknown> = {
      type: error.name,
      message: error.message,
    };
    if ('category' in error) entry.category = error.category;
    if ('status' in error && error.status !== undefined) entry.status = error.status;
    if ('parts' in error && Array.isArray(error.parts)) entry.invalidParts = error.parts.length;
    if (error.cause !== undefined) entry.cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
    return entry;
  }

  return {
    type: typeof error,
    message: String(error),
  };
}
