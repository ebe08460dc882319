/**
 * Transport configuration
 * Options passed in code win over the environment; the environment wins over defaults.
 *
 * Environment:
 * - HTTP_DEBUG=1        log requests and responses at debug level ("true" also works)
 * - HTTP_DEBUG_FULL=1   include (truncated) bodies in debug logs
 * - HTTP_TIMEOUT_MS     default timeout in milliseconds
 */

import { z } from 'zod';
import type { Logger } from '../interfaces/logger.js';
import { createConsoleLogger } from '../utils/logging.js';

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface TransportOptions {
  defaultTimeoutMs?: number;
  debug?: boolean;
  debugFullBody?: boolean;
  /** Attach the (redacted) request to every HttpResponse */
  captureRequest?: boolean;
  logger?: Logger;
}

export interface ResolvedTransportOptions {
  readonly defaultTimeoutMs: number;
  readonly debug: boolean;
  readonly debugFullBody: boolean;
  readonly captureRequest: boolean;
  readonly logger: Logger;
}

// Blank or unrecognised flags read as off
const flag = z
  .string()
  .optional()
  .transform((v) => v === '1' || v === 'true');

const EnvTimeoutSchema = z
  .string()
  .regex(/^\d+$/, 'must be a whole number of milliseconds')
  .transform(Number)
  .refine((n) => n > 0, 'must be greater than zero');

export const TimeoutSchema = z.number().int().positive();

function timeoutFromEnv(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const parsed = EnvTimeoutSchema.safeParse(raw.trim());
  if (!parsed.success) {
    throw new Error(`Invalid HTTP transport environment: HTTP_TIMEOUT_MS\n${z.prettifyError(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Environment keys are only read for options the caller left undefined.
 */
export function resolveTransportOptions(
  opts: TransportOptions = {},
  env: Record<string, string | undefined> = process.env
): ResolvedTransportOptions {
  const defaultTimeoutMs = opts.defaultTimeoutMs ?? timeoutFromEnv(env.HTTP_TIMEOUT_MS) ?? DEFAULT_TIMEOUT_MS;
  if (!TimeoutSchema.safeParse(defaultTimeoutMs).success) {
    throw new Error(`Invalid defaultTimeoutMs: ${defaultTimeoutMs}`);
  }

  return {
    defaultTimeoutMs,
    debug: opts.debug ?? flag.parse(env.HTTP_DEBUG),
    debugFullBody: opts.debugFullBody ?? flag.parse(env.HTTP_DEBUG_FULL),
    captureRequest: opts.captureRequest ?? false,
    logger: opts.logger ?? createConsoleLogger(),
  };
}

/**
 * Timeout a transport applies to one request, in milliseconds. 0 means none:
 * a request timeout that is not a positive finite number disables the timer.
 */
export function effectiveTimeoutMs(requestTimeout: number | undefined, defaultTimeoutMs: number): number {
  const ms = requestTimeout ?? defaultTimeoutMs;
  return Number.isFinite(ms) && ms > 0 ? ms : 0;
}
