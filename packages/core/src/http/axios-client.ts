import axios, { AxiosHeaders, type AxiosInstance } from "axios";
import type { HttpResponse, PreparedBody, PreparedRequest, Transport } from "../interfaces/transport.js";
import { describeBodyForLog, errorToLog, sanitizeHeadersForLog } from "../utils/logging.js";
import { effectiveTimeoutMs, resolveTransportOptions, type TransportOptions } from "./config.js";
import { HttpError } from "./errors.js";
import { toFormData, type FormDataOptions } from "./form-data.js";

export interface AxiosTransportOptions extends TransportOptions, FormDataOptions {
  axiosInstance?: AxiosInstance;
}

function normalizeHeaders(headers: unknown): Record<string, string | string[]> {
  const source = headers instanceof AxiosHeaders ? headers.toJSON() : headers;
  const out: Record<string, string | string[]> = {};
  if (source === null || typeof source !== "object") return out;
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined || value === null) continue;
    out[key.toLowerCase()] = Array.isArray(value) ? value.map(String) : String(value);
  }
  return out;
}

/**
 * Create a Transport backed by Axios.
 * - Raw payloads are sent byte-for-byte (axios request transforms are bypassed).
 * - Multipart parts become FormData; axios picks the boundary.
 * - Errors are normalized to HttpError with `status` and `response.data`.
 */
export function createAxiosTransport(opts: AxiosTransportOptions = {}): Transport {
  const resolved = resolveTransportOptions(opts);
  const log = resolved.logger;
  const instance: AxiosInstance =
    opts.axiosInstance ?? axios.create({ timeout: resolved.defaultTimeoutMs });

  async function toData(body: PreparedBody): Promise<string | FormData | undefined> {
    switch (body.type) {
      case "none":
        return undefined;
      case "raw":
        return body.payload;
      case "multipart":
        return toFormData(body.parts, { readFile: opts.readFile });
    }
  }

  function toHttpError(err: unknown): unknown {
    if (!axios.isAxiosError(err)) return err;
    const response = err.response
      ? {
          status: err.response.status,
          statusText: err.response.statusText,
          data: err.response.data,
          headers: normalizeHeaders(err.response.headers),
        }
      : undefined;
    return new HttpError(err.message, { status: response?.status, response, cause: err });
  }

  return {
    async send<T = unknown>(request: PreparedRequest): Promise<HttpResponse<T>> {
      const data = await toData(request.body);
      const timeout = effectiveTimeoutMs(request.timeout, resolved.defaultTimeoutMs);

      if (resolved.debug) {
        log.debug("request", {
          method: request.method,
          url: request.url,
          headers: sanitizeHeadersForLog(request.headers),
          ...describeBodyForLog(request.body, resolved.debugFullBody),
        });
      }

      try {
        const res = await instance.request<T>({
          method: request.method,
          url: request.url,
          headers: { ...request.headers },
          data,
          timeout,
          transformRequest: [(payload: unknown) => payload],
        });
        const headers = normalizeHeaders(res.headers);
        if (resolved.debug) {
          log.debug("response", {
            status: res.status,
            statusText: res.statusText,
            headers: sanitizeHeadersForLog(headers),
            ...(resolved.debugFullBody && { body: res.data }),
          });
        }
        return {
          status: res.status,
          headers,
          body: res.data,
          ...(resolved.captureRequest && {
            request: { method: request.method, url: request.url, headers: sanitizeHeadersForLog(request.headers) },
          }),
        };
      } catch (err) {
        const normalized = toHttpError(err);
        if (resolved.debug) {
          log.debug("error", {
            ...errorToLog(normalized),
            ...(resolved.debugFullBody &&
              normalized instanceof HttpError &&
              normalized.response && { body: normalized.response.data }),
          });
        }
        throw normalized;
      }
    },
  };
}

export default createAxiosTransport;
