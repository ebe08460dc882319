/**
 * HTTP Error Type
 * Raised by transports for non-2xx responses and network failures
 */
export class HttpError extends Error {
  status?: number;
  response?: {
    status: number;
    statusText: string;
    data: unknown;
    headers?: Record<string, string | string[]>;
  };

  constructor(
    message: string,
    properties?: Pick<HttpError, 'status' | 'response'> & { cause?: unknown }
  ) {
    super(message, properties?.cause !== undefined ? { cause: properties.cause } : undefined);
    Object.setPrototypeOf(this, HttpError.prototype);
    this.name = 'HttpError';

    if (properties?.status !== undefined) {
      this.status = properties.status;
    }
    if (properties?.response) {
      this.response = properties.response;
    }
  }
}
