/**
 * RequestError
 * Base type for failures produced while assembling a request.
 * These are returned as values by the builder and only thrown by `send`.
 */
export abstract class RequestError extends Error {
  /**
   * Error category
   *
   * - "Precondition": the step is not allowed in the current request state
   * - "Encoding": the content could not be serialized for the declared kind
   * - "MalformedParts": one or more multipart entries have an invalid shape
   */
  abstract readonly category: "Precondition" | "Encoding" | "MalformedParts";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
  }
}

/**
 * PreconditionError
 * Returned when a chain step conflicts with what is already on the request
 */
export class PreconditionError extends RequestError {
  readonly category = "Precondition" as const;
}

/**
 * EncodingError
 * Returned when the encoder rejects the content; the encoder's own error is kept as `cause`
 */
export class EncodingError extends RequestError {
  readonly category = "Encoding" as const;
}

export interface InvalidPart {
  /** The entry exactly as the caller passed it */
  readonly value: unknown;
  readonly guidance: string;
}

/**
 * MalformedPartsError
 * Lists every invalid multipart entry, not only the first one
 */
export class MalformedPartsError extends RequestError {
  readonly category = "MalformedParts" as const;

  constructor(readonly parts: readonly InvalidPart[]) {
    super(
      `${parts.length} malformed multipart part${parts.length === 1 ? "" : "s"}`
    );
  }
}

export type BodyError = PreconditionError | EncodingError | MalformedPartsError;
