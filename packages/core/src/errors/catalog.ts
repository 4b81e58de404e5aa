/**
 * Typed error catalog for every failure the file engine reports to clients.
 *
 * Messages are safe to send over the wire: they never contain raw
 * filesystem error text or absolute server paths.
 */

export class FileServiceError extends Error {
  constructor(
    public readonly code: number,
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  /** True when the client can fix the request and retry. */
  get clientError(): boolean {
    return this.code >= 400 && this.code < 500;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        code: this.code,
        error_code: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// 400: malformed client input

export class InvalidPathError extends FileServiceError {
  constructor(message = "Invalid path", details?: Record<string, unknown>) {
    super(400, "INVALID_PATH", message, details);
  }
}

export class InvalidNameError extends FileServiceError {
  constructor(message = "Invalid name", details?: Record<string, unknown>) {
    super(400, "INVALID_NAME", message, details);
  }
}

export class InvalidRequestError extends FileServiceError {
  constructor(message = "Invalid request", details?: Record<string, unknown>) {
    super(400, "INVALID_REQUEST", message, details);
  }
}

// 404

export class NotFoundError extends FileServiceError {
  constructor(message = "Not found", details?: Record<string, unknown>) {
    super(404, "NOT_FOUND", message, details);
  }
}

// 409: destination state prevents the operation

export class ConflictError extends FileServiceError {
  constructor(message = "Already exists", details?: Record<string, unknown>) {
    super(409, "CONFLICT", message, details);
  }
}

export class CrossDeviceMoveError extends FileServiceError {
  constructor(details?: Record<string, unknown>) {
    super(
      409,
      "CROSS_DEVICE",
      "Source and destination are on different volumes",
      details,
    );
  }
}

// 413 / 416: transfer limits

export class SizeLimitExceededError extends FileServiceError {
  /** `subject` names what was too large, e.g. "Request body". */
  constructor(maxBytes: number, subject = "Upload", details?: Record<string, unknown>) {
    super(
      413,
      "SIZE_LIMIT_EXCEEDED",
      `${subject} exceeds maximum size of ${maxBytes} bytes`,
      { maxBytes, ...details },
    );
  }
}

export class RangeNotSatisfiableError extends FileServiceError {
  constructor(public readonly size: number) {
    super(416, "RANGE_NOT_SATISFIABLE", "Requested range not satisfiable", {
      size,
    });
  }
}

// 422: media that cannot be previewed

export class GenerationFailedError extends FileServiceError {
  constructor(
    message = "Thumbnail could not be generated",
    details?: Record<string, unknown>,
  ) {
    super(422, "GENERATION_FAILED", message, details);
  }
}

// 500: server-side filesystem failures

export class StorageIOError extends FileServiceError {
  constructor(message = "Filesystem operation failed", details?: Record<string, unknown>) {
    super(500, "IO_ERROR", message, details);
  }
}
