/**
 * Typed error catalog for storage operations.
 *
 * Backend and filesystem failures are translated into these classes at the
 * adapter boundary; callers switch on `instanceof` or `errorCode`.
 */

export class StorageError extends Error {
  constructor(
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// Setup

export class ConfigurationError extends StorageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("CONFIGURATION_ERROR", message, details);
  }
}

export class ProbeError extends StorageError {
  constructor(message: string, cause?: unknown) {
    super("PROBE_ERROR", message, undefined, { cause });
  }
}

// Backend

export class NotFoundError extends StorageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("NOT_FOUND", message, details);
  }
}

export class AlreadyExistsError extends StorageError {
  constructor(
    message: string,
    public readonly ownedByCaller: boolean,
    details?: Record<string, unknown>,
  ) {
    super("ALREADY_EXISTS", message, { ...details, ownedByCaller });
  }
}

export class BucketNotEmptyError extends StorageError {
  constructor(bucket: string, cause?: unknown) {
    super(
      "BUCKET_NOT_EMPTY",
      `Bucket '${bucket}' is not empty`,
      { bucket },
      { cause },
    );
  }
}

export class BackendError extends StorageError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super("BACKEND_ERROR", message, details, { cause });
  }
}

// Local

export class LocalIOError extends StorageError {
  constructor(message: string, path: string, cause?: unknown) {
    super("LOCAL_IO_ERROR", message, { path }, { cause });
  }
}

export class DecodeError extends StorageError {
  constructor(bucket: string, key: string, cause?: unknown) {
    super(
      "DECODE_ERROR",
      `Object '${key}' in bucket '${bucket}' is not valid UTF-8 text`,
      { bucket, key },
      { cause },
    );
  }
}

// Authorization

export class AccessDeniedError extends StorageError {
  constructor(details: {
    bucket: string;
    key?: string;
    userId: string;
    required: string;
  }) {
    const target =
      details.key !== undefined
        ? `'${details.key}' in bucket '${details.bucket}'`
        : `bucket '${details.bucket}'`;
    super(
      "ACCESS_DENIED",
      `User '${details.userId}' lacks ${details.required} permission on ${target}`,
      details,
    );
  }
}
