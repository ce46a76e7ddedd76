export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: number | string) {
    super(404, 'NOT_FOUND', `${resource} with id ${id} not found`);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Please log in first') {
    super(401, 'UNAUTHORIZED', message);
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string) {
    super(403, 'FORBIDDEN', message);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(409, 'CONFLICT', message);
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(maxBytes: number) {
    super(413, 'PAYLOAD_TOO_LARGE', `File exceeds the ${formatBytes(maxBytes)} upload limit`, {
      max_bytes: maxBytes,
    });
  }
}

export class UnsupportedMediaTypeError extends AppError {
  constructor(contentType: string, allowed: readonly string[]) {
    super(415, 'UNSUPPORTED_MEDIA_TYPE', `Unsupported file type ${contentType}`, {
      allowed,
    });
  }
}

/**
 * A third-party generation, translation, OCR or storage call failed or
 * answered with something unusable.
 */
export class ProviderError extends AppError {
  constructor(
    public readonly provider: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(502, 'PROVIDER_ERROR', `${provider}: ${message}`);
    this.name = 'ProviderError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  static from(provider: string, error: unknown): ProviderError {
    if (error instanceof ProviderError) {
      return error;
    }
    const message = error instanceof Error ? error.message : 'Unknown error';
    return new ProviderError(provider, message, { cause: error });
  }
}

export function formatBytes(bytes: number): string {
  if (bytes >= 1024 * 1024) {
    return `${Math.round((bytes / (1024 * 1024)) * 10) / 10} MB`;
  }
  if (bytes >= 1024) {
    return `${Math.round((bytes / 1024) * 10) / 10} KB`;
  }
  return `${bytes} B`;
}
