/**
 * Base application error. All domain-specific errors extend this class.
 *
 * - `code`          short machine-readable identifier (e.g. "DOMAIN_NOT_FOUND")
 * - `statusCode`    HTTP-compatible status code for API consumers
 * - `isOperational` true = expected/recoverable, false = programmer error
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly timestamp: string;

  constructor(
    message: string,
    code: string,
    statusCode = 500,
    isOperational = true,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.timestamp = new Date().toISOString();

    // Maintains proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      isOperational: this.isOperational,
      timestamp: this.timestamp,
      ...(process.env['NODE_ENV'] !== 'production' ? { stack: this.stack } : {}),
    };
  }
}

/** A search result URL from which no host could be extracted. */
export class InvalidUrlError extends AppError {
  public readonly url: string;

  constructor(message: string, url: string) {
    super(message, 'INVALID_URL', 422);
    this.url = url;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      url: this.url,
    };
  }
}

/**
 * Raised (as a failure result, not a throw) by registry operations that
 * require an existing domain record.
 */
export class DomainNotFoundError extends AppError {
  public readonly domainName: string;

  constructor(domainName: string) {
    super(`Domain not found: ${domainName}`, 'DOMAIN_NOT_FOUND', 404);
    this.domainName = domainName;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      domainName: this.domainName,
    };
  }
}

export class CandidateCreationError extends AppError {
  public readonly sourceUrl: string;

  constructor(message: string, sourceUrl: string, statusCode = 500) {
    super(message, 'CANDIDATE_CREATION_FAILED', statusCode);
    this.sourceUrl = sourceUrl;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      sourceUrl: this.sourceUrl,
    };
  }
}

/** Invalid environment or data files. Always fatal at startup. */
export class ConfigurationError extends AppError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'CONFIGURATION_ERROR', 500, false);
    this.issues = issues;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      issues: this.issues,
    };
  }
}

export class ValidationError extends AppError {
  public readonly field: string;
  public readonly value: unknown;

  constructor(
    message: string,
    field: string,
    value?: unknown,
    statusCode = 422,
  ) {
    super(message, 'VALIDATION_ERROR', statusCode);
    this.field = field;
    this.value = value;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      field: this.field,
      value: this.value,
    };
  }
}

/**
 * Outcome of a business operation that can fail for a caller-visible
 * reason. Callers branch on `success` instead of catching.
 */
export type OperationResult<T, E extends AppError = AppError> =
  | { success: true; value: T }
  | { success: false; error: E };

/**
 * Type guard to distinguish operational errors (expected) from
 * programmer errors (bugs).
 */
export function isOperationalError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}

/** Extracts a loggable message from anything thrown. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
