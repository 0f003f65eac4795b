/**
 * Custom error classes for the risk-scoring pipeline
 * These errors provide safe, non-PHI error messages for callers
 */

export interface SafeErrorDetails {
  code: string;
  message: string;
  statusCode: number;
}

/**
 * Base application error with safe error details
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, code: string, statusCode = 500) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = true;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Get safe error details for API response (no sensitive info)
   */
  toSafeError(): SafeErrorDetails {
    return {
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
    };
  }
}

/**
 * Validation error for malformed input (caller bug)
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * Scoring error
 * Thrown when the fitted parameters cannot be used (degenerate scaler,
 * coefficient count mismatch)
 */
export class ScoringError extends AppError {
  public readonly featureIndex: number | undefined;

  constructor(message: string, featureIndex?: number) {
    super(message, 'SCORING_ERROR', 422);
    this.name = 'ScoringError';
    this.featureIndex = featureIndex;
  }
}

/**
 * Artifact not found error
 * Fatal at startup: there is no fallback model
 */
export class ArtifactNotFoundError extends AppError {
  public readonly artifactPath: string;
  public readonly originalError: Error | undefined;

  constructor(artifactPath: string, originalError?: Error) {
    super(`Model artifact not found: ${artifactPath}`, 'ARTIFACT_NOT_FOUND', 503);
    this.name = 'ArtifactNotFoundError';
    this.artifactPath = artifactPath;
    this.originalError = originalError;
  }
}

/**
 * Artifact corrupt error
 * Thrown when an artifact cannot be deserialized or fails its schema
 */
export class ArtifactCorruptError extends AppError {
  public readonly artifactPath: string;
  public readonly originalError: Error | undefined;

  constructor(artifactPath: string, message: string, originalError?: Error) {
    super(`Model artifact corrupt: ${artifactPath}: ${message}`, 'ARTIFACT_CORRUPT', 503);
    this.name = 'ArtifactCorruptError';
    this.artifactPath = artifactPath;
    this.originalError = originalError;
  }
}

/**
 * Check if an error is an operational error (expected) vs programming error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

/**
 * Artifact errors are fatal to the serving process
 */
export function isFatalArtifactError(
  error: unknown
): error is ArtifactNotFoundError | ArtifactCorruptError {
  return error instanceof ArtifactNotFoundError || error instanceof ArtifactCorruptError;
}

/**
 * Convert unknown error to safe error response
 */
export function toSafeErrorResponse(error: unknown): SafeErrorDetails {
  if (isOperationalError(error)) {
    return error.toSafeError();
  }

  // For unexpected errors, return a generic message
  return {
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
    statusCode: 500,
  };
}
