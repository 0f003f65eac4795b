export {
  createLogger,
  withCorrelationId,
  generateCorrelationId,
  logger,
  REDACTED_FIELDS,
  REDACTION_CENSOR,
  type Logger,
  type CreateLoggerOptions,
} from './logger.js';

export {
  AppError,
  ValidationError,
  ScoringError,
  ArtifactNotFoundError,
  ArtifactCorruptError,
  isOperationalError,
  isFatalArtifactError,
  toSafeErrorResponse,
  type SafeErrorDetails,
} from './errors.js';

export {
  ScorerEnvSchema,
  validateEnv,
  resolveArtifactPaths,
  type ScorerEnv,
  type ArtifactPaths,
} from './env.js';
