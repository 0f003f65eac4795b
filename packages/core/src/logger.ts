import { randomUUID } from 'crypto';
import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

/**
 * Medical-grade logger with PHI redaction
 * Patient identifiers and raw clinical inputs never reach the logs;
 * only derived results (tier, timings) are logged by the scoring services.
 */

// Fields to completely redact, at the top level and one level down
export const REDACTED_FIELDS: readonly string[] = [
  'patient',
  'patientName',
  'patientId',
  'record',
  'intake',
  'features',
  'featureVector',
  'firstName',
  'lastName',
  'dateOfBirth',
  'mrn',
  'email',
  'phone',
  'address',
  'authorization',
  'token',
  'secret',
];

export const REDACTION_CENSOR = '[REDACTED]';

function createRedactor(): { paths: string[]; censor: string } {
  return {
    paths: REDACTED_FIELDS.flatMap((field) => [field, `*.${field}`]),
    censor: REDACTION_CENSOR,
  };
}

export interface CreateLoggerOptions {
  name: string;
  level?: string;
  correlationId?: string;
  /** Pretty-print through pino-pretty (default: development only) */
  pretty?: boolean;
  /** Custom destination, e.g. an in-memory stream in tests */
  destination?: DestinationStream;
}

function isDevelopment(): boolean {
  const env = process.env.NODE_ENV;
  return env === undefined || env === 'development';
}

/**
 * Create a logger instance with PHI redaction
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const { name, level = process.env.LOG_LEVEL ?? 'info', correlationId, destination } = options;

  const loggerOptions: LoggerOptions = {
    name,
    level,
    redact: createRedactor(),
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    // Omit pid/hostname; keep name and correlationId in the bindings
    base: correlationId ? { correlationId } : {},
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  if (destination) {
    return pino(loggerOptions, destination);
  }

  const pretty = options.pretty ?? isDevelopment();
  if (pretty) {
    const transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    }) as DestinationStream;
    return pino(loggerOptions, transport);
  }

  return pino(loggerOptions);
}

/**
 * Create a child logger with correlation ID
 */
export function withCorrelationId(logger: Logger, correlationId: string): Logger {
  return logger.child({ correlationId });
}

/**
 * Generate a correlation ID
 */
export function generateCorrelationId(): string {
  return `${Date.now()}-${randomUUID().slice(0, 12)}`;
}

// Default logger instance
export const logger = createLogger({ name: process.env.SERVICE_NAME ?? 'cardiorisk' });

export type { Logger };
