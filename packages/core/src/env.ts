import { join } from 'path';
import { z } from 'zod';

/**
 * Environment Variable Validation
 * Ensures the scoring service configuration is valid at boot time
 */

// Base service config
const ServiceEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
  SERVICE_NAME: z.string().min(1).default('cardiorisk'),
});

// Fitted model artifacts
const ArtifactEnvSchema = z.object({
  /** Directory holding the fitted scaler and model */
  CARDIO_MODEL_DIR: z.string().min(1).default('model'),
  /** Logistic regression artifact file name */
  CARDIO_MODEL_FILE: z.string().min(1).default('model.json'),
  /** Standard scaler artifact file name */
  CARDIO_SCALER_FILE: z.string().min(1).default('scaler.json'),
});

export const ScorerEnvSchema = ServiceEnvSchema.merge(ArtifactEnvSchema);

export type ScorerEnv = z.infer<typeof ScorerEnvSchema>;

export interface ArtifactPaths {
  readonly modelPath: string;
  readonly scalerPath: string;
}

/**
 * Validate environment variables
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): ScorerEnv {
  const result = ScorerEnvSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const errorMessages = Object.entries(errors)
      .map(([field, messages]) => `  ${field}: ${(messages ?? []).join(', ')}`)
      .join('\n');

    throw new Error(`Environment validation failed:\n${errorMessages}`);
  }

  return result.data;
}

/**
 * Resolve the scaler and model artifact locations
 */
export function resolveArtifactPaths(env: ScorerEnv): ArtifactPaths {
  return {
    modelPath: join(env.CARDIO_MODEL_DIR, env.CARDIO_MODEL_FILE),
    scalerPath: join(env.CARDIO_MODEL_DIR, env.CARDIO_SCALER_FILE),
  };
}
