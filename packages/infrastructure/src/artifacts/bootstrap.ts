/**
 * @fileoverview Scoring Service Bootstrap
 *
 * Startup wiring: environment → artifact paths → cached artifacts →
 * CardioRiskService. Artifact errors are fatal; callers should exit.
 *
 * @module @cardiorisk/infrastructure/artifacts/bootstrap
 */

import {
  createLogger,
  isFatalArtifactError,
  resolveArtifactPaths,
  validateEnv,
  type Logger,
} from '@cardiorisk/core';
import {
  createCardioRiskService,
  type CardioRiskService,
  type IRiskArtifactRepository,
} from '@cardiorisk/domain';

import { getRiskArtifacts } from './artifact-cache.js';
import { createFileRiskArtifactRepository } from './FileRiskArtifactRepository.js';

export interface BootstrapOptions {
  readonly env?: NodeJS.ProcessEnv;
  /** Override the file-backed repository */
  readonly repository?: IRiskArtifactRepository;
  readonly logger?: Logger;
}

export async function bootstrapCardioRiskService(
  options: BootstrapOptions = {}
): Promise<CardioRiskService> {
  const env = validateEnv(options.env);
  const logger = options.logger ?? createLogger({ name: env.SERVICE_NAME, level: env.LOG_LEVEL });
  const repository =
    options.repository ?? createFileRiskArtifactRepository(resolveArtifactPaths(env), { logger });

  try {
    const artifacts = await getRiskArtifacts(repository);
    return createCardioRiskService(artifacts, { logger });
  } catch (error) {
    if (isFatalArtifactError(error)) {
      logger.fatal({ err: error, artifactPath: error.artifactPath }, 'Risk artifacts unavailable');
    }
    throw error;
  }
}
