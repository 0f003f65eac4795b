/**
 * @fileoverview File Risk Artifact Repository (Infrastructure Layer)
 *
 * Reads the fitted scaler and logistic regression from JSON files and
 * validates them against the artifact schemas.
 *
 * @module @cardiorisk/infrastructure/artifacts/file-risk-artifact-repository
 *
 * ## Hexagonal Architecture
 *
 * This is an **ADAPTER** implementing the IRiskArtifactRepository port
 * from the domain layer.
 */

import { readFile } from 'fs/promises';
import type { z } from 'zod';

import {
  ArtifactCorruptError,
  ArtifactNotFoundError,
  createLogger,
  type ArtifactPaths,
  type Logger,
} from '@cardiorisk/core';
import type { IRiskArtifactRepository, RiskArtifacts } from '@cardiorisk/domain';
import { ModelArtifactSchema, ScalerArtifactSchema } from '@cardiorisk/types';

const logger = createLogger({ name: 'file-risk-artifact-repository' });

const NOT_FOUND_CODES = new Set(['ENOENT', 'ENOTDIR']);

export interface FileRiskArtifactRepositoryDeps {
  readonly readFile?: (path: string) => Promise<string>;
  readonly logger?: Logger;
}

function isFileNotFound(error: unknown): error is NodeJS.ErrnoException {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    NOT_FOUND_CODES.has(error.code)
  );
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export class FileRiskArtifactRepository implements IRiskArtifactRepository {
  private readonly paths: ArtifactPaths;
  private readonly readText: (path: string) => Promise<string>;
  private readonly logger: Logger;

  constructor(paths: ArtifactPaths, deps: FileRiskArtifactRepositoryDeps = {}) {
    this.paths = paths;
    this.readText = deps.readFile ?? ((path) => readFile(path, 'utf8'));
    this.logger = deps.logger ?? logger;
  }

  async load(): Promise<RiskArtifacts> {
    const [scaler, model] = await Promise.all([
      this.readArtifact(this.paths.scalerPath, ScalerArtifactSchema),
      this.readArtifact(this.paths.modelPath, ModelArtifactSchema),
    ]);

    const artifacts: RiskArtifacts = Object.freeze({
      scaler: Object.freeze({
        mean: Object.freeze([...scaler.mean]),
        scale: Object.freeze([...scaler.scale]),
      }),
      model: Object.freeze({
        coefficients: Object.freeze([...model.coefficients]),
        intercept: model.intercept,
        version: model.version,
      }),
    });

    this.logger.info(
      { scalerPath: this.paths.scalerPath, modelPath: this.paths.modelPath, version: model.version },
      'Risk artifacts loaded'
    );

    return artifacts;
  }

  private async readArtifact<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    let raw: string;
    try {
      raw = await this.readText(path);
    } catch (error) {
      if (isFileNotFound(error)) {
        throw new ArtifactNotFoundError(path, error);
      }
      throw new ArtifactCorruptError(
        path,
        'unreadable',
        error instanceof Error ? error : undefined
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ArtifactCorruptError(
        path,
        'invalid JSON',
        error instanceof Error ? error : undefined
      );
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new ArtifactCorruptError(path, formatIssues(result.error));
    }

    return result.data;
  }
}

export function createFileRiskArtifactRepository(
  paths: ArtifactPaths,
  deps?: FileRiskArtifactRepositoryDeps
): FileRiskArtifactRepository {
  return new FileRiskArtifactRepository(paths, deps);
}
