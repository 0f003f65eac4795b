/**
 * @fileoverview Cardiovascular Risk Service
 *
 * Runs the full pipeline for one patient: feature assembly, scoring,
 * tiering and the supporting read-outs. The fitted artifacts are injected
 * once and only read afterwards, so one instance serves concurrent callers.
 *
 * @module domain/cardio-risk/cardio-risk-service
 */

import { createLogger, generateCorrelationId, type Logger } from '@cardiorisk/core';
import type {
  FeatureVector,
  PatientIntake,
  PatientRecord,
  PredictionConfidence,
  RelativeRisk,
  RiskAssessment,
  RiskFactor,
  ScalerParameters,
  ScoringModel,
} from '@cardiorisk/types';

import { buildFeatureVector, computeBmi } from './feature-builder.js';
import { intakeToPatientRecord } from './patient-encoding.js';
import { analyzeRiskFactors } from './risk-factors.js';
import {
  classifyConfidence,
  classifyRelativeRisk,
  predictClass,
  scoreRisk,
} from './risk-scorer.js';

const logger = createLogger({ name: 'cardio-risk-service' });

// ============================================================================
// TYPES
// ============================================================================

/**
 * Fitted scaler and model pair, frozen after load
 */
export interface RiskArtifacts {
  readonly scaler: ScalerParameters;
  readonly model: ScoringModel;
}

/**
 * Port for loading the fitted artifacts (implemented in infrastructure)
 */
export interface IRiskArtifactRepository {
  load(): Promise<RiskArtifacts>;
}

export interface CardioRiskReport {
  readonly features: FeatureVector;
  readonly bmi: number;
  readonly assessment: RiskAssessment;
  /** Classifier decision at the default 0.5 threshold */
  readonly predictedClass: 0 | 1;
  readonly relativeRisk: RelativeRisk;
  readonly confidence: PredictionConfidence;
  readonly riskFactors: readonly RiskFactor[];
  readonly modelVersion: string | undefined;
  readonly assessedAt: string;
}

export interface AssessOptions {
  readonly correlationId?: string;
}

export interface CardioRiskServiceDeps {
  readonly logger?: Logger;
  readonly clock?: () => Date;
}

// ============================================================================
// SERVICE
// ============================================================================

export class CardioRiskService {
  private readonly artifacts: RiskArtifacts;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(artifacts: RiskArtifacts, deps: CardioRiskServiceDeps = {}) {
    this.artifacts = artifacts;
    this.logger = deps.logger ?? logger;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Score a patient record. Errors propagate to the caller unchanged.
   */
  assess(record: PatientRecord, options: AssessOptions = {}): CardioRiskReport {
    const correlationId = options.correlationId ?? generateCorrelationId();
    const startTime = Date.now();
    const { scaler, model } = this.artifacts;

    try {
      const features = buildFeatureVector(record);
      const assessment = scoreRisk(features, scaler, model);

      const report: CardioRiskReport = Object.freeze({
        features,
        bmi: computeBmi(record.heightCm, record.weightKg),
        assessment,
        predictedClass: predictClass(assessment.probabilityPercent / 100),
        relativeRisk: classifyRelativeRisk(assessment.probabilityPercent),
        confidence: classifyConfidence(assessment.probabilityPercent),
        riskFactors: analyzeRiskFactors(record),
        modelVersion: model.version,
        assessedAt: this.clock().toISOString(),
      });

      this.logger.info(
        {
          correlationId,
          tier: assessment.tier,
          modelVersion: model.version,
          durationMs: Date.now() - startTime,
        },
        'Cardiovascular risk assessed'
      );

      return report;
    } catch (error) {
      this.logger.warn({ correlationId, err: error }, 'Cardiovascular risk assessment failed');
      throw error;
    }
  }

  /**
   * Score categorical questionnaire answers
   */
  assessIntake(intake: PatientIntake, options: AssessOptions = {}): CardioRiskReport {
    return this.assess(intakeToPatientRecord(intake), options);
  }
}

export function createCardioRiskService(
  artifacts: RiskArtifacts,
  deps?: CardioRiskServiceDeps
): CardioRiskService {
  return new CardioRiskService(artifacts, deps);
}
