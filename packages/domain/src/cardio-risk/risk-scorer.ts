/**
 * @fileoverview Risk Scorer
 *
 * Standardizes a feature vector with the fitted scaler, applies the fitted
 * logistic regression and maps the resulting probability to a risk tier.
 *
 * Pure and reentrant: the scaler and model are only read.
 *
 * @module domain/cardio-risk/risk-scorer
 */

import { ScoringError, ValidationError } from '@cardiorisk/core';
import {
  FEATURE_COUNT,
  type FeatureVector,
  type PredictionConfidence,
  type RelativeRisk,
  type RiskAssessment,
  type RiskTier,
  type ScalerParameters,
  type ScoringModel,
} from '@cardiorisk/types';

import { assertFeatureVector } from './feature-builder.js';

// ============================================================================
// CONSTANTS
// ============================================================================

/**
 * Logit is clamped to ±LOGIT_BOUND before exponentiation
 */
export const LOGIT_BOUND = 35;

/**
 * Tier cut points on the 0-100 probability scale.
 * A value equal to a cut point belongs to the upper tier.
 */
export const RISK_TIER_THRESHOLDS = Object.freeze({
  MODERATE: 20,
  HIGH: 50,
} as const);

export const RISK_TIER_LABELS: Readonly<Record<RiskTier, string>> = Object.freeze({
  LOW: 'Low Risk',
  MODERATE: 'Moderate Risk',
  HIGH: 'High Risk',
});

export const RISK_TIER_RECOMMENDATIONS: Readonly<Record<RiskTier, readonly string[]>> =
  Object.freeze({
    LOW: Object.freeze([
      'Continue maintaining healthy lifestyle habits',
      'Regular exercise and balanced diet',
      'Annual health check-ups',
    ]),
    MODERATE: Object.freeze([
      'Consider lifestyle modifications',
      'Monitor blood pressure and cholesterol regularly',
      'Discuss prevention strategies with your doctor',
    ]),
    HIGH: Object.freeze([
      'Immediate medical consultation recommended',
      'Consider medication if advised by physician',
      'Urgent lifestyle changes needed',
    ]),
  });

/** Classifier decision threshold on the 0-1 probability scale */
export const DEFAULT_DECISION_THRESHOLD = 0.5;

/** Midpoint of the MODERATE and HIGH cut points */
export const RELATIVE_RISK_THRESHOLD =
  (RISK_TIER_THRESHOLDS.MODERATE + RISK_TIER_THRESHOLDS.HIGH) / 2;

/** Distance from 50% beyond which a prediction counts as confident */
export const CONFIDENCE_MARGIN = 20;

// ============================================================================
// STANDARDIZATION
// ============================================================================

function assertScaler(scaler: ScalerParameters): void {
  if (scaler.mean.length !== FEATURE_COUNT || scaler.scale.length !== FEATURE_COUNT) {
    throw new ScoringError(
      `Scaler must have ${FEATURE_COUNT} means and scales, got ${scaler.mean.length} and ${scaler.scale.length}`
    );
  }

  scaler.scale.forEach((scale, index) => {
    if (scale === 0 || !Number.isFinite(scale)) {
      throw new ScoringError(`Degenerate scaler: scale of feature ${index} is ${scale}`, index);
    }
  });
}

/**
 * z[i] = (x[i] - mean[i]) / scale[i]
 */
export function standardize(vector: FeatureVector, scaler: ScalerParameters): FeatureVector {
  assertFeatureVector(vector);
  assertScaler(scaler);

  return Object.freeze(vector.map((value, i) => (value - scaler.mean[i]) / scaler.scale[i]));
}

/**
 * Inverse of `standardize`: x[i] = z[i] * scale[i] + mean[i]
 */
export function destandardize(standardized: FeatureVector, scaler: ScalerParameters): FeatureVector {
  assertFeatureVector(standardized);
  assertScaler(scaler);

  return Object.freeze(standardized.map((value, i) => value * scaler.scale[i] + scaler.mean[i]));
}

// ============================================================================
// INFERENCE
// ============================================================================

/**
 * dot(coefficients, z) + intercept
 */
export function linearScore(standardized: FeatureVector, model: ScoringModel): number {
  if (model.coefficients.length !== FEATURE_COUNT) {
    throw new ScoringError(
      `Model must have ${FEATURE_COUNT} coefficients, got ${model.coefficients.length}`
    );
  }
  if (!Number.isFinite(model.intercept)) {
    throw new ScoringError('Model intercept is not a finite number');
  }

  return standardized.reduce(
    (sum, value, i) => sum + model.coefficients[i] * value,
    model.intercept
  );
}

/**
 * Logistic link with the logit clamped to ±LOGIT_BOUND
 */
export function sigmoid(logit: number): number {
  if (Number.isNaN(logit)) {
    throw new ScoringError('Linear score is not a number');
  }

  const clamped = Math.min(Math.max(logit, -LOGIT_BOUND), LOGIT_BOUND);
  return 1 / (1 + Math.exp(-clamped));
}

/**
 * Probability (0-1) of a coronary event within ten years
 */
export function predictProbability(
  vector: FeatureVector,
  scaler: ScalerParameters,
  model: ScoringModel
): number {
  const standardized = standardize(vector, scaler);
  return sigmoid(linearScore(standardized, model));
}

/**
 * Classifier decision: 1 when the probability reaches the threshold
 */
export function predictClass(probability: number, threshold = DEFAULT_DECISION_THRESHOLD): 0 | 1 {
  return probability >= threshold ? 1 : 0;
}

// ============================================================================
// TIERING
// ============================================================================

function assertPercentage(probabilityPercent: number): void {
  if (!Number.isFinite(probabilityPercent)) {
    throw new ValidationError('Probability must be a finite number', { probabilityPercent });
  }
}

export function classifyRiskTier(probabilityPercent: number): RiskTier {
  assertPercentage(probabilityPercent);

  if (probabilityPercent < RISK_TIER_THRESHOLDS.MODERATE) return 'LOW';
  if (probabilityPercent < RISK_TIER_THRESHOLDS.HIGH) return 'MODERATE';
  return 'HIGH';
}

export function getRecommendations(tier: RiskTier): readonly string[] {
  return RISK_TIER_RECOMMENDATIONS[tier];
}

export function classifyRelativeRisk(probabilityPercent: number): RelativeRisk {
  assertPercentage(probabilityPercent);
  return probabilityPercent > RELATIVE_RISK_THRESHOLD ? 'HIGH' : 'AVERAGE';
}

export function classifyConfidence(probabilityPercent: number): PredictionConfidence {
  assertPercentage(probabilityPercent);
  return Math.abs(probabilityPercent - 50) > CONFIDENCE_MARGIN ? 'HIGH' : 'MODERATE';
}

/**
 * One decimal with a percent sign, e.g. "23.4%"
 */
export function formatRiskPercentage(probabilityPercent: number): string {
  return `${probabilityPercent.toFixed(1)}%`;
}

// ============================================================================
// SCORING
// ============================================================================

/**
 * Standardize, infer and tier a feature vector
 */
export function scoreRisk(
  vector: FeatureVector,
  scaler: ScalerParameters,
  model: ScoringModel
): RiskAssessment {
  const probabilityPercent = predictProbability(vector, scaler, model) * 100;
  const tier = classifyRiskTier(probabilityPercent);

  return Object.freeze({
    probabilityPercent,
    tier,
    recommendations: getRecommendations(tier),
  });
}
