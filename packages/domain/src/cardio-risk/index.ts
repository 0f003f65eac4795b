/**
 * Cardio Risk Module - 10-Year Coronary Heart Disease Risk
 *
 * Feature assembly, standardization, logistic inference and tiering
 * over a fitted scaler and logistic regression model.
 *
 * @module domain/cardio-risk
 */

export { encodeFlag, intakeToPatientRecord, type BinaryFeature } from './patient-encoding.js';

export {
  computeBmi,
  buildFeatureVector,
  assertFeatureVector,
  validatePatientRecord,
} from './feature-builder.js';

export {
  LOGIT_BOUND,
  RISK_TIER_THRESHOLDS,
  RISK_TIER_LABELS,
  RISK_TIER_RECOMMENDATIONS,
  DEFAULT_DECISION_THRESHOLD,
  RELATIVE_RISK_THRESHOLD,
  CONFIDENCE_MARGIN,
  standardize,
  destandardize,
  linearScore,
  sigmoid,
  predictProbability,
  predictClass,
  classifyRiskTier,
  getRecommendations,
  classifyRelativeRisk,
  classifyConfidence,
  formatRiskPercentage,
  scoreRisk,
} from './risk-scorer.js';

export { RISK_FACTOR_THRESHOLDS, analyzeRiskFactors } from './risk-factors.js';

export {
  CardioRiskService,
  createCardioRiskService,
  type RiskArtifacts,
  type IRiskArtifactRepository,
  type CardioRiskReport,
  type AssessOptions,
  type CardioRiskServiceDeps,
} from './cardio-risk-service.js';
