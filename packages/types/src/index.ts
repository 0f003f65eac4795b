/**
 * CardioRisk Types Package
 *
 * Zod schemas and TypeScript types shared by the risk-scoring packages.
 *
 * @module @cardiorisk/types
 */

export {
  FEATURE_NAMES,
  FEATURE_COUNT,
  PatientRecordSchema,
  PatientIntakeSchema,
  SexSchema,
  SmokingStatusSchema,
  YesNoSchema,
  ScalerArtifactSchema,
  ModelArtifactSchema,
  RiskTierSchema,
  RelativeRiskSchema,
  PredictionConfidenceSchema,
  RiskAssessmentSchema,
  RiskFactorLevelSchema,
  RiskFactorNameSchema,
  type FeatureName,
  type FeatureVector,
  type PatientRecord,
  type PatientIntake,
  type Sex,
  type SmokingStatus,
  type YesNo,
  type ScalerArtifact,
  type ModelArtifact,
  type ScalerParameters,
  type ScoringModel,
  type RiskTier,
  type RelativeRisk,
  type PredictionConfidence,
  type RiskAssessment,
  type RiskFactor,
  type RiskFactorLevel,
  type RiskFactorName,
} from './cardio-risk.schema.js';
