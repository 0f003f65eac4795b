import { z } from 'zod';

/**
 * Cardiovascular Risk Schemas
 *
 * Intake, artifact and assessment shapes for the 10-year coronary heart
 * disease risk pipeline. The feature order below is shared with the fitted
 * scaler and model artifacts and must never be reordered.
 */

// ============================================================================
// FEATURE SCHEMA
// ============================================================================

export const FEATURE_NAMES = [
  'age',
  'male',
  'currentSmoker',
  'cigsPerDay',
  'totChol',
  'sysBP',
  'diaBP',
  'BMI',
  'heartRate',
  'glucose',
  'diabetes',
  'prevalentHyp',
] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];

export const FEATURE_COUNT = FEATURE_NAMES.length;

/**
 * Ordered numeric features in `FEATURE_NAMES` order
 */
export type FeatureVector = readonly number[];

// ============================================================================
// PATIENT INTAKE
// ============================================================================

/**
 * Patient record with the ranges accepted by the intake form.
 * The scoring pipeline itself does not enforce these ranges.
 */
export const PatientRecordSchema = z.object({
  age: z.number().int().min(1).max(120),
  isMale: z.boolean(),
  isCurrentSmoker: z.boolean(),
  cigarettesPerDay: z.number().int().min(0).max(100),
  totalCholesterol: z.number().min(100).max(400), // mg/dL
  systolicBP: z.number().min(80).max(250), // mm Hg
  diastolicBP: z.number().min(60).max(200), // mm Hg
  heightCm: z.number().min(100).max(250),
  weightKg: z.number().min(30).max(300),
  restingHeartRate: z.number().min(40).max(200), // bpm
  fastingGlucose: z.number().min(50).max(400), // mg/dL
  hasDiabetes: z.boolean(),
  hasHypertension: z.boolean(),
});

export type PatientRecord = Readonly<z.infer<typeof PatientRecordSchema>>;

export const SexSchema = z.enum(['MALE', 'FEMALE']);
export const SmokingStatusSchema = z.enum(['SMOKER', 'NON_SMOKER']);
export const YesNoSchema = z.enum(['YES', 'NO']);

export type Sex = z.infer<typeof SexSchema>;
export type SmokingStatus = z.infer<typeof SmokingStatusSchema>;
export type YesNo = z.infer<typeof YesNoSchema>;

/**
 * Categorical intake as collected by a questionnaire
 */
export const PatientIntakeSchema = PatientRecordSchema.omit({
  isMale: true,
  isCurrentSmoker: true,
  hasDiabetes: true,
  hasHypertension: true,
}).extend({
  sex: SexSchema,
  smokingStatus: SmokingStatusSchema,
  diabetes: YesNoSchema,
  hypertension: YesNoSchema,
});

export type PatientIntake = Readonly<z.infer<typeof PatientIntakeSchema>>;

// ============================================================================
// FITTED ARTIFACTS
// ============================================================================

const FiniteNumberSchema = z.number().finite();

const FeatureWeightsSchema = z
  .array(FiniteNumberSchema)
  .length(FEATURE_COUNT, `Expected ${FEATURE_COUNT} values, one per feature`);

// A zero scale makes standardization undefined
const FeatureScalesSchema = FeatureWeightsSchema.refine(
  (values) => values.every((value) => value !== 0),
  { message: 'Scale values must be non-zero' }
);

const FeatureNamesSchema = z
  .array(z.string())
  .refine(
    (names) =>
      names.length === FEATURE_COUNT && names.every((name, i) => name === FEATURE_NAMES[i]),
    { message: `Feature names must be ${FEATURE_NAMES.join(', ')}` }
  );

/**
 * Fitted standard scaler (per-feature mean and standard deviation)
 */
export const ScalerArtifactSchema = z.object({
  featureNames: FeatureNamesSchema.optional(),
  mean: FeatureWeightsSchema,
  scale: FeatureScalesSchema,
});

/**
 * Fitted logistic regression (coefficients for the positive class)
 */
export const ModelArtifactSchema = z.object({
  version: z.string().min(1).optional(),
  featureNames: FeatureNamesSchema.optional(),
  coefficients: FeatureWeightsSchema,
  intercept: FiniteNumberSchema,
});

export type ScalerArtifact = z.infer<typeof ScalerArtifactSchema>;
export type ModelArtifact = z.infer<typeof ModelArtifactSchema>;

export interface ScalerParameters {
  readonly mean: readonly number[];
  readonly scale: readonly number[];
}

export interface ScoringModel {
  readonly coefficients: readonly number[];
  readonly intercept: number;
  readonly version?: string;
}

// ============================================================================
// ASSESSMENT
// ============================================================================

export const RiskTierSchema = z.enum(['LOW', 'MODERATE', 'HIGH']);
export type RiskTier = z.infer<typeof RiskTierSchema>;

export const RelativeRiskSchema = z.enum(['HIGH', 'AVERAGE']);
export type RelativeRisk = z.infer<typeof RelativeRiskSchema>;

export const PredictionConfidenceSchema = z.enum(['HIGH', 'MODERATE']);
export type PredictionConfidence = z.infer<typeof PredictionConfidenceSchema>;

export const RiskAssessmentSchema = z.object({
  probabilityPercent: z.number().min(0).max(100),
  tier: RiskTierSchema,
  recommendations: z.array(z.string()).length(3),
});

export type RiskAssessment = Readonly<{
  probabilityPercent: number;
  tier: RiskTier;
  recommendations: readonly string[];
}>;

export const RiskFactorLevelSchema = z.enum(['HIGH', 'MODERATE', 'LOW', 'HIGHER', 'LOWER']);
export type RiskFactorLevel = z.infer<typeof RiskFactorLevelSchema>;

export const RiskFactorNameSchema = z.enum([
  'AGE',
  'SEX',
  'SMOKING',
  'CHOLESTEROL',
  'BLOOD_PRESSURE',
  'BMI',
  'DIABETES',
]);
export type RiskFactorName = z.infer<typeof RiskFactorNameSchema>;

export interface RiskFactor {
  readonly factor: RiskFactorName;
  readonly value: string;
  readonly level: RiskFactorLevel;
}
