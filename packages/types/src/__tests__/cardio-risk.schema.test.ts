/**
 * Cardiovascular Risk Schema Tests
 */

import { describe, it, expect } from 'vitest';
import {
  FEATURE_NAMES,
  FEATURE_COUNT,
  PatientRecordSchema,
  PatientIntakeSchema,
  ScalerArtifactSchema,
  ModelArtifactSchema,
  RiskAssessmentSchema,
} from '../cardio-risk.schema.js';

const validRecord = {
  age: 50,
  isMale: true,
  isCurrentSmoker: false,
  cigarettesPerDay: 0,
  totalCholesterol: 200,
  systolicBP: 120,
  diastolicBP: 80,
  heightCm: 170,
  weightKg: 70,
  restingHeartRate: 70,
  fastingGlucose: 90,
  hasDiabetes: false,
  hasHypertension: false,
};

const twelve = (value: number): number[] => Array.from({ length: FEATURE_COUNT }, () => value);

describe('FEATURE_NAMES', () => {
  it('should list the twelve features in artifact order', () => {
    expect(FEATURE_COUNT).toBe(12);
    expect(FEATURE_NAMES[0]).toBe('age');
    expect(FEATURE_NAMES[7]).toBe('BMI');
    expect(FEATURE_NAMES[11]).toBe('prevalentHyp');
  });
});

describe('PatientRecordSchema', () => {
  it('should accept a record inside the form ranges', () => {
    expect(PatientRecordSchema.safeParse(validRecord).success).toBe(true);
  });

  it('should reject an age above 120', () => {
    expect(PatientRecordSchema.safeParse({ ...validRecord, age: 121 }).success).toBe(false);
  });

  it('should reject a fractional cigarette count', () => {
    const result = PatientRecordSchema.safeParse({ ...validRecord, cigarettesPerDay: 2.5 });
    expect(result.success).toBe(false);
  });

  it('should accept the inclusive range bounds', () => {
    const result = PatientRecordSchema.safeParse({
      ...validRecord,
      totalCholesterol: 400,
      systolicBP: 80,
      diastolicBP: 200,
      heightCm: 100,
      weightKg: 300,
    });
    expect(result.success).toBe(true);
  });
});

describe('PatientIntakeSchema', () => {
  it('should accept categorical answers', () => {
    const result = PatientIntakeSchema.safeParse({
      age: 62,
      sex: 'FEMALE',
      smokingStatus: 'SMOKER',
      cigarettesPerDay: 10,
      totalCholesterol: 240,
      systolicBP: 140,
      diastolicBP: 90,
      heightCm: 160,
      weightKg: 64,
      restingHeartRate: 72,
      fastingGlucose: 95,
      diabetes: 'NO',
      hypertension: 'YES',
    });
    expect(result.success).toBe(true);
  });

  it('should reject an unknown sex value', () => {
    const result = PatientIntakeSchema.safeParse({ sex: 'Male' });
    expect(result.success).toBe(false);
  });
});

describe('ScalerArtifactSchema', () => {
  it('should accept twelve means and scales', () => {
    const result = ScalerArtifactSchema.safeParse({ mean: twelve(0), scale: twelve(1) });
    expect(result.success).toBe(true);
  });

  it('should reject a short mean vector', () => {
    const result = ScalerArtifactSchema.safeParse({ mean: [1, 2, 3], scale: twelve(1) });
    expect(result.success).toBe(false);
  });

  it('should reject a zero scale', () => {
    const scale = twelve(1).map((value, i) => (i === 7 ? 0 : value));
    const result = ScalerArtifactSchema.safeParse({ mean: twelve(0), scale });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]).toMatchObject({
      path: ['scale'],
      message: 'Scale values must be non-zero',
    });
  });

  it('should reject feature names in a different order', () => {
    const reordered = [...FEATURE_NAMES].reverse();
    const result = ScalerArtifactSchema.safeParse({
      featureNames: reordered,
      mean: twelve(0),
      scale: twelve(1),
    });
    expect(result.success).toBe(false);
  });

  it('should accept feature names in artifact order', () => {
    const result = ScalerArtifactSchema.safeParse({
      featureNames: [...FEATURE_NAMES],
      mean: twelve(0),
      scale: twelve(1),
    });
    expect(result.success).toBe(true);
  });
});

describe('ModelArtifactSchema', () => {
  it('should accept coefficients with an intercept and version', () => {
    const result = ModelArtifactSchema.safeParse({
      version: '2024.1',
      coefficients: twelve(0.1),
      intercept: -1.8,
    });
    expect(result.success).toBe(true);
  });

  it('should reject a missing intercept', () => {
    const result = ModelArtifactSchema.safeParse({ coefficients: twelve(0.1) });
    expect(result.success).toBe(false);
  });
});

describe('RiskAssessmentSchema', () => {
  it('should reject a probability above 100', () => {
    const result = RiskAssessmentSchema.safeParse({
      probabilityPercent: 100.5,
      tier: 'HIGH',
      recommendations: ['a', 'b', 'c'],
    });
    expect(result.success).toBe(false);
  });
});
