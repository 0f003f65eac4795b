/**
 * @fileoverview Feature Builder
 *
 * Assembles the fixed-order feature vector the fitted scaler and model
 * were trained on. No range enforcement happens here; only values that
 * make a derived feature undefined are rejected.
 *
 * @module domain/cardio-risk/feature-builder
 */

import { ValidationError } from '@cardiorisk/core';
import {
  FEATURE_COUNT,
  PatientRecordSchema,
  type FeatureVector,
  type PatientRecord,
} from '@cardiorisk/types';

import { encodeFlag } from './patient-encoding.js';

/**
 * Body Mass Index, weight (kg) / height (m)²
 */
export function computeBmi(heightCm: number, weightKg: number): number {
  if (!Number.isFinite(heightCm) || heightCm <= 0) {
    throw new ValidationError('Height must be a positive number to compute BMI', {
      field: 'heightCm',
    });
  }
  if (!Number.isFinite(weightKg) || weightKg <= 0) {
    throw new ValidationError('Weight must be a positive number to compute BMI', {
      field: 'weightKg',
    });
  }

  const heightM = heightCm / 100;
  return weightKg / (heightM * heightM);
}

/**
 * Build the feature vector in `FEATURE_NAMES` order:
 * age, male, currentSmoker, cigsPerDay, totChol, sysBP, diaBP, BMI,
 * heartRate, glucose, diabetes, prevalentHyp
 */
export function buildFeatureVector(record: PatientRecord): FeatureVector {
  const bmi = computeBmi(record.heightCm, record.weightKg);

  const vector = [
    record.age,
    encodeFlag(record.isMale),
    encodeFlag(record.isCurrentSmoker),
    record.cigarettesPerDay,
    record.totalCholesterol,
    record.systolicBP,
    record.diastolicBP,
    bmi,
    record.restingHeartRate,
    record.fastingGlucose,
    encodeFlag(record.hasDiabetes),
    encodeFlag(record.hasHypertension),
  ];

  return Object.freeze(vector);
}

/**
 * Check that a vector has the schema length and only finite entries
 */
export function assertFeatureVector(vector: FeatureVector): void {
  if (vector.length !== FEATURE_COUNT) {
    throw new ValidationError(
      `Feature vector must have ${FEATURE_COUNT} values, got ${vector.length}`,
      { expected: FEATURE_COUNT, received: vector.length }
    );
  }

  const badIndex = vector.findIndex((value) => !Number.isFinite(value));
  if (badIndex !== -1) {
    throw new ValidationError(`Feature ${badIndex} is not a finite number`, {
      featureIndex: badIndex,
    });
  }
}

/**
 * Validate raw input against the intake form ranges.
 * Optional for callers; the scoring pipeline accepts out-of-range values.
 */
export function validatePatientRecord(input: unknown): PatientRecord {
  const result = PatientRecordSchema.safeParse(input);

  if (!result.success) {
    throw new ValidationError('Invalid patient record', result.error.flatten().fieldErrors);
  }

  return Object.freeze(result.data);
}
