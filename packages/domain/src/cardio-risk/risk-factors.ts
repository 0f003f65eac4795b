/**
 * @fileoverview Risk Factor Analysis
 *
 * Rule-based levels for the individual risk factors shown next to the
 * model's probability. Independent of the fitted model.
 *
 * @module domain/cardio-risk/risk-factors
 */

import type { PatientRecord, RiskFactor, RiskFactorLevel } from '@cardiorisk/types';

import { computeBmi } from './feature-builder.js';

/**
 * Level cut points; a value must exceed a cut point to reach its level
 */
export const RISK_FACTOR_THRESHOLDS = Object.freeze({
  age: { high: 65, moderate: 45 },
  totalCholesterol: { high: 240, moderate: 200 },
  systolicBP: { high: 140, moderate: 120 },
  diastolicBP: { high: 90 },
  bmi: { high: 30, moderate: 25 },
} as const);

function graded(value: number, cutPoints: { high: number; moderate: number }): RiskFactorLevel {
  if (value > cutPoints.high) return 'HIGH';
  if (value > cutPoints.moderate) return 'MODERATE';
  return 'LOW';
}

function bloodPressureLevel(systolic: number, diastolic: number): RiskFactorLevel {
  const { systolicBP, diastolicBP } = RISK_FACTOR_THRESHOLDS;
  if (systolic > systolicBP.high || diastolic > diastolicBP.high) return 'HIGH';
  if (systolic > systolicBP.moderate) return 'MODERATE';
  return 'LOW';
}

/**
 * Per-factor levels for age, sex, smoking, cholesterol, blood pressure,
 * BMI and diabetes
 */
export function analyzeRiskFactors(record: PatientRecord): readonly RiskFactor[] {
  const bmi = computeBmi(record.heightCm, record.weightKg);

  const factors: RiskFactor[] = [
    {
      factor: 'AGE',
      value: String(record.age),
      level: graded(record.age, RISK_FACTOR_THRESHOLDS.age),
    },
    {
      factor: 'SEX',
      value: record.isMale ? 'Male' : 'Female',
      level: record.isMale ? 'HIGHER' : 'LOWER',
    },
    {
      factor: 'SMOKING',
      value: record.isCurrentSmoker ? 'Yes' : 'No',
      level: record.isCurrentSmoker ? 'HIGH' : 'LOW',
    },
    {
      factor: 'CHOLESTEROL',
      value: String(record.totalCholesterol),
      level: graded(record.totalCholesterol, RISK_FACTOR_THRESHOLDS.totalCholesterol),
    },
    {
      factor: 'BLOOD_PRESSURE',
      value: `${record.systolicBP}/${record.diastolicBP}`,
      level: bloodPressureLevel(record.systolicBP, record.diastolicBP),
    },
    {
      factor: 'BMI',
      value: bmi.toFixed(1),
      level: graded(bmi, RISK_FACTOR_THRESHOLDS.bmi),
    },
    {
      factor: 'DIABETES',
      value: record.hasDiabetes ? 'Yes' : 'No',
      level: record.hasDiabetes ? 'HIGH' : 'LOW',
    },
  ];

  return Object.freeze(factors);
}
