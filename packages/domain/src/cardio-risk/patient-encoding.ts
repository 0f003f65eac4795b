/**
 * @fileoverview Categorical Patient Encoding
 *
 * Total mappings from questionnaire answers to the boolean record fields,
 * and from boolean fields to the 0/1 model encoding.
 *
 * @module domain/cardio-risk/patient-encoding
 */

import type {
  PatientIntake,
  PatientRecord,
  Sex,
  SmokingStatus,
  YesNo,
} from '@cardiorisk/types';

export type BinaryFeature = 0 | 1;

const SEX_IS_MALE: Readonly<Record<Sex, boolean>> = Object.freeze({
  MALE: true,
  FEMALE: false,
});

const SMOKING_IS_CURRENT: Readonly<Record<SmokingStatus, boolean>> = Object.freeze({
  SMOKER: true,
  NON_SMOKER: false,
});

const YES_NO_VALUE: Readonly<Record<YesNo, boolean>> = Object.freeze({
  YES: true,
  NO: false,
});

export function encodeFlag(flag: boolean): BinaryFeature {
  return flag ? 1 : 0;
}

/**
 * Convert categorical intake answers into a PatientRecord.
 * Numeric fields pass through unchanged.
 */
export function intakeToPatientRecord(intake: PatientIntake): PatientRecord {
  const { sex, smokingStatus, diabetes, hypertension, ...numeric } = intake;

  return Object.freeze({
    ...numeric,
    isMale: SEX_IS_MALE[sex],
    isCurrentSmoker: SMOKING_IS_CURRENT[smokingStatus],
    hasDiabetes: YES_NO_VALUE[diabetes],
    hasHypertension: YES_NO_VALUE[hypertension],
  });
}
