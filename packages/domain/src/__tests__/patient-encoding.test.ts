import { describe, it, expect } from 'vitest';
import type { PatientIntake } from '@cardiorisk/types';
import { encodeFlag, intakeToPatientRecord } from '../cardio-risk/patient-encoding.js';
import { createPatientRecord } from './cardio-risk-fixtures.js';

const createIntake = (overrides: Partial<PatientIntake> = {}): PatientIntake => ({
  age: 50,
  sex: 'MALE',
  smokingStatus: 'NON_SMOKER',
  cigarettesPerDay: 0,
  totalCholesterol: 200,
  systolicBP: 120,
  diastolicBP: 80,
  heightCm: 170,
  weightKg: 70,
  restingHeartRate: 70,
  fastingGlucose: 90,
  diabetes: 'NO',
  hypertension: 'NO',
  ...overrides,
});

describe('encodeFlag', () => {
  it('should encode true as 1 and false as 0', () => {
    expect(encodeFlag(true)).toBe(1);
    expect(encodeFlag(false)).toBe(0);
  });
});

describe('intakeToPatientRecord', () => {
  it('should map the reference intake to the reference record', () => {
    expect(intakeToPatientRecord(createIntake())).toEqual(createPatientRecord());
  });

  it('should map every positive answer', () => {
    const record = intakeToPatientRecord(
      createIntake({
        sex: 'FEMALE',
        smokingStatus: 'SMOKER',
        cigarettesPerDay: 20,
        diabetes: 'YES',
        hypertension: 'YES',
      })
    );

    expect(record).toMatchObject({
      isMale: false,
      isCurrentSmoker: true,
      cigarettesPerDay: 20,
      hasDiabetes: true,
      hasHypertension: true,
    });
  });

  it('should not carry the categorical keys over', () => {
    const record = intakeToPatientRecord(createIntake());
    expect(Object.keys(record)).not.toContain('sex');
    expect(Object.keys(record)).not.toContain('smokingStatus');
  });

  it('should return a frozen record', () => {
    expect(Object.isFrozen(intakeToPatientRecord(createIntake()))).toBe(true);
  });
});
