import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import type { PatientRecord, RiskTier, ScalerParameters, ScoringModel } from '@cardiorisk/types';
import { buildFeatureVector } from '../cardio-risk/feature-builder.js';
import {
  classifyRiskTier,
  destandardize,
  scoreRisk,
  standardize,
} from '../cardio-risk/risk-scorer.js';
import { testModel, testScaler } from './cardio-risk-fixtures.js';

/**
 * Property-Based Tests for the Risk Scorer
 *
 * Key properties tested:
 * 1. Probability bounds: always a finite value in [0, 100]
 * 2. Tier monotonicity: a higher probability never lowers the tier
 * 3. Standardization round-trip within floating-point tolerance
 * 4. Determinism: same input, same probability
 */

const TIER_RANK: Readonly<Record<RiskTier, number>> = { LOW: 0, MODERATE: 1, HIGH: 2 };

/**
 * Custom arbitraries for generating realistic test data
 */

const patientRecordArbitrary: fc.Arbitrary<PatientRecord> = fc.record({
  age: fc.integer({ min: 1, max: 120 }),
  isMale: fc.boolean(),
  isCurrentSmoker: fc.boolean(),
  cigarettesPerDay: fc.integer({ min: 0, max: 100 }),
  totalCholesterol: fc.integer({ min: 100, max: 400 }),
  systolicBP: fc.integer({ min: 80, max: 250 }),
  diastolicBP: fc.integer({ min: 60, max: 200 }),
  heightCm: fc.integer({ min: 100, max: 250 }),
  weightKg: fc.integer({ min: 30, max: 300 }),
  restingHeartRate: fc.integer({ min: 40, max: 200 }),
  fastingGlucose: fc.integer({ min: 50, max: 400 }),
  hasDiabetes: fc.boolean(),
  hasHypertension: fc.boolean(),
});

const twelveOf = (arbitrary: fc.Arbitrary<number>): fc.Arbitrary<number[]> =>
  fc.array(arbitrary, { minLength: 12, maxLength: 12 });

const magnitudeArbitrary = fc.double({ min: 0.01, max: 100, noNaN: true });

const scaleArbitrary = fc
  .tuple(magnitudeArbitrary, fc.boolean())
  .map(([magnitude, negative]) => (negative ? -magnitude : magnitude));

const scalerArbitrary: fc.Arbitrary<ScalerParameters> = fc.record({
  mean: twelveOf(fc.double({ min: -1000, max: 1000, noNaN: true })),
  scale: twelveOf(scaleArbitrary),
});

const modelArbitrary: fc.Arbitrary<ScoringModel> = fc.record({
  coefficients: twelveOf(fc.double({ min: -5, max: 5, noNaN: true })),
  intercept: fc.double({ min: -10, max: 10, noNaN: true }),
});

const probabilityArbitrary = fc.double({ min: 0, max: 100, noNaN: true });

describe('Risk Scorer Property-Based Tests', () => {
  it('should keep the probability in [0, 100] for any valid record', () => {
    fc.assert(
      fc.property(patientRecordArbitrary, scalerArbitrary, modelArbitrary, (record, scaler, model) => {
        const { probabilityPercent } = scoreRisk(buildFeatureVector(record), scaler, model);

        expect(Number.isFinite(probabilityPercent)).toBe(true);
        expect(probabilityPercent).toBeGreaterThanOrEqual(0);
        expect(probabilityPercent).toBeLessThanOrEqual(100);
      })
    );
  });

  it('should assign the tier from the probability alone', () => {
    fc.assert(
      fc.property(patientRecordArbitrary, (record) => {
        const assessment = scoreRisk(buildFeatureVector(record), testScaler, testModel);
        expect(assessment.tier).toBe(classifyRiskTier(assessment.probabilityPercent));
      })
    );
  });

  it('should never lower the tier as the probability rises', () => {
    fc.assert(
      fc.property(probabilityArbitrary, probabilityArbitrary, (a, b) => {
        const [low, high] = a <= b ? [a, b] : [b, a];
        expect(TIER_RANK[classifyRiskTier(low)]).toBeLessThanOrEqual(
          TIER_RANK[classifyRiskTier(high)]
        );
      })
    );
  });

  it('should round-trip standardization within tolerance', () => {
    fc.assert(
      fc.property(
        twelveOf(fc.double({ min: -10000, max: 10000, noNaN: true })),
        scalerArbitrary,
        (vector, scaler) => {
          const roundTrip = destandardize(standardize(vector, scaler), scaler);

          roundTrip.forEach((value, i) => {
            const tolerance = 1e-9 * Math.max(1, Math.abs(vector[i]), Math.abs(scaler.mean[i]));
            expect(Math.abs(value - vector[i])).toBeLessThanOrEqual(tolerance);
          });
        }
      )
    );
  });

  it('should be deterministic for identical inputs', () => {
    fc.assert(
      fc.property(patientRecordArbitrary, (record) => {
        const first = scoreRisk(buildFeatureVector(record), testScaler, testModel);
        const second = scoreRisk(buildFeatureVector({ ...record }), testScaler, testModel);

        expect(Object.is(first.probabilityPercent, second.probabilityPercent)).toBe(true);
        expect(second.tier).toBe(first.tier);
      })
    );
  });
});
