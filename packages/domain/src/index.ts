/**
 * @fileoverview Domain Package Exports
 *
 * @module @cardiorisk/domain
 *
 * @example
 * ```typescript
 * import { buildFeatureVector, scoreRisk } from '@cardiorisk/domain';
 *
 * const features = buildFeatureVector(record);
 * const { probabilityPercent, tier } = scoreRisk(features, scaler, model);
 * ```
 */

export * from './cardio-risk/index.js';
