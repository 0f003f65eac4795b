/**
 * @fileoverview Infrastructure Layer Package
 *
 * Adapters connecting the risk-scoring domain to the filesystem.
 *
 * @module @cardiorisk/infrastructure
 */

export * from './artifacts/index.js';
