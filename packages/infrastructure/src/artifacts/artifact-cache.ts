/**
 * @fileoverview Process-wide Risk Artifact Cache
 *
 * Loads the fitted artifacts once per process. Concurrent callers at cold
 * start share the in-flight load; a failed load is not cached.
 *
 * @module @cardiorisk/infrastructure/artifacts/artifact-cache
 */

import type { IRiskArtifactRepository, RiskArtifacts } from '@cardiorisk/domain';

let artifactsPromise: Promise<RiskArtifacts> | null = null;

/**
 * Get the cached artifacts, loading them through `repository` on first use
 */
export function getRiskArtifacts(repository: IRiskArtifactRepository): Promise<RiskArtifacts> {
  if (artifactsPromise) {
    return artifactsPromise;
  }

  const pending: Promise<RiskArtifacts> = repository.load().catch((error: unknown) => {
    // Only clear the cache if a reset has not replaced this load
    if (artifactsPromise === pending) {
      artifactsPromise = null;
    }
    throw error;
  });
  artifactsPromise = pending;
  return pending;
}

/**
 * Reset the artifact cache (for testing)
 */
export function resetRiskArtifacts(): void {
  artifactsPromise = null;
}
