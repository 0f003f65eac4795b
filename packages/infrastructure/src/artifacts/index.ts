export {
  FileRiskArtifactRepository,
  createFileRiskArtifactRepository,
  type FileRiskArtifactRepositoryDeps,
} from './FileRiskArtifactRepository.js';

export { getRiskArtifacts, resetRiskArtifacts } from './artifact-cache.js';

export { bootstrapCardioRiskService, type BootstrapOptions } from './bootstrap.js';
