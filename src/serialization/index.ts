export type { FileFormat, LoadOptions } from './loader.js';
export {
  loadClassifierConfigFromFile,
  loadClassifierConfigFromObject,
  loadRegistryFromFile,
  loadRegistryFromText,
  saveRegistryToFile,
} from './loader.js';
export {
  aucStateSchema,
  averageStateSchema,
  classifierConfigSchema,
  confusionMatrixStateSchema,
  metricStateSchema,
  registryStateSchema,
  weightedF1StateSchema,
} from './schema.js';
export type { RegistryState } from './state.js';
export {
  deserializeMetric,
  deserializeRegistry,
  REGISTRY_SCHEMA_ID,
  serializeMetric,
  serializeRegistry,
} from './state.js';
