export { DiscoveryEngine, TEST_DIRECTORY_NAMES, LOAD_ERROR_UNIT_NAME } from './discovery_engine';
export { directoryCategory, resolveCategory } from './category_resolver';
export { DiscoveryLoadError } from './errors';
export type {
  DiscoveryEngineDependencies,
  DiscoveryOptions,
  DiscoveryResult,
  DiscoveryStructure,
  FilterCriteria,
} from './discovery.types';
