export { detectRepositoryRoot, resetDiscoveryCache, REPOSITORY_INDICATORS } from './project_discovery';
export { timestampedLogFileName } from './log_file_naming';
