export { ConfigManager, resolveRootPath, DEFAULT_PATTERN, DEFAULT_SHUTDOWN_TIMEOUT_MS } from './config_manager';
export { ConfigurationFault } from './errors';
export type {
  ConfigManagerDependencies,
  ConsoleConfig,
  IConfigManager,
  LogFileConfig,
  ProjectConfig,
  ProjectLogFileConfig,
  ResolveContext,
  RunCliOptions,
  RunConfig,
  RunMode,
} from './config_manager.types';
