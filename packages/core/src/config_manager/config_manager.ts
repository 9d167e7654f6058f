/**
 * ConfigManager - Run Configuration Resolver
 *
 * Builds the RunConfig for one invocation from, lowest priority first:
 * built-in defaults, the project configuration file, command line options,
 * and the environment. Every value is checked here so the rest of the
 * pipeline can take RunConfig as given.
 *
 * Uses ConfigStore abstraction for backend-agnostic lookup of the file.
 */

import * as path from 'path';
import { existsSync } from 'fs';
import Ajv from 'ajv';
import type { ValidateFunction } from 'ajv';
import type { ConfigStore, ProjectConfigSource } from '../config_store/config_store';
import { CONSOLE_FORMATS, shouldUseColor } from '../console_sink';
import type { ConsoleFormat } from '../console_sink';
import { FILE_FORMATS, formatFromPath } from '../file_writer';
import type { FileFormat, WriterMode } from '../file_writer';
import type { Logger } from '../logger';
import { REPORT_VERBOSITIES } from '../report';
import type { ReportVerbosity } from '../report';
import { CATEGORY_FILTERS } from '../test_tags';
import type { CategoryFilter } from '../test_tags';
import { detectRepositoryRoot, timestampedLogFileName } from '../utils';
import { ConfigurationFault } from './errors';
import type {
  ConfigManagerDependencies,
  IConfigManager,
  LogFileConfig,
  ProjectConfig,
  ProjectLogFileConfig,
  ResolveContext,
  RunCliOptions,
  RunConfig,
  RunMode,
} from './config_manager.types';
import projectConfigSchema from './sieve_config_schema.json';

export const DEFAULT_PATTERN = '*.test.{js,cjs}';
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5000;

const WRITER_MODES: readonly WriterMode[] = ['append', 'overwrite'];

let projectConfigValidator: ValidateFunction<ProjectConfig> | null = null;

function getProjectConfigValidator(): ValidateFunction<ProjectConfig> {
  if (!projectConfigValidator) {
    const ajv = new Ajv({ allErrors: true });
    projectConfigValidator = ajv.compile<ProjectConfig>(projectConfigSchema);
  }
  return projectConfigValidator;
}

function oneOf<T extends string>(allowed: readonly T[], value: string, label: string): T {
  const match = allowed.find(candidate => candidate === value);
  if (match === undefined) {
    throw new ConfigurationFault(`Unknown ${label} "${value}"; expected one of ${allowed.join(', ')}`);
  }
  return match;
}

function toVerbosity(value: number, label: string): ReportVerbosity {
  const match = REPORT_VERBOSITIES.find(level => level === value);
  if (match === undefined) {
    throw new ConfigurationFault(`${label} must be 1, 2 or 3 (got ${value})`);
  }
  return match;
}

/**
 * Root that discovery searches: the given path, or the repository the
 * working directory belongs to, or the working directory itself.
 */
export function resolveRootPath(pathArgument: string | undefined, cwd: string = process.cwd()): string {
  if (pathArgument !== undefined) {
    const resolved = path.resolve(cwd, pathArgument);
    if (!existsSync(resolved)) {
      throw new ConfigurationFault(`Path does not exist: ${resolved}`);
    }
    return resolved;
  }
  return detectRepositoryRoot(cwd) ?? path.resolve(cwd);
}

/**
 * Configuration Manager Class
 *
 * @example
 * ```typescript
 * // Production usage
 * import { createConfigManager } from '@sieve/core/fs';
 * const configManager = createConfigManager('/path/to/project');
 * const config = await configManager.resolve(cliOptions, { env: process.env, isTTY: process.stdout.isTTY });
 *
 * // Test usage
 * import { MemoryConfigStore } from '@sieve/core/memory';
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ excludeSlow: true });
 * const configManager = new ConfigManager({ configStore, rootPath: '/repo' });
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;
  private readonly rootPath: string;
  private readonly cwd: string;
  private readonly now: () => Date;
  private readonly logger: Logger | undefined;

  constructor(deps: ConfigManagerDependencies) {
    if (!deps.configStore) {
      throw new Error("ConfigStore is required for ConfigManager");
    }
    this.configStore = deps.configStore;
    this.rootPath = deps.rootPath;
    this.cwd = deps.cwd ?? process.cwd();
    this.now = deps.now ?? (() => new Date());
    this.logger = deps.logger;
  }

  /**
   * Load and schema-check the project configuration file; {} when there is none
   */
  async loadProjectConfig(): Promise<ProjectConfig> {
    const source = await this.configStore.loadConfig();
    if (!source) {
      return {};
    }
    this.logger?.debug(`Using configuration from ${source.path}`);
    return this.validateProjectConfig(source);
  }

  /**
   * Merge defaults, project file, command line and environment into a RunConfig
   *
   * @throws ConfigurationFault when any value or combination is invalid
   */
  async resolve(cliOptions: RunCliOptions, context: ResolveContext = {}): Promise<RunConfig> {
    const project = await this.loadProjectConfig();
    const verbose = cliOptions.verbose ?? 0;

    if (cliOptions.quiet && verbose > 0) {
      throw new ConfigurationFault('--quiet cannot be combined with --verbose');
    }
    if (cliOptions.logAppend && cliOptions.logOverwrite) {
      throw new ConfigurationFault('--log-append cannot be combined with --log-overwrite');
    }

    const format: ConsoleFormat = oneOf(
      CONSOLE_FORMATS,
      cliOptions.format ?? project.format ?? (verbose > 0 ? 'verbose' : 'standard'),
      'format'
    );

    const consoleVerbosity = verbose > 0
      ? toVerbosity(Math.min(3, 1 + verbose), 'Verbosity')
      : toVerbosity(project.verbosity ?? 1, 'Verbosity');

    const noColor = cliOptions.color === false || project.color === false;

    const shutdownTimeoutMs = cliOptions.shutdownTimeout ?? project.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;
    if (!Number.isFinite(shutdownTimeoutMs) || shutdownTimeoutMs <= 0) {
      throw new ConfigurationFault(`Shutdown timeout must be a positive number of milliseconds (got ${shutdownTimeoutMs})`);
    }

    const logFiles = (project.logFiles ?? []).map(entry => this.projectLogFile(entry));
    const cliLogFile = this.cliLogFile(cliOptions);
    if (cliLogFile) {
      logFiles.push(cliLogFile);
    }

    return {
      rootPath: this.rootPath,
      pattern: cliOptions.pattern ?? project.pattern ?? DEFAULT_PATTERN,
      mode: this.mode(cliOptions),
      filter: {
        categories: this.categories(cliOptions.category ?? project.categories ?? []),
        excludeSlow: cliOptions.excludeSlow ?? project.excludeSlow ?? false,
        excludeCi: cliOptions.excludeCi ?? project.excludeCi ?? false,
      },
      console: {
        format,
        color: shouldUseColor({ noColor, env: context.env ?? process.env, isTTY: context.isTTY }),
        quiet: cliOptions.quiet ?? false,
        verbosity: consoleVerbosity,
      },
      logFiles,
      shutdownTimeoutMs,
    };
  }

  private validateProjectConfig(source: ProjectConfigSource): ProjectConfig {
    const validate = getProjectConfigValidator();
    if (validate(source.data)) {
      return source.data;
    }
    const details = (validate.errors ?? [])
      .map(error => `${error.instancePath || 'root'} ${error.message ?? 'is invalid'}`)
      .join('; ');
    throw new ConfigurationFault(`Invalid configuration in ${source.path}: ${details}`);
  }

  private mode(cliOptions: RunCliOptions): RunMode {
    if (cliOptions.listCategories) return 'list-categories';
    if (cliOptions.discoverOnly) return 'discover';
    return 'run';
  }

  private categories(values: string[]): CategoryFilter[] {
    if (values.length === 0) {
      return ['all'];
    }
    return values.map(value => oneOf(CATEGORY_FILTERS, value, 'category'));
  }

  private projectLogFile(entry: ProjectLogFileConfig): LogFileConfig {
    const format: FileFormat = entry.format === undefined
      ? formatFromPath(entry.path)
      : oneOf(FILE_FORMATS, entry.format, 'log file format');
    return {
      path: path.resolve(this.rootPath, entry.path),
      format,
      verbosity: toVerbosity(entry.verbosity ?? 1, 'Log verbosity'),
      mode: entry.mode === undefined ? 'overwrite' : oneOf(WRITER_MODES, entry.mode, 'log file mode'),
    };
  }

  private cliLogFile(cliOptions: RunCliOptions): LogFileConfig | null {
    const requested = cliOptions.logFile;
    if (requested === undefined || requested === false) {
      return null;
    }
    const explicitPath = typeof requested === 'string' ? requested : undefined;
    const format: FileFormat = cliOptions.logFileFormat !== undefined
      ? oneOf(FILE_FORMATS, cliOptions.logFileFormat, 'log file format')
      : explicitPath !== undefined ? formatFromPath(explicitPath) : 'txt';

    return {
      path: path.resolve(this.cwd, explicitPath ?? timestampedLogFileName(format, this.now())),
      format,
      verbosity: toVerbosity(cliOptions.logVerbosity ?? 1, 'Log verbosity'),
      mode: cliOptions.logAppend ? 'append' : 'overwrite',
    };
  }
}
