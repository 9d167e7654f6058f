/**
 * ConfigManager Types
 */

import type { ConfigStore } from '../config_store';
import type { ConsoleFormat } from '../console_sink';
import type { FilterCriteria } from '../discovery';
import type { FileFormat, WriterMode } from '../file_writer';
import type { Logger } from '../logger';
import type { ReportVerbosity } from '../report';

/**
 * One file sink as written in sieve.config.yml
 */
export type ProjectLogFileConfig = {
  path: string;
  format?: string;
  verbosity?: number;
  mode?: string;
};

/**
 * Shape of sieve.config.yml once it passed the JSON schema. Enumerated
 * values are still plain strings here; ConfigManager checks them together
 * with the command line.
 */
export type ProjectConfig = {
  pattern?: string;
  categories?: string[];
  excludeSlow?: boolean;
  excludeCi?: boolean;
  format?: string;
  color?: boolean;
  verbosity?: number;
  shutdownTimeoutMs?: number;
  logFiles?: ProjectLogFileConfig[];
};

/**
 * Command line options as the CLI parsed them. `logFile` is `true` when
 * `--log-file` was given without a path.
 */
export type RunCliOptions = {
  category?: string[];
  excludeSlow?: boolean;
  excludeCi?: boolean;
  pattern?: string;
  format?: string;
  /** false under --no-color */
  color?: boolean;
  discoverOnly?: boolean;
  listCategories?: boolean;
  /** Number of -v flags */
  verbose?: number;
  quiet?: boolean;
  logFile?: string | boolean;
  logFileFormat?: string;
  logVerbosity?: number;
  logAppend?: boolean;
  logOverwrite?: boolean;
  shutdownTimeout?: number;
};

export type RunMode = 'run' | 'discover' | 'list-categories';

export type LogFileConfig = {
  /** Absolute path */
  path: string;
  format: FileFormat;
  verbosity: ReportVerbosity;
  mode: WriterMode;
};

export type ConsoleConfig = {
  format: ConsoleFormat;
  color: boolean;
  quiet: boolean;
  verbosity: ReportVerbosity;
};

/**
 * Everything one run needs, resolved once and passed down by value.
 */
export type RunConfig = {
  rootPath: string;
  pattern: string;
  mode: RunMode;
  filter: FilterCriteria;
  console: ConsoleConfig;
  logFiles: LogFileConfig[];
  shutdownTimeoutMs: number;
};

export type ConfigManagerDependencies = {
  configStore: ConfigStore;
  /** Absolute project root that discovery searches */
  rootPath: string;
  /** Base for relative --log-file paths; defaults to process.cwd() */
  cwd?: string;
  now?: () => Date;
  logger?: Logger;
};

/**
 * Terminal facts that take part in the colour decision
 */
export type ResolveContext = {
  env?: NodeJS.ProcessEnv;
  isTTY?: boolean;
};

export interface IConfigManager {
  resolve(cliOptions: RunCliOptions, context?: ResolveContext): Promise<RunConfig>;
}
