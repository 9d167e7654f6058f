/**
 * Command option interfaces for the sieve CLI, as Commander.js hands them
 * to the action handlers.
 */

import type { BaseCommandOptions } from '../interfaces/command';

/**
 * Options shared by every command that discovers tests
 */
export interface SelectionCommandOptions extends BaseCommandOptions {
  category?: string[];
  excludeSlow?: boolean;
  excludeCi?: boolean;
  pattern?: string;
  format?: string;
  /** false under --no-color */
  color?: boolean;
  logFile?: string | boolean;
  logFileFormat?: string;
  logVerbosity?: number;
  logAppend?: boolean;
  logOverwrite?: boolean;
}

export interface RunCommandOptions extends SelectionCommandOptions {
  discoverOnly?: boolean;
  listCategories?: boolean;
  shutdownTimeout?: number;
}

export interface DiscoverCommandOptions extends SelectionCommandOptions { }
