/**
 * Standard Command Interface for the sieve CLI
 *
 * All commands implement this interface to keep registration and execution
 * uniform and to make them testable without a real process.
 */

import { Command } from 'commander';

/**
 * Base options that all commands support
 */
export interface BaseCommandOptions {
  /** Number of -v flags */
  verbose?: number;
  quiet?: boolean;
}

/**
 * Command registration interface for Commander.js integration
 */
export interface ICommand {
  /**
   * Register the command with Commander.js program
   * @param program - The Commander.js program instance
   */
  register(program: Command): void;
}

/**
 * Executable command interface
 */
export interface IExecutableCommand<TOptions extends BaseCommandOptions = BaseCommandOptions> {
  /**
   * Execute the command for an optional path argument
   */
  execute(pathArgument: string | undefined, options: TOptions): Promise<void>;
}

export interface ICompleteCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  extends ICommand, IExecutableCommand<TOptions> { }
