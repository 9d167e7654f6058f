/**
 * Base Command Class for the sieve CLI
 *
 * Provides common functionality and enforces standards across all commands.
 * Follows the Command Pattern and provides dependency injection support.
 */

import { Command } from 'commander';
import { Config } from '@sieve/core';
import type { RunSession } from '@sieve/core';
import { DependencyInjectionService } from '../services/dependency-injection';
import { installInterruptHandlers } from '../services/interrupt-handler';
import type { BaseCommandOptions, ICompleteCommand } from '../interfaces/command';

export const CONFIGURATION_EXIT_CODE = 2;
export const INTERNAL_FAULT_EXIT_CODE = 3;

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICompleteCommand<TOptions> {

  protected readonly container = DependencyInjectionService.getInstance();

  /**
   * Register the command with Commander.js
   * Must be implemented by each command
   */
  abstract register(program: Command): void;

  /**
   * Map command options to the core's RunCliOptions
   */
  protected abstract toCliOptions(options: TOptions): Config.RunCliOptions;

  /**
   * Resolve configuration, run one session and set the process exit code.
   * Any error before or during the session ends the process here.
   */
  async execute(pathArgument: string | undefined, options: TOptions): Promise<void> {
    const controller = new AbortController();
    const removeInterruptHandlers = installInterruptHandlers(controller);
    try {
      const rootPath = this.container.resolveRootPath(pathArgument);
      const config = await this.container
        .getConfigManager(rootPath)
        .resolve(this.toCliOptions(options), { env: process.env, isTTY: process.stdout.isTTY });

      const session = this.container.createRunSession(config);
      const outcome: RunSession.RunSessionOutcome = await session.execute({
        command: this.commandLine(),
        signal: controller.signal,
      });
      process.exitCode = outcome.exitCode;
    } catch (error) {
      this.handleError(error, options);
    } finally {
      removeInterruptHandlers();
    }
  }

  /**
   * Options shared by every command that discovers tests
   */
  protected addSelectionOptions(command: Command): Command {
    return command
      .option('-c, --category <name>', 'Category to select: regression, integration, development, all (repeatable)', collect)
      .option('--exclude-slow', 'Skip units tagged slow')
      .option('--exclude-ci', 'Skip units tagged skip-ci')
      .option('-p, --pattern <glob>', 'Test file name pattern')
      .option('-f, --format <name>', 'Console format: standard, verbose, json, minimal')
      .option('--no-color', 'Disable coloured output')
      .option('-v, --verbose', 'Increase console verbosity (repeatable)', increaseVerbosity, 0)
      .option('-q, --quiet', 'Only print failures and the summary')
      .option('--log-file [path]', 'Also write results to a file; a timestamped name is used without a path')
      .option('--log-file-format <format>', 'Log file format: txt, json (default from the extension)')
      .option('--log-verbosity <level>', 'Log file detail level 1-3', Number)
      .option('--log-append', 'Append to the log file')
      .option('--log-overwrite', 'Overwrite the log file (default)');
  }

  /**
   * Report an error consistently and exit: 2 for a configuration fault,
   * 3 for anything unexpected.
   */
  protected handleError(error: unknown, options: TOptions): void {
    const exitCode = error instanceof Config.ConfigurationFault ? CONFIGURATION_EXIT_CODE : INTERNAL_FAULT_EXIT_CODE;
    const message = error instanceof Error ? error.message : String(error);

    console.error(`Error: ${message}`);
    if ((options.verbose ?? 0) > 1 && error instanceof Error && error.stack) {
      console.error(error.stack);
    }

    process.exit(exitCode);
  }

  private commandLine(): string {
    return ['sieve', ...process.argv.slice(2)].join(' ');
  }
}
