import { Command } from 'commander';
import type { Config } from '@sieve/core';
import { BaseCommand } from '../../base/base-command';
import type { RunCommandOptions } from '../../types';

/**
 * Run Command - discover, filter and run tests
 *
 * The default command: `sieve [path]` is `sieve run [path]`.
 */
export class RunCommand extends BaseCommand<RunCommandOptions> {
  protected description = 'Discover, filter and run tests, reporting to the console and log files';

  register(program: Command): void {
    const runCmd = program
      .command('run [path]', { isDefault: true })
      .description(this.description);

    this.addSelectionOptions(runCmd)
      .option('--discover-only', 'Only discover and print the discovery summary')
      .option('--list-categories', 'Print the number of tests per category and exit')
      .option('--shutdown-timeout <ms>', 'Longest wait for log files to flush on exit', Number)
      .action(async (pathArgument: string | undefined, options: RunCommandOptions) => {
        await this.execute(pathArgument, options);
      });
  }

  protected toCliOptions(options: RunCommandOptions): Config.RunCliOptions {
    return { ...options };
  }
}
