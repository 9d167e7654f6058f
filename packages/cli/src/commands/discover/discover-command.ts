import { Command } from 'commander';
import type { Config } from '@sieve/core';
import { BaseCommand } from '../../base/base-command';
import type { DiscoverCommandOptions } from '../../types';

/**
 * Discover Command - `sieve discover [path]`, same as `sieve --discover-only`
 */
export class DiscoverCommand extends BaseCommand<DiscoverCommandOptions> {
  protected description = 'Discover and categorize tests without running them';

  register(program: Command): void {
    const discoverCmd = program
      .command('discover [path]')
      .description(this.description);

    this.addSelectionOptions(discoverCmd)
      .action(async (pathArgument: string | undefined, options: DiscoverCommandOptions) => {
        await this.execute(pathArgument, options);
      });
  }

  protected toCliOptions(options: DiscoverCommandOptions): Config.RunCliOptions {
    return { ...options, discoverOnly: true };
  }
}
