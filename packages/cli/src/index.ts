#!/usr/bin/env node

import { Command } from 'commander';
import { RunCommand } from './commands/run/run-command';
import { DiscoverCommand } from './commands/discover/discover-command';

const program = new Command();

program
  .name('sieve')
  .description('Categorized test discovery and reporting')
  .version('0.1.0');

new RunCommand().register(program);
new DiscoverCommand().register(program);

program.parseAsync().catch((error: unknown) => {
  console.error("Fatal error:", error);
  process.exit(3);
});
