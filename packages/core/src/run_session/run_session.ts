/**
 * RunSession - one sieve invocation end to end
 *
 * Discovers, filters, and then either reports what was found or runs the
 * selection with a console sink and one file sink per configured log file.
 * The hub is always closed, within the configured timeout, before the
 * outcome is returned.
 *
 * @module run_session
 */

import type { RunConfig } from '../config_manager';
import { ConsoleSink } from '../console_sink';
import type { OutputStream } from '../console_sink';
import { DiscoveryEngine } from '../discovery';
import { toError } from '../errors';
import { EventHub } from '../event_bus';
import { ExecutionEngine, exitCodeFor } from '../execution';
import type { RunSummary } from '../execution';
import type { FileLister } from '../file_lister';
import { createFileFormatter, FileSink, WriterIOFault } from '../file_writer';
import type { OpenFile } from '../file_writer';
import { logger as defaultLogger } from '../logger';
import type { Logger } from '../logger';
import { discoveryDocument, discoveryTextLines, plural } from '../report';
import type { DiscoveryReportInput } from '../report';
import type { ITestFramework } from '../test_framework';
import type { TestUnit } from '../test_registry';
import { TEST_CATEGORIES } from '../test_tags';
import { open } from 'fs/promises';
import type { RunSessionDependencies, RunSessionOptions, RunSessionOutcome } from './run_session.types';

const defaultOpenFile: OpenFile = (filePath, flags) => open(filePath, flags);

export class RunSession {
  private readonly config: RunConfig;
  private readonly framework: ITestFramework;
  private readonly fileLister: FileLister;
  private readonly stdout: OutputStream;
  private readonly logger: Logger;
  private readonly openFile: OpenFile | undefined;
  private readonly clock: () => Date;

  constructor(dependencies: RunSessionDependencies) {
    if (!dependencies.framework) {
      throw new Error("ITestFramework is required for RunSession");
    }
    if (!dependencies.fileLister) {
      throw new Error("FileLister is required for RunSession");
    }

    this.config = dependencies.config;
    this.framework = dependencies.framework;
    this.fileLister = dependencies.fileLister;
    this.stdout = dependencies.stdout;
    this.logger = dependencies.logger ?? defaultLogger;
    this.openFile = dependencies.openFile;
    this.clock = dependencies.clock ?? (() => new Date());
  }

  async execute(options: RunSessionOptions): Promise<RunSessionOutcome> {
    const discovery = new DiscoveryEngine({
      rootPath: this.config.rootPath,
      framework: this.framework,
      fileLister: this.fileLister,
      logger: this.logger,
    });

    if (this.config.console.verbosity >= 2 && this.config.console.format !== 'json') {
      this.writeLines([`Info: Discovering tests in: ${this.config.rootPath}`]);
    }
    const discovered = await discovery.discover({ pattern: this.config.pattern });

    if (this.config.mode === 'list-categories') {
      const counts = discovery.countByCategory(discovered.registry.units);
      this.writeLines([
        'Available test categories:',
        ...TEST_CATEGORIES.map(category => `  ${category}: ${plural(counts[category], 'test')}`),
      ]);
      return { exitCode: 0, summary: null, shutdown: [] };
    }

    const selected = discovery.filter(discovered.registry.units, this.config.filter);

    if (this.config.mode === 'discover') {
      await this.reportDiscovery({
        units: selected,
        loadErrors: discovered.loadErrors,
        structure: discovered.structure,
      });
      return { exitCode: 0, summary: null, shutdown: [] };
    }

    if (selected.length === 0) {
      this.writeLines(['Warning: No tests found matching the specified criteria']);
      return { exitCode: 0, summary: null, shutdown: [] };
    }

    return this.runSelected(selected, options);
  }

  private async runSelected(
    units: readonly TestUnit[],
    options: RunSessionOptions
  ): Promise<RunSessionOutcome> {
    const hub = new EventHub({ logger: this.logger });
    hub.register(new ConsoleSink({
      format: this.config.console.format,
      stream: this.stdout,
      color: this.config.console.color,
      quiet: this.config.console.quiet,
      verbosity: this.config.console.verbosity,
    }));
    for (const logFile of this.config.logFiles) {
      hub.register(new FileSink({
        filePath: logFile.path,
        mode: logFile.mode,
        formatter: createFileFormatter(logFile.format, logFile.verbosity),
        logger: this.logger,
        ...(this.openFile && { openFile: this.openFile }),
      }));
    }

    const engine = new ExecutionEngine({
      framework: this.framework,
      hub,
      logger: this.logger,
    });

    let summary: RunSummary;
    try {
      summary = await engine.run(units, {
        command: options.command,
        ...(options.signal && { signal: options.signal }),
      });
    } catch (error) {
      // Sinks are closed even when the engine itself fails
      await hub.close(this.config.shutdownTimeoutMs);
      throw error;
    }
    const shutdown = await hub.close(this.config.shutdownTimeoutMs);

    for (const report of shutdown) {
      if (!report.completed) {
        this.logger.warn(`Sink "${report.sink}" did not finish: ${report.abandoned} record(s) abandoned`);
      }
    }

    return { exitCode: exitCodeFor(summary), summary, shutdown };
  }

  private async reportDiscovery(input: DiscoveryReportInput): Promise<void> {
    const verbosity = this.config.console.verbosity;
    if (this.config.console.format === 'json') {
      this.stdout.write(`${JSON.stringify(discoveryDocument(input, verbosity, this.clock()), null, 2)}\n`);
    } else {
      this.writeLines(discoveryTextLines(input, verbosity));
    }

    for (const logFile of this.config.logFiles) {
      const content = logFile.format === 'json'
        ? `${JSON.stringify(discoveryDocument(input, logFile.verbosity, this.clock()), null, 2)}\n`
        : `${discoveryTextLines(input, logFile.verbosity).join('\n')}\n`;
      await this.writeReportFile(logFile.path, logFile.mode === 'append' ? 'a' : 'w', content);
    }
  }

  private async writeReportFile(filePath: string, flags: 'a' | 'w', content: string): Promise<void> {
    const openFile = this.openFile ?? defaultOpenFile;
    try {
      const handle = await openFile(filePath, flags);
      try {
        await handle.appendFile(content);
      } finally {
        await handle.close();
      }
    } catch (error) {
      // Same policy as the background writer: report, keep the exit code
      const fault = new WriterIOFault(filePath, toError(error));
      this.logger.error(fault.message);
    }
  }

  private writeLines(lines: string[]): void {
    this.stdout.write(`${lines.join('\n')}\n`);
  }
}
