import { Config, Logger, RunSession, TestFramework } from '@sieve/core';
import { createConfigManager, FsFileLister, FsTestFramework, resolveRootPath } from '@sieve/core/fs';

/**
 * Dependency Injection Service for the sieve CLI
 *
 * Creates the filesystem-backed core components a command needs. Commands
 * ask this service instead of constructing them, so tests can substitute
 * in-memory implementations.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private framework: TestFramework.ITestFramework | null = null;
  private readonly logger: Logger.ConsoleLogger = Logger.createLogger('[sieve] ');

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Drop the singleton (for tests)
   */
  static resetInstance(): void {
    DependencyInjectionService.instance = null;
  }

  /**
   * Root that discovery searches for the given path argument
   */
  resolveRootPath(pathArgument: string | undefined): string {
    return resolveRootPath(pathArgument, process.cwd());
  }

  getConfigManager(rootPath: string): Config.IConfigManager {
    return createConfigManager(rootPath, { cwd: process.cwd(), logger: this.logger });
  }

  getTestFramework(): TestFramework.ITestFramework {
    if (!this.framework) {
      this.framework = new FsTestFramework();
    }
    return this.framework;
  }

  /**
   * A session writing to process.stdout for one resolved configuration
   */
  createRunSession(config: Config.RunConfig): RunSession.RunSession {
    return new RunSession.RunSession({
      config,
      framework: this.getTestFramework(),
      fileLister: new FsFileLister({ cwd: config.rootPath }),
      stdout: process.stdout,
      logger: this.logger,
    });
  }
}
