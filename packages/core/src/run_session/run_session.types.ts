import type { RunConfig } from '../config_manager';
import type { OutputStream } from '../console_sink';
import type { SinkShutdownReport } from '../event_bus';
import type { RunSummary } from '../execution';
import type { FileLister } from '../file_lister';
import type { OpenFile } from '../file_writer';
import type { Logger } from '../logger';
import type { ITestFramework } from '../test_framework';

export type RunSessionDependencies = {
  config: RunConfig;
  framework: ITestFramework;
  /** Directory probing rooted at config.rootPath */
  fileLister: FileLister;
  /** Where console output goes, normally process.stdout */
  stdout: OutputStream;
  logger?: Logger;
  /** Passed to every file sink; defaults to fs/promises open */
  openFile?: OpenFile;
  clock?: () => Date;
};

export type RunSessionOptions = {
  /** Command line echoed in run.started */
  command: string;
  /** Aborted by the first SIGINT/SIGTERM */
  signal?: AbortSignal;
};

export type RunSessionOutcome = {
  exitCode: number;
  /** Null when no unit was executed (discover modes, nothing selected) */
  summary: RunSummary | null;
  /** One report per sink, in registration order */
  shutdown: SinkShutdownReport[];
};
