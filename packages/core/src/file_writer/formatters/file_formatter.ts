import type { ExecutionEvent } from '../../event_bus';
import type { ReportVerbosity } from '../../report';

export type FileFormat = 'txt' | 'json';

export const FILE_FORMATS: readonly FileFormat[] = ['txt', 'json'];

/**
 * Turns events into file content. Stateful: one instance per writer, fed
 * every event in order by the writer's worker.
 */
export interface FileFormatter {
  readonly format: FileFormat;
  readonly verbosity: ReportVerbosity;
  /** Text to append for this event, possibly empty */
  write(event: ExecutionEvent): string;
}

/**
 * Format implied by a file name: ".json" is json, anything else txt.
 */
export function formatFromPath(filePath: string): FileFormat {
  return filePath.toLowerCase().endsWith('.json') ? 'json' : 'txt';
}
