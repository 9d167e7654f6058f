import type { ExecutionEvent } from '../event_bus';
import type { ReportVerbosity } from '../report';
import type { Palette } from './colors';

export type ConsoleFormat = 'standard' | 'verbose' | 'json' | 'minimal';

export const CONSOLE_FORMATS: readonly ConsoleFormat[] = ['standard', 'verbose', 'json', 'minimal'];

/**
 * The slice of a writable stream the sink needs; process.stdout fits.
 */
export type OutputStream = {
  write(chunk: string): unknown;
  isTTY?: boolean;
};

export type ConsoleSinkOptions = {
  format: ConsoleFormat;
  stream: OutputStream;
  /** Resolved colour decision, see shouldUseColor */
  color: boolean;
  /** Only failure details and the summary are written */
  quiet?: boolean;
  /** Detail level of the json document; defaults to 2 */
  verbosity?: ReportVerbosity;
};

export type RenderContext = {
  palette: Palette;
  quiet: boolean;
  verbosity: ReportVerbosity;
};

/**
 * One rendering strategy. Returns the text to write for an event, possibly
 * empty; it never writes itself.
 */
export interface ConsoleStrategy {
  render(event: ExecutionEvent): string;
}
