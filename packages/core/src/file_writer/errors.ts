import { SieveError } from '../errors';

/**
 * The background writer could not open, write or close its file. Reported
 * once; the run's outcome and exit code are unaffected.
 */
export class WriterIOFault extends SieveError {
  constructor(public readonly filePath: string, cause: Error) {
    super(`Could not write ${filePath}: ${cause.message}`, 'WRITER_IO_FAULT', { cause });
    this.name = "WriterIOFault";
    Object.setPrototypeOf(this, WriterIOFault.prototype);
  }
}
