/**
 * Base class for every error sieve raises on purpose.
 *
 * Module specific errors live next to their module (discovery/errors.ts,
 * file_writer/errors.ts, ...) and extend this class so callers can tell
 * a sieve fault apart from an arbitrary exception thrown by a test body.
 */
export type SieveErrorCode =
  | 'DISCOVERY_LOAD_ERROR'
  | 'EXECUTION_FAULT'
  | 'ASSERTION_MISMATCH'
  | 'SINK_DELIVERY_FAULT'
  | 'WRITER_IO_FAULT'
  | 'CONFIGURATION_FAULT';

export class SieveError extends Error {
  constructor(message: string, public readonly code: SieveErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SieveError";
    Object.setPrototypeOf(this, SieveError.prototype);
  }
}

/**
 * Normalises an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : String(value));
}

/**
 * Stack of an error followed by the stacks of its cause chain.
 */
export function formatTrace(error: Error): string {
  const parts: string[] = [error.stack ?? `${error.name}: ${error.message}`];
  let cause = error.cause;
  let depth = 0;
  while (cause !== undefined && depth < 5) {
    const causeError = toError(cause);
    parts.push(`Caused by: ${causeError.stack ?? `${causeError.name}: ${causeError.message}`}`);
    cause = causeError.cause;
    depth += 1;
  }
  return parts.join('\n');
}
