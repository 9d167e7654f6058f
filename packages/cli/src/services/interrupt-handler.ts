import type { EventEmitter } from 'events';

export const INTERRUPTED_EXIT_CODE = 130;

export type InterruptHandlerOptions = {
  /** Emitter of SIGINT/SIGTERM; defaults to process */
  target?: EventEmitter;
  stderr?: { write(chunk: string): unknown };
  /** Called on the second signal; defaults to process.exit(130) */
  onForceExit?: () => void;
};

/**
 * First SIGINT or SIGTERM aborts `controller`, letting the unit in flight
 * finish and the sinks flush. A second one exits at once.
 *
 * @returns A function that removes the listeners
 */
export function installInterruptHandlers(
  controller: AbortController,
  options: InterruptHandlerOptions = {}
): () => void {
  const target: EventEmitter = options.target ?? process;
  const stderr = options.stderr ?? process.stderr;
  const forceExit = options.onForceExit ?? (() => process.exit(INTERRUPTED_EXIT_CODE));
  let received = 0;

  const onSignal = (signal: NodeJS.Signals) => {
    received += 1;
    if (received === 1) {
      stderr.write(`\nReceived ${signal}; finishing the current test. Send it again to exit immediately.\n`);
      controller.abort();
      return;
    }
    forceExit();
  };

  target.on('SIGINT', onSignal);
  target.on('SIGTERM', onSignal);
  return () => {
    target.off('SIGINT', onSignal);
    target.off('SIGTERM', onSignal);
  };
}
