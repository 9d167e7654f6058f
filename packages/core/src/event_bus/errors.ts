import { SieveError } from '../errors';

/**
 * A sink threw while handling an event. The hub logs it and moves on to
 * the next sink.
 */
export class SinkDeliveryFault extends SieveError {
  constructor(public readonly sinkName: string, public readonly eventType: string, cause: Error) {
    super(`Sink "${sinkName}" failed to handle ${eventType}: ${cause.message}`, 'SINK_DELIVERY_FAULT', { cause });
    this.name = "SinkDeliveryFault";
    Object.setPrototypeOf(this, SinkDeliveryFault.prototype);
  }
}
