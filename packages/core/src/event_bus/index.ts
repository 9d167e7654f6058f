export { EventHub } from './event_hub';
export type { IEventHub } from './event_hub';
export { EventFactory, generateRunId } from './event_factory';
export { SinkDeliveryFault } from './errors';
export type {
  BaseEvent,
  EventMetadata,
  ExecutionEvent,
  ExecutionEventType,
  RunStartedEvent,
  TestStartedEvent,
  TestFinishedEvent,
  RunFinishedEvent,
  Sink,
  SinkShutdownReport,
} from './types';
