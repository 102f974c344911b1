export { EventLogger } from './event-logger';
export type { EventListener, DirectiveSummary } from './event-logger';
export { InMemoryEventStore } from './event-store';
export type {
  EventStore,
  StoredEvent,
  EventQuery,
  EventQueryResult,
  JournalEventType,
} from './event-store';
