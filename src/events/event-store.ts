/**
 * An in-memory journal of directives, outcomes and
 * property changes, queryable newest first.
 *
 * Memory only: the journal starts empty on every process start.
 */

export type JournalEventType = 'Directive' | 'DirectiveOutcome' | 'PropertyChange';

export interface StoredEvent {
  id: string;
  /** ISO-8601 timestamp */
  timestamp: string;
  eventType: JournalEventType;
  /** Alexa interface namespace (e.g., Alexa.PowerController) */
  namespace: string;
  /** Directive or response name */
  name: string;
  /** Target device endpoint ID (absent for discovery) */
  endpointId?: string;
  correlationToken?: string;
  payload: Record<string, unknown>;
}

export interface EventQuery {
  endpointId?: string;
  eventType?: JournalEventType;
  namespace?: string;
  /** Start of time range (ISO-8601) */
  startTime?: string;
  /** End of time range (ISO-8601) */
  endTime?: string;
  /** Maximum number of results (default 100) */
  limit?: number;
  /** Pagination cursor (event ID to start after) */
  cursor?: string;
}

export interface EventQueryResult {
  events: StoredEvent[];
  totalCount: number;
  cursor?: string;
}

export interface EventStore {
  insert(event: StoredEvent): Promise<void>;
  query(query: EventQuery): Promise<EventQueryResult>;
  getById(id: string): Promise<StoredEvent | null>;
}

function matches(event: StoredEvent, query: EventQuery): boolean {
  if (query.endpointId && event.endpointId !== query.endpointId) return false;
  if (query.eventType && event.eventType !== query.eventType) return false;
  if (query.namespace && event.namespace !== query.namespace) return false;
  if (query.startTime && event.timestamp < query.startTime) return false;
  if (query.endTime && event.timestamp > query.endTime) return false;
  return true;
}

/** Bounded store; the oldest events are dropped past `maxEvents`. */
export class InMemoryEventStore implements EventStore {
  private events: StoredEvent[] = [];

  constructor(private maxEvents = 10_000) {}

  async insert(event: StoredEvent): Promise<void> {
    this.events.unshift(event);
    if (this.events.length > this.maxEvents) {
      this.events.length = this.maxEvents;
    }
  }

  async query(query: EventQuery): Promise<EventQueryResult> {
    let filtered = this.events.filter((e) => matches(e, query));
    const totalCount = filtered.length;

    if (query.cursor) {
      const idx = filtered.findIndex((e) => e.id === query.cursor);
      if (idx >= 0) filtered = filtered.slice(idx + 1);
    }

    const limit = Math.max(0, query.limit ?? 100);
    const page = filtered.slice(0, limit);
    const last = page.length > 0 ? page[page.length - 1] : undefined;
    const cursor = last && page.length === limit && filtered.length > limit ? last.id : undefined;

    return { events: page, totalCount, cursor };
  }

  async getById(id: string): Promise<StoredEvent | null> {
    return this.events.find((e) => e.id === id) ?? null;
  }

  get size(): number {
    return this.events.length;
  }
}
