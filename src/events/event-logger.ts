/**
 * Journals every directive, its outcome and the property
 * changes it applied, and streams them to real-time subscribers.
 */

import { v4 as uuid } from 'uuid';
import type { AlexaMessage, AlexaPropertyState } from '../types/alexa';
import type { Logger } from '../logging';
import { silentLogger } from '../logging';
import type { EventStore, JournalEventType, StoredEvent } from './event-store';
import { InMemoryEventStore } from './event-store';

export type EventListener = (event: StoredEvent) => void;

/** The parts of an inbound request worth journaling. */
export interface DirectiveSummary {
  namespace: string;
  name: string;
  endpointId?: string;
  correlationToken?: string;
  instance?: string;
  payload?: Record<string, unknown>;
}

export class EventLogger {
  private store: EventStore;
  private listeners = new Map<string, EventListener>();
  private streamFilters = new Map<string, Set<string> | null>(); // streamId -> endpointIds (null = all)

  constructor(
    store?: EventStore,
    private logger: Logger = silentLogger(),
    private now: () => Date = () => new Date(),
  ) {
    this.store = store ?? new InMemoryEventStore();
  }

  async logDirective(directive: DirectiveSummary): Promise<StoredEvent> {
    return this.record('Directive', {
      namespace: directive.namespace,
      name: directive.name,
      endpointId: directive.endpointId,
      correlationToken: directive.correlationToken,
      payload: {
        ...(directive.instance ? { instance: directive.instance } : {}),
        ...(directive.payload ?? {}),
      },
    });
  }

  /** Journal the response sent back for a directive. */
  async logOutcome(
    directive: DirectiveSummary,
    statusCode: number,
    response: AlexaMessage,
  ): Promise<StoredEvent> {
    const header = response.event?.header;
    return this.record('DirectiveOutcome', {
      namespace: directive.namespace,
      name: directive.name,
      endpointId: directive.endpointId,
      correlationToken: directive.correlationToken,
      payload: {
        statusCode,
        response: header ? `${header.namespace}.${header.name}` : null,
        ...(header?.name === 'ErrorResponse' ? { error: response.event?.payload } : {}),
      },
    });
  }

  async logPropertyChange(
    endpointId: string,
    property: AlexaPropertyState,
    correlationToken?: string,
  ): Promise<StoredEvent> {
    return this.record('PropertyChange', {
      namespace: property.namespace,
      name: property.name,
      endpointId,
      correlationToken,
      timestamp: property.timeOfSample,
      payload: {
        value: property.value,
        ...(property.instance ? { instance: property.instance } : {}),
      },
    });
  }

  /**
   * Subscribe to real-time events.
   *
   * @param endpointIds If provided, only events for these endpoints are delivered.
   * @returns A stream ID that can be used to unsubscribe.
   */
  subscribe(listener: EventListener, endpointIds?: string[]): string {
    const streamId = uuid();
    this.listeners.set(streamId, listener);
    this.streamFilters.set(
      streamId,
      endpointIds && endpointIds.length > 0 ? new Set(endpointIds) : null,
    );
    return streamId;
  }

  unsubscribe(streamId: string): void {
    this.listeners.delete(streamId);
    this.streamFilters.delete(streamId);
  }

  getStore(): EventStore {
    return this.store;
  }

  // -----------------------------------------------------------------------
  // Internal helpers
  // -----------------------------------------------------------------------

  private async record(
    eventType: JournalEventType,
    fields: Omit<StoredEvent, 'id' | 'eventType' | 'timestamp'> & { timestamp?: string },
  ): Promise<StoredEvent> {
    const event: StoredEvent = {
      ...fields,
      id: uuid(),
      eventType,
      timestamp: fields.timestamp ?? this.now().toISOString(),
    };
    await this.store.insert(event);
    this.notifyListeners(event);
    return event;
  }

  private notifyListeners(event: StoredEvent): void {
    for (const [streamId, listener] of this.listeners) {
      const filter = this.streamFilters.get(streamId);
      if (filter === null || (event.endpointId && filter?.has(event.endpointId))) {
        try {
          listener(event);
        } catch (err) {
          // One failing listener must not starve the others
          this.logger.warn({ err, streamId }, 'event listener threw');
        }
      }
    }
  }
}
