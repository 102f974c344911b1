import { InMemoryEventStore } from '../../src/events';
import type { StoredEvent } from '../../src/events';

let seq = 0;

function makeEvent(overrides: Partial<StoredEvent> = {}): StoredEvent {
  seq++;
  return {
    id: `evt-${seq}`,
    timestamp: '2024-05-01T10:00:00.000Z',
    eventType: 'Directive',
    namespace: 'Alexa.PowerController',
    name: 'TurnOn',
    endpointId: 'light_456',
    payload: {},
    ...overrides,
  };
}

describe('InMemoryEventStore', () => {
  let store: InMemoryEventStore;

  beforeEach(() => {
    store = new InMemoryEventStore(100);
  });

  it('should insert and retrieve events by ID', async () => {
    const event = makeEvent({ id: 'evt-a' });
    await store.insert(event);

    expect(await store.getById('evt-a')).toEqual(event);
  });

  it('should return null for nonexistent event', async () => {
    expect(await store.getById('nonexistent')).toBeNull();
  });

  it('should return events newest first', async () => {
    await store.insert(makeEvent({ id: 'e1' }));
    await store.insert(makeEvent({ id: 'e2' }));
    await store.insert(makeEvent({ id: 'e3' }));

    const result = await store.query({});
    expect(result.events.map((e) => e.id)).toEqual(['e3', 'e2', 'e1']);
    expect(result.totalCount).toBe(3);
    expect(result.cursor).toBeUndefined();
  });

  it('should filter by endpointId, eventType and namespace', async () => {
    await store.insert(makeEvent({ id: 'a', endpointId: 'light_456' }));
    await store.insert(makeEvent({ id: 'b', endpointId: 'thermostat_789' }));
    await store.insert(makeEvent({ id: 'c', endpointId: 'light_456', eventType: 'PropertyChange' }));
    await store.insert(
      makeEvent({ id: 'd', endpointId: 'light_456', namespace: 'Alexa.BrightnessController' }),
    );

    expect((await store.query({ endpointId: 'light_456' })).events.map((e) => e.id)).toEqual([
      'd',
      'c',
      'a',
    ]);
    expect((await store.query({ eventType: 'PropertyChange' })).events.map((e) => e.id)).toEqual([
      'c',
    ]);
    expect(
      (await store.query({ namespace: 'Alexa.BrightnessController' })).events.map((e) => e.id),
    ).toEqual(['d']);
  });

  it('should filter by time range', async () => {
    await store.insert(makeEvent({ id: 'early', timestamp: '2024-01-01T00:00:00.000Z' }));
    await store.insert(makeEvent({ id: 'mid', timestamp: '2024-06-01T00:00:00.000Z' }));
    await store.insert(makeEvent({ id: 'late', timestamp: '2024-12-01T00:00:00.000Z' }));

    const result = await store.query({
      startTime: '2024-03-01T00:00:00.000Z',
      endTime: '2024-09-01T00:00:00.000Z',
    });
    expect(result.events.map((e) => e.id)).toEqual(['mid']);
  });

  it('should paginate with a cursor', async () => {
    for (let i = 1; i <= 5; i++) {
      await store.insert(makeEvent({ id: `p${i}` }));
    }

    const first = await store.query({ limit: 2 });
    expect(first.events.map((e) => e.id)).toEqual(['p5', 'p4']);
    expect(first.totalCount).toBe(5);
    expect(first.cursor).toBe('p4');

    const second = await store.query({ limit: 2, cursor: first.cursor });
    expect(second.events.map((e) => e.id)).toEqual(['p3', 'p2']);
    expect(second.cursor).toBe('p2');

    const third = await store.query({ limit: 2, cursor: second.cursor });
    expect(third.events.map((e) => e.id)).toEqual(['p1']);
    expect(third.cursor).toBeUndefined();
  });

  it('should return an empty page for a zero or negative limit', async () => {
    await store.insert(makeEvent({ id: 'z1' }));
    await store.insert(makeEvent({ id: 'z2' }));

    expect(await store.query({ limit: 0 })).toEqual({ events: [], totalCount: 2, cursor: undefined });
    expect((await store.query({ limit: -1 })).events).toEqual([]);
  });

  it('should drop the oldest events past maxEvents', async () => {
    const small = new InMemoryEventStore(3);
    for (let i = 1; i <= 5; i++) {
      await small.insert(makeEvent({ id: `m${i}` }));
    }

    expect(small.size).toBe(3);
    expect(await small.getById('m1')).toBeNull();
    expect((await small.query({})).events.map((e) => e.id)).toEqual(['m5', 'm4', 'm3']);
  });
});
