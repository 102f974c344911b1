import { CompositeActuationSink, LoggingActuationSink } from '../src/actuation';
import { loadConfig } from '../src/config';
import { silentLogger } from '../src/logging';
import { createActuationSink, dispatchRequest } from '../src/server';
import { SmartHomeService, createMessageHandler } from '../src/service';
import type { MessageHandler } from '../src/service';

const mockMqttClient = {
  on: jest.fn(),
  publishAsync: jest.fn().mockResolvedValue(undefined),
  endAsync: jest.fn().mockResolvedValue(undefined),
};

jest.mock('mqtt', () => ({
  __esModule: true,
  default: { connect: jest.fn(() => mockMqttClient) },
}));

describe('dispatchRequest', () => {
  let service: SmartHomeService;
  let handleMessage: MessageHandler;

  const turnOn = JSON.stringify({
    directive: {
      header: { namespace: 'Alexa.PowerController', name: 'TurnOn', messageId: 'msg-1', payloadVersion: '3' },
      endpoint: { endpointId: 'light_456' },
      payload: {},
    },
  });

  beforeEach(() => {
    service = new SmartHomeService({ actuationSink: { notify: jest.fn().mockResolvedValue(undefined) } });
    handleMessage = createMessageHandler(service);
  });

  it('should report health', async () => {
    const res = await dispatchRequest(service, handleMessage, { method: 'GET', url: '/health', body: '' });
    expect(res).toEqual({ statusCode: 200, body: { status: 'ok', devices: 4 } });
  });

  it('should route control directives', async () => {
    const res = await dispatchRequest(service, handleMessage, {
      method: 'POST',
      url: '/smart-home/control',
      body: turnOn,
    });
    expect(res.statusCode).toBe(200);
    expect(res.body).toMatchObject({ event: { header: { name: 'TurnOnResponse' } } });
  });

  it.each([
    ['an empty body', ''],
    ['an empty object', '{}'],
    ['a Discover directive', JSON.stringify({ directive: { header: { namespace: 'Alexa.Discovery', name: 'Discover' } } })],
  ])('should answer discovery given %s', async (_label, body) => {
    const res = await dispatchRequest(service, handleMessage, { method: 'POST', url: '/smart-home/discovery', body });
    expect(res.statusCode).toBe(200);
    expect(res.body).toMatchObject({ event: { header: { name: 'Discover.Response' } } });
  });

  it('should not execute a control directive posted to the discovery route', async () => {
    const res = await dispatchRequest(service, handleMessage, {
      method: 'POST',
      url: '/smart-home/discovery',
      body: turnOn,
    });
    expect(res.body).toMatchObject({ event: { header: { name: 'Discover.Response' } } });
    expect(service.getStore().get('light_456')?.state).toMatchObject({ powerState: 'OFF' });
  });

  it('should pass through the status of unknown devices', async () => {
    const res = await dispatchRequest(service, handleMessage, {
      method: 'POST',
      url: '/smart-home/control',
      body: turnOn.replace('light_456', 'ghost'),
    });
    expect(res.statusCode).toBe(404);
  });

  it('should reject a body that is not JSON', async () => {
    const res = await dispatchRequest(service, handleMessage, {
      method: 'POST',
      url: '/smart-home/control',
      body: '{not json',
    });
    expect(res.statusCode).toBe(400);
    expect(res.body).toMatchObject({
      event: { payload: { type: 'INVALID_DIRECTIVE', message: 'Request body is not valid JSON' } },
    });
  });

  it('should query the journal', async () => {
    await dispatchRequest(service, handleMessage, { method: 'POST', url: '/smart-home/control', body: turnOn });

    const res = await dispatchRequest(service, handleMessage, {
      method: 'GET',
      url: '/events?endpointId=light_456&limit=2',
      body: '',
    });
    expect(res.statusCode).toBe(200);
    expect(res.body).toMatchObject({ totalCount: 3 });
    expect(res.body).toHaveProperty('events.length', 2);
  });

  it.each([
    ['0', 'limit: Number must be greater than or equal to 1'],
    ['-5', 'limit: Number must be greater than or equal to 1'],
    ['abc', 'limit: Expected number, received nan'],
  ])('should reject the events limit %s', async (limit, detail) => {
    await dispatchRequest(service, handleMessage, { method: 'POST', url: '/smart-home/control', body: turnOn });

    const res = await dispatchRequest(service, handleMessage, {
      method: 'GET',
      url: `/events?limit=${limit}`,
      body: '',
    });
    expect(res).toEqual({ statusCode: 400, body: { error: `Invalid events query: ${detail}` } });
  });

  it('should answer unknown routes with 404', async () => {
    const res = await dispatchRequest(service, handleMessage, { method: 'GET', url: '/nope', body: '' });
    expect(res).toEqual({ statusCode: 404, body: { error: 'Not found' } });
  });
});

describe('createActuationSink', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should only log when no broker is configured', async () => {
    const setup = createActuationSink(loadConfig({}, {}), silentLogger());

    expect(setup.sink).toBeInstanceOf(LoggingActuationSink);
    await expect(setup.close()).resolves.toBeUndefined();
  });

  it('should log and publish when a broker is configured, and end the client on close', async () => {
    const setup = createActuationSink(
      loadConfig({ mqttUrl: 'mqtt://broker.test:1883' }, {}),
      silentLogger(),
    );
    expect(setup.sink).toBeInstanceOf(CompositeActuationSink);

    await setup.sink.notify('light_456', 'powerState', 'ON');
    expect(mockMqttClient.publishAsync).toHaveBeenCalledWith(
      'smart-home/actuation/light_456/powerState',
      expect.stringContaining('"value":"ON"'),
      { qos: 1, retain: false },
    );

    await setup.close();
    expect(mockMqttClient.endAsync).toHaveBeenCalledTimes(1);
  });
});
