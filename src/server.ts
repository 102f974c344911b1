#!/usr/bin/env node
/**
 * HTTP transport for the Smart Home Bridge.
 *
 * Usage:
 *   npm run build && npm start
 *
 * Routes:
 *   POST /smart-home/discovery   discovery response (body ignored)
 *   POST /smart-home/control     control and ReportState directives
 *   GET  /events                 journal query (?endpointId=&limit=)
 *   GET  /health                 health check
 *
 * Requests are assumed to be authorized and sanitized upstream.
 */

import http from 'http';
import { z } from 'zod';
import { loadConfig } from './config';
import type { BridgeConfig } from './config';
import { createLogger } from './logging';
import type { Logger } from './logging';
import { InMemoryDeviceStore } from './devices/device-store';
import { DEFAULT_DEVICES, loadSeedFile } from './devices/seed';
import { CompositeActuationSink, LoggingActuationSink } from './actuation/actuation-sink';
import type { ActuationSink } from './actuation/actuation-sink';
import { MqttActuationSink } from './actuation/mqtt-sink';
import { SmartHomeService } from './service/smart-home-service';
import { createMessageHandler } from './service/message-handler';
import type { MessageHandler } from './service/message-handler';
import { buildErrorResponse } from './responses/response-builder';
import { NS } from './capabilities/catalog';

export interface HttpRequest {
  method: string;
  url: string;
  body: string;
}

export interface HttpResponse {
  statusCode: number;
  body: unknown;
}

const DISCOVER_REQUEST = { directive: { header: { namespace: NS.Discovery, name: 'Discover' } } };

const eventsQuerySchema = z.object({
  endpointId: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

function parseBody(body: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(body) };
  } catch {
    return { ok: false };
  }
}

/** Route one request. Never touches the socket. */
export async function dispatchRequest(
  service: SmartHomeService,
  handleMessage: MessageHandler,
  req: HttpRequest,
): Promise<HttpResponse> {
  const url = new URL(req.url, 'http://localhost');

  if (req.method === 'GET' && url.pathname === '/health') {
    return { statusCode: 200, body: { status: 'ok', devices: service.getStore().size } };
  }

  if (req.method === 'GET' && url.pathname === '/events') {
    const query = eventsQuerySchema.safeParse({
      endpointId: url.searchParams.get('endpointId') ?? undefined,
      limit: url.searchParams.get('limit') ?? undefined,
    });
    if (!query.success) {
      const detail = query.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      return { statusCode: 400, body: { error: `Invalid events query: ${detail}` } };
    }
    const result = await service.getEventLogger().getStore().query(query.data);
    return { statusCode: 200, body: result };
  }

  if (req.method === 'POST' && url.pathname === '/smart-home/discovery') {
    const outcome = await handleMessage(DISCOVER_REQUEST);
    return { statusCode: outcome.statusCode, body: outcome.message };
  }

  if (req.method === 'POST' && url.pathname === '/smart-home/control') {
    const parsed = parseBody(req.body);
    if (!parsed.ok) {
      return {
        statusCode: 400,
        body: buildErrorResponse('INVALID_DIRECTIVE', 'Request body is not valid JSON'),
      };
    }
    const outcome = await handleMessage(parsed.value);
    return { statusCode: outcome.statusCode, body: outcome.message };
  }

  return { statusCode: 404, body: { error: 'Not found' } };
}

export interface ActuationSetup {
  sink: ActuationSink;
  /** Release broker connections. */
  close(): Promise<void>;
}

/** Log every actuation; also publish over MQTT when a broker is configured. */
export function createActuationSink(config: BridgeConfig, logger: Logger): ActuationSetup {
  const logging = new LoggingActuationSink(logger.child({ component: 'actuation' }));
  if (!config.mqttUrl) {
    return { sink: logging, close: async () => undefined };
  }
  const mqttSink = MqttActuationSink.connect(
    config.mqttUrl,
    config.mqttTopicPrefix,
    logger.child({ component: 'mqtt' }),
  );
  return {
    sink: new CompositeActuationSink([logging, mqttSink]),
    close: () => mqttSink.close(),
  };
}

export function startServer(config: BridgeConfig = loadConfig()): http.Server {
  const logger = createLogger(config.logLevel);
  const seed = config.seedPath ? loadSeedFile(config.seedPath) : DEFAULT_DEVICES;
  const actuation = createActuationSink(config, logger);
  const service = new SmartHomeService({
    config,
    logger,
    store: new InMemoryDeviceStore(seed),
    actuationSink: actuation.sink,
  });
  const handleMessage = createMessageHandler(service);

  const server = http.createServer((req, res) => {
    let body = '';
    req.on('data', (chunk) => (body += chunk));
    req.on('end', () => {
      dispatchRequest(service, handleMessage, {
        method: req.method ?? 'GET',
        url: req.url ?? '/',
        body,
      })
        .then(({ statusCode, body: payload }) => {
          res.writeHead(statusCode, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify(payload));
        })
        .catch((err: unknown) => {
          logger.error({ err, url: req.url }, 'request failed');
          res.writeHead(500, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify({ error: err instanceof Error ? err.message : String(err) }));
        });
    });
  });

  server.listen(config.port, () => {
    logger.info(
      { port: config.port, devices: service.getStore().size, mqtt: Boolean(config.mqttUrl) },
      `Smart Home Bridge listening on http://localhost:${config.port}`,
    );
  });

  process.on('SIGINT', () => {
    logger.info('Shutting down...');
    server.close();
    actuation.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'failed to close actuation sink');
        process.exit(1);
      },
    );
  });

  return server;
}

if (require.main === module) {
  startServer();
}
