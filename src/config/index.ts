/**
 * Configuration for the Smart Home Bridge.
 *
 * Values are loaded from environment variables with defaults for local
 * development, and validated before anything starts.
 */

import { z } from 'zod';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface BridgeConfig {
  /** Port for the HTTP transport */
  port: number;
  /** Log level */
  logLevel: LogLevel;
  /** manufacturerName advertised at discovery */
  manufacturerName: string;
  /** JSON seed file for the device registry; the built-in fleet when unset */
  seedPath?: string;
  /** MQTT broker for actuation notifications; log-only when unset */
  mqttUrl?: string;
  /** Topic prefix for actuation messages: `<prefix>/<deviceId>/<field>` */
  mqttTopicPrefix: string;
}

const configSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(5000),
  logLevel: z.enum(LOG_LEVELS).default('info'),
  manufacturerName: z.string().min(1).default('Smart Home Bridge'),
  seedPath: z.string().min(1).optional(),
  mqttUrl: z.string().url().optional(),
  mqttTopicPrefix: z.string().min(1).default('smart-home/actuation'),
});

/** Empty strings count as unset. */
function env(source: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = source[key];
  return value === undefined || value === '' ? undefined : value;
}

export function loadConfig(
  overrides: Partial<BridgeConfig> = {},
  source: NodeJS.ProcessEnv = process.env,
): BridgeConfig {
  const result = configSchema.safeParse({
    port: env(source, 'PORT'),
    logLevel: env(source, 'LOG_LEVEL'),
    manufacturerName: env(source, 'MANUFACTURER_NAME'),
    seedPath: env(source, 'DEVICE_SEED_PATH'),
    mqttUrl: env(source, 'MQTT_URL'),
    mqttTopicPrefix: env(source, 'MQTT_TOPIC_PREFIX'),
    ...overrides,
  });

  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${detail}`);
  }
  return result.data;
}
