/**
 * Publishes actuation notifications to an MQTT broker.
 *
 * Topic: `<topicPrefix>/<deviceId>/<field>`, payload
 * `{ "value": ..., "timestamp": "<ISO-8601>" }`, QoS 1.
 */

import mqtt from 'mqtt';
import type { IClientOptions, IClientPublishOptions } from 'mqtt';
import type { Logger } from '../logging';
import type { PropertyValue } from '../types/device';
import type { ActuationSink } from './actuation-sink';

/** The slice of MqttClient the sink uses. */
export interface MqttPublisher {
  publishAsync(topic: string, message: string, opts: IClientPublishOptions): Promise<unknown>;
  endAsync(): Promise<void>;
}

const PUBLISH_OPTIONS: IClientPublishOptions = { qos: 1, retain: false };

export class MqttActuationSink implements ActuationSink {
  constructor(
    private client: MqttPublisher,
    private topicPrefix: string,
    private now: () => Date = () => new Date(),
  ) {}

  /** Connect to a broker and wrap the client. */
  static connect(
    url: string,
    topicPrefix: string,
    logger: Logger,
    options: IClientOptions = {},
  ): MqttActuationSink {
    const client = mqtt.connect(url, {
      clientId: `smart-home-bridge_${process.pid}_${Math.random().toString(16).slice(2)}`,
      keepalive: 30,
      reconnectPeriod: 2000,
      clean: true,
      ...options,
    });
    client.on('connect', () => logger.info({ url }, 'MQTT connected'));
    client.on('reconnect', () => logger.warn({ url }, 'MQTT reconnecting'));
    client.on('error', (err) => logger.error({ err }, 'MQTT error'));
    return new MqttActuationSink(client, topicPrefix);
  }

  topicFor(deviceId: string, field: string): string {
    return `${this.topicPrefix}/${deviceId}/${field}`;
  }

  async notify(deviceId: string, field: string, value: PropertyValue): Promise<void> {
    const message = JSON.stringify({ value, timestamp: this.now().toISOString() });
    await this.client.publishAsync(this.topicFor(deviceId, field), message, PUBLISH_OPTIONS);
  }

  close(): Promise<void> {
    return this.client.endAsync();
  }
}
