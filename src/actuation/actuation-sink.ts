/**
 * Actuation sinks receive a notification after every successful state
 * change.  Delivery is best-effort: the directive has already succeeded
 * by the time a sink is called.
 */

import type { Logger } from '../logging';
import type { PropertyValue } from '../types/device';

export interface ActuationSink {
  notify(deviceId: string, field: string, value: PropertyValue): Promise<void>;
}

/** Records actuations in the log; the default when no broker is configured. */
export class LoggingActuationSink implements ActuationSink {
  constructor(private logger: Logger) {}

  async notify(deviceId: string, field: string, value: PropertyValue): Promise<void> {
    this.logger.info({ deviceId, field, value }, 'actuating device');
  }
}

/** Fans a notification out to several sinks; rejects if any of them does. */
export class CompositeActuationSink implements ActuationSink {
  constructor(private sinks: ActuationSink[]) {}

  async notify(deviceId: string, field: string, value: PropertyValue): Promise<void> {
    const results = await Promise.allSettled(
      this.sinks.map((sink) => sink.notify(deviceId, field, value)),
    );
    const failures = results.filter(
      (r): r is PromiseRejectedResult => r.status === 'rejected',
    );
    if (failures.length > 0) {
      throw new AggregateError(
        failures.map((f) => f.reason),
        `${failures.length} of ${this.sinks.length} actuation sinks failed`,
      );
    }
  }
}
