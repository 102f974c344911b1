/**
 * Entry point of the directive engine.
 *
 * Discovery reads a consistent registry snapshot through the capability
 * catalog.  Control directives are routed to a handler, applied to the
 * device store in one synchronous read-modify-write, echoed back through
 * the state reporter, and then handed to the actuation sink without
 * waiting on it.
 */

import type { AlexaMessage } from '../types/alexa';
import type { Device } from '../types/device';
import type { BridgeConfig } from '../config';
import { loadConfig } from '../config';
import type { Logger } from '../logging';
import { silentLogger } from '../logging';
import { discoveryEndpointFor } from '../capabilities/catalog';
import { InMemoryDeviceStore } from '../devices/device-store';
import type { DeviceStore } from '../devices/device-store';
import { DEFAULT_DEVICES } from '../devices/seed';
import { DirectiveRouter } from '../directives/router';
import type { BoundHandler } from '../directives/handler-table';
import type { Directive } from '../directives/directive';
import type { HandlerResult } from '../directives/handlers/types';
import { ActuationNotifyError, SmartHomeError, UnknownDeviceError } from '../directives/errors';
import { changeToProperty, snapshot } from '../reporting/state-reporter';
import {
  buildDirectiveResponse,
  buildDiscoveryResponse,
  buildErrorResponse,
  buildStateReport,
} from '../responses/response-builder';
import type { ActuationSink } from '../actuation/actuation-sink';
import { LoggingActuationSink } from '../actuation/actuation-sink';
import { EventLogger } from '../events/event-logger';
import type { StateChangeDescriptor } from '../types/device';

export type OutcomeStatus = 200 | 400 | 404 | 500;

export interface DirectiveOutcome {
  statusCode: OutcomeStatus;
  message: AlexaMessage;
}

export interface SmartHomeServiceOptions {
  config?: Partial<BridgeConfig>;
  /** Registry to serve; defaults to the built-in fleet */
  store?: DeviceStore;
  actuationSink?: ActuationSink;
  eventLogger?: EventLogger;
  logger?: Logger;
  /** Clock for timeOfSample values */
  now?: () => Date;
}

export class SmartHomeService {
  private config: BridgeConfig;
  private store: DeviceStore;
  private router: DirectiveRouter;
  private sink: ActuationSink;
  private eventLogger: EventLogger;
  private logger: Logger;
  private now: () => Date;

  constructor(opts: SmartHomeServiceOptions = {}) {
    this.config = loadConfig(opts.config);
    this.logger = opts.logger ?? silentLogger();
    this.now = opts.now ?? (() => new Date());
    this.store = opts.store ?? new InMemoryDeviceStore(DEFAULT_DEVICES);
    this.router = new DirectiveRouter(this.store);
    this.sink = opts.actuationSink ?? new LoggingActuationSink(this.logger.child({ component: 'actuation' }));
    this.eventLogger = opts.eventLogger ?? new EventLogger(undefined, this.logger, this.now);
  }

  getStore(): DeviceStore { return this.store; }
  getRouter(): DirectiveRouter { return this.router; }
  getEventLogger(): EventLogger { return this.eventLogger; }

  // -----------------------------------------------------------------------
  // Discovery
  // -----------------------------------------------------------------------

  /** Discovery response over every device as of a single registry generation. */
  discover(): AlexaMessage {
    const { generation, devices } = this.store.snapshot();
    this.logger.debug({ generation, deviceCount: devices.length }, 'discovery');
    return buildDiscoveryResponse(
      devices.map((d) => discoveryEndpointFor(d, this.config.manufacturerName)),
    );
  }

  // -----------------------------------------------------------------------
  // Directives
  // -----------------------------------------------------------------------

  /**
   * Route and apply one directive.  Taxonomy errors become ErrorResponses
   * with their status; anything else is logged and answered with 500.
   */
  async handleDirective(directive: Directive): Promise<DirectiveOutcome> {
    await this.eventLogger.logDirective(directive);

    let outcome: DirectiveOutcome;
    let change: StateChangeDescriptor | undefined;
    try {
      ({ outcome, change } = this.dispatch(directive));
    } catch (err) {
      outcome = this.failure(directive, err);
    }

    await this.eventLogger.logOutcome(directive, outcome.statusCode, outcome.message);
    const changed = outcome.message.context?.properties[0];
    if (change && changed) {
      await this.eventLogger.logPropertyChange(directive.endpointId, changed, directive.correlationToken);
      this.notifyActuation(directive.endpointId, change);
    }
    return outcome;
  }

  /** StateReport for one device, outside the directive flow. */
  reportState(endpointId: string, correlationToken?: string): AlexaMessage {
    const device = this.store.get(endpointId);
    if (!device) throw new UnknownDeviceError(endpointId);
    return buildStateReport({ endpointId, correlationToken }, snapshot(device, this.now()));
  }

  // -----------------------------------------------------------------------
  // Internal helpers
  // -----------------------------------------------------------------------

  private dispatch(directive: Directive): {
    outcome: DirectiveOutcome;
    change?: StateChangeDescriptor;
  } {
    const { device, handler } = this.router.route(
      directive.endpointId,
      directive.namespace,
      directive.name,
      directive.instance,
    );

    if (handler.kind === 'report') {
      return {
        outcome: {
          statusCode: 200,
          message: buildStateReport(directive, snapshot(device, this.now())),
        },
      };
    }

    const result = this.apply(device, handler.handler, directive);
    if (!result.success) throw result.error;

    const appliedAt = this.now();
    this.logger.info(
      { endpointId: device.id, namespace: directive.namespace, name: directive.name, change: result.change },
      'directive applied',
    );
    return {
      outcome: {
        statusCode: 200,
        message: buildDirectiveResponse(
          directive,
          changeToProperty(directive.namespace, result.change, appliedAt),
        ),
      },
      change: result.change,
    };
  }

  /** Validate-then-commit inside the store's per-device critical section. */
  private apply(
    device: Device,
    handler: BoundHandler,
    directive: Directive,
  ): HandlerResult<Device['state']> {
    return this.store.mutate(device.id, (current) => {
      const result = handler.apply(current.state, {
        endpointId: current.id,
        namespace: directive.namespace,
        name: directive.name,
        instance: directive.instance,
        payload: directive.payload,
      });
      return { state: result.success ? result.state : undefined, result };
    });
  }

  private failure(directive: Directive, err: unknown): DirectiveOutcome {
    if (err instanceof SmartHomeError) {
      this.logger.info(
        { endpointId: directive.endpointId, namespace: directive.namespace, name: directive.name, errorType: err.errorType },
        err.message,
      );
      return {
        statusCode: err.statusCode,
        message: buildErrorResponse(err.errorType, err.message, directive),
      };
    }

    this.logger.error({ err, endpointId: directive.endpointId }, 'directive failed');
    const message = err instanceof Error ? err.message : String(err);
    return { statusCode: 500, message: buildErrorResponse('INTERNAL_ERROR', message, directive) };
  }

  /** Fire-and-forget: a failing sink is logged, never surfaced. */
  private notifyActuation(deviceId: string, change: StateChangeDescriptor): void {
    let pending: Promise<void>;
    try {
      pending = this.sink.notify(deviceId, change.field, change.value);
    } catch (err) {
      pending = Promise.reject(err);
    }
    void pending.catch((err: unknown) => {
      const failure = new ActuationNotifyError(deviceId, change.field, err);
      this.logger.warn({ err: failure, deviceId, field: change.field }, failure.message);
    });
  }
}
