/**
 * smart-home-bridge
 *
 * Alexa Smart Home protocol adapter over a fleet of simulated devices:
 * - Capability catalog and discovery
 * - Directive routing and type-safe command handlers
 * - State reports and control responses
 * - Actuation notifications and an event journal
 */

// Main service
export { SmartHomeService, createMessageHandler } from './service';
export type { DirectiveOutcome, OutcomeStatus, SmartHomeServiceOptions, MessageHandler } from './service';

// Sub-modules
export { InMemoryDeviceStore, DEFAULT_DEVICES, loadSeedFile, parseSeed, deviceStateSchema, stateViolation } from './devices';
export type { DeviceStore, Mutation, RegistrySnapshot } from './devices';

export { NS, INSTANCES, instanceId, capabilitiesFor, interfacesFor, discoveryEndpointFor } from './capabilities';
export type { InstanceName } from './capabilities';

export {
  DirectiveRouter,
  buildHandlerTable,
  parseDirective,
  SmartHomeError,
  UnknownDeviceError,
  UnsupportedCommandError,
  MalformedDirectiveError,
  ValidationError,
  ActuationNotifyError,
} from './directives';
export type { Directive, ControlHandler, DirectiveContext, HandlerResult, RouteMatch } from './directives';

export { snapshot, changeToProperty } from './reporting';
export { buildDiscoveryResponse, buildDirectiveResponse, buildStateReport, buildErrorResponse } from './responses';

export { LoggingActuationSink, CompositeActuationSink, MqttActuationSink } from './actuation';
export type { ActuationSink, MqttPublisher } from './actuation';

export { EventLogger, InMemoryEventStore } from './events';
export type { EventStore, StoredEvent, EventQuery, EventQueryResult, EventListener } from './events';

export { createLogger, silentLogger } from './logging';
export type { Logger } from './logging';

export { loadConfig } from './config';
export type { BridgeConfig, LogLevel } from './config';

export { dispatchRequest, startServer } from './server';

export { deviceTypeOf, isStateOf } from './types/device';

// Types
export type {
  AlexaMessage,
  AlexaDirective,
  AlexaEvent,
  AlexaEndpoint,
  AlexaContext,
  AlexaPropertyState,
  AlexaErrorType,
  DiscoveredDevice,
  DeviceCapability,
  DisplayCategory,
  PowerState,
  Temperature,
  TemperatureScale,
  Color,
} from './types/alexa';

export type {
  Device,
  DeviceState,
  DeviceType,
  StateOf,
  CoffeeMakerState,
  LightState,
  ThermostatState,
  ContactSensorState,
  StateChangeDescriptor,
  PropertyValue,
} from './types/device';
