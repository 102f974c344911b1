/**
 * Alexa Smart Home API v3 message types.
 *
 * These model the directive / event envelope the bridge receives and
 * answers, plus the capability shapes advertised at discovery time.
 */

// ---------------------------------------------------------------------------
// Common message envelope
// ---------------------------------------------------------------------------

export interface AlexaMessageHeader {
  namespace: string;
  name: string;
  messageId: string;
  correlationToken?: string;
  /** Controller instance for ModeController / RangeController directives. */
  instance?: string;
  payloadVersion: '3';
}

export interface AlexaEndpoint {
  endpointId: string;
}

export interface AlexaDirective<P = Record<string, unknown>> {
  header: AlexaMessageHeader;
  endpoint?: AlexaEndpoint;
  payload: P;
}

export interface AlexaEvent<P = Record<string, unknown>> {
  header: AlexaMessageHeader;
  endpoint?: AlexaEndpoint;
  payload: P;
}

export interface AlexaContext {
  properties: AlexaPropertyState[];
}

export interface AlexaPropertyState {
  namespace: string;
  name: string;
  instance?: string;
  value: unknown;
  timeOfSample: string; // ISO-8601
  uncertaintyInMilliseconds: number;
}

export interface AlexaMessage<P = Record<string, unknown>> {
  directive?: AlexaDirective<P>;
  event?: AlexaEvent<P>;
  context?: AlexaContext;
}

// ---------------------------------------------------------------------------
// Discovery
// ---------------------------------------------------------------------------

export type DisplayCategory =
  | 'COFFEE_MAKER'
  | 'LIGHT'
  | 'THERMOSTAT'
  | 'CONTACT_SENSOR';

export interface CapabilityProperty {
  supported: Array<{ name: string }>;
  proactivelyReported: boolean;
  retrievable: boolean;
}

export interface FriendlyName {
  '@type': 'text';
  value: { text: string; locale: string };
}

export interface CapabilityResources {
  friendlyNames: FriendlyName[];
}

export interface ModeConfiguration {
  ordered: boolean;
  supportedModes: Array<{ value: string; modeResources: CapabilityResources }>;
}

export interface RangeConfiguration {
  supportedRange: { minimumValue: number; maximumValue: number; precision: number };
  unitOfMeasure?: string;
}

export interface ThermostatConfiguration {
  supportedModes: string[];
  supportsScheduling: boolean;
}

export interface DeviceCapability {
  type: 'AlexaInterface';
  interface: string;
  version: '3';
  properties?: CapabilityProperty;
  instance?: string;
  configuration?: ModeConfiguration | RangeConfiguration | ThermostatConfiguration;
  capabilityResources?: CapabilityResources;
}

export interface DiscoveredDevice {
  endpointId: string;
  manufacturerName: string;
  description: string;
  friendlyName: string;
  displayCategories: DisplayCategory[];
  capabilities: DeviceCapability[];
}

// ---------------------------------------------------------------------------
// Property values
// ---------------------------------------------------------------------------

export type PowerState = 'ON' | 'OFF';

export type TemperatureScale = 'CELSIUS' | 'FAHRENHEIT' | 'KELVIN';

export interface Temperature {
  value: number;
  scale: TemperatureScale;
}

export interface Color {
  hue: number;       // 0-360
  saturation: number; // 0-1
  brightness: number; // 0-1
}

/** Simulated devices are always reachable. */
export type ConnectivityValue = 'OK';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export type AlexaErrorType =
  | 'NO_SUCH_ENDPOINT'
  | 'INVALID_DIRECTIVE'
  | 'INVALID_VALUE'
  | 'VALUE_OUT_OF_RANGE'
  | 'INTERNAL_ERROR';
