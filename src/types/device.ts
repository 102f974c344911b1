/**
 * Device model: identity plus a state variant per device type.
 *
 * The enumerations and ranges below are shared by the capability catalog,
 * the directive payload schemas and the state schema.
 */

import type { Color, PowerState, Temperature } from './alexa';

export const BREW_STRENGTHS = ['light', 'medium', 'strong'] as const;
export type BrewStrength = (typeof BREW_STRENGTHS)[number];

export const COFFEE_MAKER_ERRORS = ['none', 'lowWater', 'jammed'] as const;
export type CoffeeMakerError = (typeof COFFEE_MAKER_ERRORS)[number];

export const THERMOSTAT_MODES = ['HEAT', 'COOL', 'AUTO', 'OFF'] as const;
export type ThermostatModeValue = (typeof THERMOSTAT_MODES)[number];

export const DETECTION_STATES = ['DETECTED', 'NOT_DETECTED'] as const;
export type DetectionState = (typeof DETECTION_STATES)[number];

export const POWER_STATES = ['ON', 'OFF'] as const satisfies readonly PowerState[];

export const TEMPERATURE_SCALES = ['CELSIUS', 'FAHRENHEIT', 'KELVIN'] as const;

/** Inclusive bounds for brightness, water level and range controllers. */
export const PERCENT_RANGE = { minimumValue: 0, maximumValue: 100, precision: 1 } as const;

export const HUE_RANGE = { min: 0, max: 360 } as const;

// ---------------------------------------------------------------------------
// State variants
// ---------------------------------------------------------------------------

export interface CoffeeMakerState {
  readonly type: 'CoffeeMaker';
  readonly powerState: PowerState;
  readonly brewStrength: BrewStrength;
  /** Percent, 0-100 */
  readonly waterLevel: number;
  readonly errorState: CoffeeMakerError;
}

export interface LightState {
  readonly type: 'Light';
  readonly powerState: PowerState;
  /** Percent, 0-100 */
  readonly brightness: number;
  readonly color: Readonly<Color>;
}

export interface ThermostatState {
  readonly type: 'Thermostat';
  readonly targetSetpoint: Readonly<Temperature>;
  readonly temperature: Readonly<Temperature>;
  readonly thermostatMode: ThermostatModeValue;
}

/** Read-only sensor: no control directive targets it. */
export interface ContactSensorState {
  readonly type: 'ContactSensor';
  readonly detectionState: DetectionState;
  readonly temperature: Readonly<Temperature>;
}

export interface DeviceStateMap {
  CoffeeMaker: CoffeeMakerState;
  Light: LightState;
  Thermostat: ThermostatState;
  ContactSensor: ContactSensorState;
}

export type DeviceType = keyof DeviceStateMap;

export type DeviceState = DeviceStateMap[DeviceType];

export type StateOf<T extends DeviceType> = DeviceStateMap[T];

export const DEVICE_TYPES = [
  'CoffeeMaker',
  'Light',
  'Thermostat',
  'ContactSensor',
] as const satisfies readonly DeviceType[];

// ---------------------------------------------------------------------------
// Device
// ---------------------------------------------------------------------------

export interface Device {
  readonly id: string;
  readonly friendlyName: string;
  readonly state: DeviceState;
}

export function deviceTypeOf(device: Device): DeviceType {
  return device.state.type;
}

export function isStateOf<T extends DeviceType>(
  type: T,
  state: DeviceState,
): state is StateOf<T> {
  return state.type === type;
}

// ---------------------------------------------------------------------------
// State changes
// ---------------------------------------------------------------------------

export type PropertyValue = string | number | Readonly<Color> | Readonly<Temperature>;

/** What a command handler changed: one state field and its protocol name. */
export interface StateChangeDescriptor {
  /** State field that changed (e.g. brewStrength) */
  field: string;
  /** Protocol property name (e.g. mode) */
  propertyName: string;
  value: PropertyValue;
  instance?: string;
}
