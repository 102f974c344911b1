/**
 * The static per-type list of Alexa interfaces a
 * device advertises at discovery time.
 *
 * Declaration order here is the order the state reporter emits properties
 * in: power, then modes, then ranges, then sensors, then endpoint health.
 */

import type {
  CapabilityResources,
  DeviceCapability,
  DiscoveredDevice,
  DisplayCategory,
} from '../types/alexa';
import {
  BREW_STRENGTHS,
  COFFEE_MAKER_ERRORS,
  PERCENT_RANGE,
  THERMOSTAT_MODES,
  deviceTypeOf,
} from '../types/device';
import type { Device, DeviceType } from '../types/device';

export const NS = {
  Alexa: 'Alexa',
  Power: 'Alexa.PowerController',
  Brightness: 'Alexa.BrightnessController',
  Color: 'Alexa.ColorController',
  Mode: 'Alexa.ModeController',
  Range: 'Alexa.RangeController',
  Thermostat: 'Alexa.ThermostatController',
  TemperatureSensor: 'Alexa.TemperatureSensor',
  ContactSensor: 'Alexa.ContactSensor',
  EndpointHealth: 'Alexa.EndpointHealth',
  Discovery: 'Alexa.Discovery',
  /** ReportState address that is not itself a discovered interface */
  StateReport: 'Alexa.StateReport',
} as const;

/** Named controller instances; the wire form is `<name>.<endpointId>`. */
export const INSTANCES = {
  BrewStrength: 'BrewStrength',
  ErrorState: 'ErrorState',
  WaterLevel: 'WaterLevel',
} as const;

export type InstanceName = (typeof INSTANCES)[keyof typeof INSTANCES];

export function instanceId(name: InstanceName, endpointId: string): string {
  return `${name}.${endpointId}`;
}

const LOCALE = 'en-US';

function friendlyNames(...names: string[]): CapabilityResources {
  return {
    friendlyNames: names.map((text) => ({
      '@type': 'text' as const,
      value: { text, locale: LOCALE },
    })),
  };
}

function reportable(...names: string[]): DeviceCapability['properties'] {
  return {
    supported: names.map((name) => ({ name })),
    proactivelyReported: false,
    retrievable: true,
  };
}

function iface(
  name: string,
  extra: Omit<DeviceCapability, 'type' | 'interface' | 'version'> = {},
): DeviceCapability {
  return { type: 'AlexaInterface', interface: name, version: '3', ...extra };
}

function modeController(
  instance: string,
  label: string,
  values: readonly string[],
): DeviceCapability {
  return iface(NS.Mode, {
    instance,
    properties: reportable('mode'),
    capabilityResources: friendlyNames(label),
    configuration: {
      ordered: false,
      supportedModes: values.map((value) => ({
        value,
        modeResources: friendlyNames(value),
      })),
    },
  });
}

const alexa = (): DeviceCapability => iface(NS.Alexa);
const endpointHealth = (): DeviceCapability =>
  iface(NS.EndpointHealth, { properties: reportable('connectivity') });
const temperatureSensor = (): DeviceCapability =>
  iface(NS.TemperatureSensor, { properties: reportable('temperature') });

/**
 * Ordered capabilities for a device type.  The endpoint id only feeds the
 * instance identifiers of multi-instance controllers.
 */
export function capabilitiesFor(type: DeviceType, endpointId: string): DeviceCapability[] {
  switch (type) {
    case 'CoffeeMaker':
      return [
        alexa(),
        iface(NS.Power, { properties: reportable('powerState') }),
        modeController(instanceId(INSTANCES.BrewStrength, endpointId), 'brew strength', BREW_STRENGTHS),
        modeController(instanceId(INSTANCES.ErrorState, endpointId), 'error state', COFFEE_MAKER_ERRORS),
        iface(NS.Range, {
          instance: instanceId(INSTANCES.WaterLevel, endpointId),
          properties: reportable('rangeValue'),
          capabilityResources: friendlyNames('water level'),
          configuration: {
            supportedRange: { ...PERCENT_RANGE },
            unitOfMeasure: 'Alexa.Unit.Percent',
          },
        }),
        endpointHealth(),
      ];
    case 'Light':
      return [
        alexa(),
        iface(NS.Power, { properties: reportable('powerState') }),
        iface(NS.Brightness, { properties: reportable('brightness') }),
        iface(NS.Color, { properties: reportable('color') }),
        endpointHealth(),
      ];
    case 'Thermostat':
      return [
        alexa(),
        iface(NS.Thermostat, {
          properties: reportable('targetSetpoint', 'thermostatMode'),
          configuration: { supportedModes: [...THERMOSTAT_MODES], supportsScheduling: false },
        }),
        temperatureSensor(),
        endpointHealth(),
      ];
    case 'ContactSensor':
      return [
        alexa(),
        iface(NS.ContactSensor, { properties: reportable('detectionState') }),
        temperatureSensor(),
        endpointHealth(),
      ];
  }
}

/** Distinct interface names a type supports, in declaration order. */
export function interfacesFor(type: DeviceType): string[] {
  // Instance ids are irrelevant to interface names.
  const names = capabilitiesFor(type, '').map((c) => c.interface);
  return Array.from(new Set(names));
}

const DISPLAY_CATEGORIES: Record<DeviceType, DisplayCategory> = {
  CoffeeMaker: 'COFFEE_MAKER',
  Light: 'LIGHT',
  Thermostat: 'THERMOSTAT',
  ContactSensor: 'CONTACT_SENSOR',
};

const DESCRIPTIONS: Record<DeviceType, string> = {
  CoffeeMaker: 'Smart coffee maker',
  Light: 'Color smart light',
  Thermostat: 'Smart thermostat',
  ContactSensor: 'Door contact sensor',
};

/** The discovery endpoint record for one device. */
export function discoveryEndpointFor(device: Device, manufacturerName: string): DiscoveredDevice {
  const type = deviceTypeOf(device);
  return {
    endpointId: device.id,
    manufacturerName,
    description: DESCRIPTIONS[type],
    friendlyName: device.friendlyName,
    displayCategories: [DISPLAY_CATEGORIES[type]],
    capabilities: capabilitiesFor(type, device.id),
  };
}
