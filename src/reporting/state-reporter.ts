/**
 * Turns a device's state into Alexa property values.
 *
 * Property order follows the capability catalog: power, modes, ranges,
 * sensors, then EndpointHealth.connectivity, which is always OK.
 */

import type { AlexaPropertyState, ConnectivityValue } from '../types/alexa';
import type { Device, DeviceState, PropertyValue, StateChangeDescriptor } from '../types/device';
import { INSTANCES, NS, instanceId } from '../capabilities/catalog';

/** Uncertainty attached to sampled (reported) values. */
export const SAMPLE_UNCERTAINTY_MS = 50;

const CONNECTIVITY: ConnectivityValue = 'OK';

interface PropertyReading {
  namespace: string;
  name: string;
  value: PropertyValue;
  instance?: string;
}

function readings(endpointId: string, state: DeviceState): PropertyReading[] {
  switch (state.type) {
    case 'CoffeeMaker':
      return [
        { namespace: NS.Power, name: 'powerState', value: state.powerState },
        {
          namespace: NS.Mode,
          name: 'mode',
          instance: instanceId(INSTANCES.BrewStrength, endpointId),
          value: state.brewStrength,
        },
        {
          namespace: NS.Mode,
          name: 'mode',
          instance: instanceId(INSTANCES.ErrorState, endpointId),
          value: state.errorState,
        },
        {
          namespace: NS.Range,
          name: 'rangeValue',
          instance: instanceId(INSTANCES.WaterLevel, endpointId),
          value: state.waterLevel,
        },
      ];
    case 'Light':
      return [
        { namespace: NS.Power, name: 'powerState', value: state.powerState },
        { namespace: NS.Brightness, name: 'brightness', value: state.brightness },
        { namespace: NS.Color, name: 'color', value: state.color },
      ];
    case 'Thermostat':
      return [
        { namespace: NS.Thermostat, name: 'targetSetpoint', value: state.targetSetpoint },
        { namespace: NS.Thermostat, name: 'thermostatMode', value: state.thermostatMode },
        { namespace: NS.TemperatureSensor, name: 'temperature', value: state.temperature },
      ];
    case 'ContactSensor':
      return [
        { namespace: NS.ContactSensor, name: 'detectionState', value: state.detectionState },
        { namespace: NS.TemperatureSensor, name: 'temperature', value: state.temperature },
      ];
  }
}

function toPropertyState(
  reading: PropertyReading,
  timeOfSample: string,
  uncertaintyInMilliseconds: number,
): AlexaPropertyState {
  return {
    namespace: reading.namespace,
    name: reading.name,
    ...(reading.instance ? { instance: reading.instance } : {}),
    value: reading.value,
    timeOfSample,
    uncertaintyInMilliseconds,
  };
}

/** Full ordered property snapshot of a device. */
export function snapshot(device: Device, timeOfSample: Date): AlexaPropertyState[] {
  const sampledAt = timeOfSample.toISOString();
  const health: PropertyReading = { namespace: NS.EndpointHealth, name: 'connectivity', value: CONNECTIVITY };
  return [...readings(device.id, device.state), health].map((r) =>
    toPropertyState(r, sampledAt, SAMPLE_UNCERTAINTY_MS),
  );
}

/**
 * The context property echoed in a control response.  The value is the
 * one just applied, so its uncertainty is zero.
 */
export function changeToProperty(
  namespace: string,
  change: StateChangeDescriptor,
  appliedAt: Date,
): AlexaPropertyState {
  return toPropertyState(
    { namespace, name: change.propertyName, value: change.value, instance: change.instance },
    appliedAt.toISOString(),
    0,
  );
}
