/**
 * Lookup table from (device type, namespace, name) to behavior, built
 * once at startup.  Adding a command means adding one registration here.
 */

import type { DeviceState, DeviceType } from '../types/device';
import { DEVICE_TYPES, isStateOf } from '../types/device';
import { INSTANCES, NS, interfacesFor } from '../capabilities/catalog';
import type { InstanceName } from '../capabilities/catalog';
import type { ControlHandler, DirectiveContext, HandlerResult } from './handlers/types';
import { turnOff, turnOn } from './handlers/power';
import { adjustBrightness, setBrightness } from './handlers/brightness';
import { setColor } from './handlers/color';
import { setBrewStrength, setErrorState } from './handlers/mode';
import { adjustWaterLevel, setWaterLevel } from './handlers/range';
import {
  adjustTargetTemperature,
  setTargetTemperature,
  setThermostatMode,
} from './handlers/thermostat';

export const REPORT_STATE = 'ReportState';

/** A control handler with its device type erased behind a runtime check. */
export interface BoundHandler {
  deviceType: DeviceType;
  apply(state: DeviceState, ctx: DirectiveContext): HandlerResult<DeviceState>;
}

export type HandlerEntry =
  | { kind: 'control'; handler: BoundHandler }
  | { kind: 'instanced'; instances: Map<InstanceName, BoundHandler> }
  | { kind: 'report' };

export type HandlerTable = ReadonlyMap<string, HandlerEntry>;

export function tableKey(type: DeviceType, namespace: string, name: string): string {
  return `${type}|${namespace}|${name}`;
}

export function bind<T extends DeviceType>(type: T, handler: ControlHandler<T>): BoundHandler {
  return {
    deviceType: type,
    apply(state, ctx) {
      const actual = state.type;
      if (!isStateOf(type, state)) {
        throw new Error(`${type} handler invoked on ${actual} state`);
      }
      return handler(state, ctx);
    },
  };
}

class HandlerTableBuilder {
  private entries = new Map<string, HandlerEntry>();

  control<T extends DeviceType>(
    type: T,
    namespace: string,
    name: string,
    handler: ControlHandler<T>,
  ): this {
    this.add(type, namespace, name, { kind: 'control', handler: bind(type, handler) });
    return this;
  }

  instanced<T extends DeviceType>(
    type: T,
    namespace: string,
    name: string,
    instances: Partial<Record<InstanceName, ControlHandler<T>>>,
  ): this {
    const bound = new Map<InstanceName, BoundHandler>();
    for (const instance of Object.values(INSTANCES)) {
      const handler = instances[instance];
      if (handler) bound.set(instance, bind(type, handler));
    }
    this.add(type, namespace, name, { kind: 'instanced', instances: bound });
    return this;
  }

  report(type: DeviceType, namespace: string): this {
    this.add(type, namespace, REPORT_STATE, { kind: 'report' });
    return this;
  }

  build(): HandlerTable {
    return new Map(this.entries);
  }

  private add(type: DeviceType, namespace: string, name: string, entry: HandlerEntry): void {
    const key = tableKey(type, namespace, name);
    if (this.entries.has(key)) {
      throw new Error(`Duplicate handler registration: ${key}`);
    }
    this.entries.set(key, entry);
  }
}

export function buildHandlerTable(): HandlerTable {
  const builder = new HandlerTableBuilder()
    // Coffee maker
    .control('CoffeeMaker', NS.Power, 'TurnOn', turnOn)
    .control('CoffeeMaker', NS.Power, 'TurnOff', turnOff)
    .instanced('CoffeeMaker', NS.Mode, 'SetMode', {
      BrewStrength: setBrewStrength,
      ErrorState: setErrorState,
    })
    .instanced('CoffeeMaker', NS.Range, 'SetRangeValue', { WaterLevel: setWaterLevel })
    .instanced('CoffeeMaker', NS.Range, 'AdjustRangeValue', { WaterLevel: adjustWaterLevel })
    // Light
    .control('Light', NS.Power, 'TurnOn', turnOn)
    .control('Light', NS.Power, 'TurnOff', turnOff)
    .control('Light', NS.Brightness, 'SetBrightness', setBrightness)
    .control('Light', NS.Brightness, 'AdjustBrightness', adjustBrightness)
    .control('Light', NS.Color, 'SetColor', setColor)
    // Thermostat
    .control('Thermostat', NS.Thermostat, 'SetTargetTemperature', setTargetTemperature)
    .control('Thermostat', NS.Thermostat, 'AdjustTargetTemperature', adjustTargetTemperature)
    .control('Thermostat', NS.Thermostat, 'SetThermostatMode', setThermostatMode);
  // ContactSensor: reports only.

  for (const type of DEVICE_TYPES) {
    for (const namespace of interfacesFor(type)) {
      builder.report(type, namespace);
    }
    builder.report(type, NS.StateReport);
  }

  return builder.build();
}
