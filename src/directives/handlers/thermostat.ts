/**
 * Alexa.ThermostatController handlers.
 */

import { z } from 'zod';
import { THERMOSTAT_MODES } from '../../types/device';
import type { TemperatureScale } from '../../types/alexa';
import { temperatureSchema } from '../../devices/state-schema';
import { ValidationError } from '../errors';
import { applied, parsePayload, rejected } from './types';
import type { ControlHandler } from './types';

const setTargetPayload = z.object({ targetSetpoint: temperatureSchema });

const adjustTargetPayload = z.object({ targetSetpointDelta: temperatureSchema });

const setModePayload = z.object({
  thermostatMode: z.object({ value: z.enum(THERMOSTAT_MODES) }),
});

/** Convert a temperature difference (not an absolute reading) between scales. */
export function convertDelta(delta: number, from: TemperatureScale, to: TemperatureScale): number {
  const fromF = from === 'FAHRENHEIT';
  const toF = to === 'FAHRENHEIT';
  if (fromF === toF) return delta;
  return fromF ? (delta * 5) / 9 : (delta * 9) / 5;
}

const roundTenth = (n: number): number => Math.round(n * 10) / 10;

export const setTargetTemperature: ControlHandler<'Thermostat'> = (state, ctx) => {
  const parsed = parsePayload(setTargetPayload, ctx);
  if (!parsed.success) return parsed;

  const targetSetpoint = { ...parsed.data.targetSetpoint };
  return applied(
    { ...state, targetSetpoint },
    { field: 'targetSetpoint', propertyName: 'targetSetpoint', value: targetSetpoint },
  );
};

/** Shift the setpoint, keeping the scale it is currently expressed in. */
export const adjustTargetTemperature: ControlHandler<'Thermostat'> = (state, ctx) => {
  const parsed = parsePayload(adjustTargetPayload, ctx);
  if (!parsed.success) return parsed;

  const { value, scale } = parsed.data.targetSetpointDelta;
  const current = state.targetSetpoint;
  const adjusted = roundTenth(current.value + convertDelta(value, scale, current.scale));
  if (!Number.isFinite(adjusted)) {
    return rejected(
      new ValidationError(
        `Adjusted setpoint for ${ctx.endpointId} is not a finite temperature`,
        'VALUE_OUT_OF_RANGE',
      ),
    );
  }
  const targetSetpoint = { value: adjusted, scale: current.scale };
  return applied(
    { ...state, targetSetpoint },
    { field: 'targetSetpoint', propertyName: 'targetSetpoint', value: targetSetpoint },
  );
};

export const setThermostatMode: ControlHandler<'Thermostat'> = (state, ctx) => {
  const parsed = parsePayload(setModePayload, ctx);
  if (!parsed.success) return parsed;

  const thermostatMode = parsed.data.thermostatMode.value;
  return applied(
    { ...state, thermostatMode },
    { field: 'thermostatMode', propertyName: 'thermostatMode', value: thermostatMode },
  );
};
