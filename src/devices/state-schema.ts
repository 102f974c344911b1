/**
 * zod schemas for every device state variant.
 *
 * The store checks each committed state against these, and seed files are
 * parsed with them, so range and enum invariants hold at all times.
 */

import { z } from 'zod';
import {
  BREW_STRENGTHS,
  COFFEE_MAKER_ERRORS,
  DETECTION_STATES,
  HUE_RANGE,
  PERCENT_RANGE,
  POWER_STATES,
  TEMPERATURE_SCALES,
  THERMOSTAT_MODES,
} from '../types/device';
import type { DeviceState } from '../types/device';

export const percentSchema = z
  .number()
  .min(PERCENT_RANGE.minimumValue)
  .max(PERCENT_RANGE.maximumValue);

export const colorSchema = z.object({
  hue: z.number().min(HUE_RANGE.min).max(HUE_RANGE.max),
  saturation: z.number().min(0).max(1),
  brightness: z.number().min(0).max(1),
});

export const temperatureSchema = z.object({
  value: z.number().finite(),
  scale: z.enum(TEMPERATURE_SCALES),
});

const coffeeMakerStateSchema = z.object({
  type: z.literal('CoffeeMaker'),
  powerState: z.enum(POWER_STATES),
  brewStrength: z.enum(BREW_STRENGTHS),
  waterLevel: percentSchema,
  errorState: z.enum(COFFEE_MAKER_ERRORS),
});

const lightStateSchema = z.object({
  type: z.literal('Light'),
  powerState: z.enum(POWER_STATES),
  brightness: percentSchema,
  color: colorSchema,
});

const thermostatStateSchema = z.object({
  type: z.literal('Thermostat'),
  targetSetpoint: temperatureSchema,
  temperature: temperatureSchema,
  thermostatMode: z.enum(THERMOSTAT_MODES),
});

const contactSensorStateSchema = z.object({
  type: z.literal('ContactSensor'),
  detectionState: z.enum(DETECTION_STATES),
  temperature: temperatureSchema,
});

export const deviceStateSchema = z.discriminatedUnion('type', [
  coffeeMakerStateSchema.strict(),
  lightStateSchema.strict(),
  thermostatStateSchema.strict(),
  contactSensorStateSchema.strict(),
]);

export const deviceSeedSchema = z.object({
  id: z.string().min(1),
  friendlyName: z.string().min(1),
  state: deviceStateSchema,
});

/** Describe why a state breaks its variant's invariants, or null if it holds. */
export function stateViolation(state: DeviceState): string | null {
  const result = deviceStateSchema.safeParse(state);
  if (result.success) return null;
  return result.error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

