/**
 * Startup seed for the device registry: the built-in fleet, or a JSON
 * file of `{ id, friendlyName, state }` records.
 */

import fs from 'fs';
import { z } from 'zod';
import type { Device } from '../types/device';
import { deviceSeedSchema } from './state-schema';

export const DEFAULT_DEVICES: Device[] = [
  {
    id: 'coffee_maker_123',
    friendlyName: 'My Smart Coffee Maker',
    state: {
      type: 'CoffeeMaker',
      powerState: 'OFF',
      brewStrength: 'medium',
      waterLevel: 100,
      errorState: 'none',
    },
  },
  {
    id: 'light_456',
    friendlyName: 'Living Room Light',
    state: {
      type: 'Light',
      powerState: 'OFF',
      brightness: 75,
      color: { hue: 30, saturation: 0.5, brightness: 0.75 },
    },
  },
  {
    id: 'thermostat_789',
    friendlyName: 'Hallway Thermostat',
    state: {
      type: 'Thermostat',
      targetSetpoint: { value: 21, scale: 'CELSIUS' },
      temperature: { value: 19.5, scale: 'CELSIUS' },
      thermostatMode: 'HEAT',
    },
  },
  {
    id: 'contact_sensor_012',
    friendlyName: 'Front Door',
    state: {
      type: 'ContactSensor',
      detectionState: 'NOT_DETECTED',
      temperature: { value: 18, scale: 'CELSIUS' },
    },
  },
];

const seedFileSchema = z.array(deviceSeedSchema);

/** Parse seed records, throwing with every schema issue listed. */
export function parseSeed(raw: unknown, source = 'seed'): Device[] {
  const result = seedFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid device seed in ${source}: ${issues}`);
  }
  return result.data;
}

export function loadSeedFile(filePath: string): Device[] {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  return parseSeed(raw, filePath);
}
