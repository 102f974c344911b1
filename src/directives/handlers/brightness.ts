/**
 * Alexa.BrightnessController handlers for lights.
 */

import { z } from 'zod';
import { PERCENT_RANGE } from '../../types/device';
import { percentSchema } from '../../devices/state-schema';
import { applied, clamp, parsePayload } from './types';
import type { ControlHandler } from './types';

const setBrightnessPayload = z.object({ brightness: percentSchema });

const adjustBrightnessPayload = z.object({
  brightnessDelta: z.number().min(-PERCENT_RANGE.maximumValue).max(PERCENT_RANGE.maximumValue),
});

export const setBrightness: ControlHandler<'Light'> = (state, ctx) => {
  const parsed = parsePayload(setBrightnessPayload, ctx);
  if (!parsed.success) return parsed;

  const { brightness } = parsed.data;
  return applied(
    { ...state, brightness },
    { field: 'brightness', propertyName: 'brightness', value: brightness },
  );
};

/** Relative change; the result is clamped into 0-100. */
export const adjustBrightness: ControlHandler<'Light'> = (state, ctx) => {
  const parsed = parsePayload(adjustBrightnessPayload, ctx);
  if (!parsed.success) return parsed;

  const brightness = clamp(
    state.brightness + parsed.data.brightnessDelta,
    PERCENT_RANGE.minimumValue,
    PERCENT_RANGE.maximumValue,
  );
  return applied(
    { ...state, brightness },
    { field: 'brightness', propertyName: 'brightness', value: brightness },
  );
};
