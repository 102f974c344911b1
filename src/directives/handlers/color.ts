/**
 * Alexa.ColorController SetColor.  All three of hue, saturation and
 * brightness must be present.
 */

import { z } from 'zod';
import { colorSchema } from '../../devices/state-schema';
import { applied, parsePayload } from './types';
import type { ControlHandler } from './types';

const setColorPayload = z.object({ color: colorSchema });

export const setColor: ControlHandler<'Light'> = (state, ctx) => {
  const parsed = parsePayload(setColorPayload, ctx);
  if (!parsed.success) return parsed;

  const { hue, saturation, brightness } = parsed.data.color;
  const color = { hue, saturation, brightness };
  return applied({ ...state, color }, { field: 'color', propertyName: 'color', value: color });
};
