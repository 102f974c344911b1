/**
 * Alexa.RangeController handlers for the coffee maker's WaterLevel
 * instance (percent, 0-100).
 */

import { z } from 'zod';
import { PERCENT_RANGE } from '../../types/device';
import { percentSchema } from '../../devices/state-schema';
import { INSTANCES, instanceId } from '../../capabilities/catalog';
import { applied, clamp, parsePayload } from './types';
import type { ControlHandler } from './types';

const setRangePayload = z.object({ rangeValue: percentSchema });

const adjustRangePayload = z.object({
  rangeValueDelta: z.number().min(-PERCENT_RANGE.maximumValue).max(PERCENT_RANGE.maximumValue),
});

export const setWaterLevel: ControlHandler<'CoffeeMaker'> = (state, ctx) => {
  const parsed = parsePayload(setRangePayload, ctx);
  if (!parsed.success) return parsed;

  const waterLevel = parsed.data.rangeValue;
  return applied(
    { ...state, waterLevel },
    {
      field: 'waterLevel',
      propertyName: 'rangeValue',
      value: waterLevel,
      instance: instanceId(INSTANCES.WaterLevel, ctx.endpointId),
    },
  );
};

export const adjustWaterLevel: ControlHandler<'CoffeeMaker'> = (state, ctx) => {
  const parsed = parsePayload(adjustRangePayload, ctx);
  if (!parsed.success) return parsed;

  const waterLevel = clamp(
    state.waterLevel + parsed.data.rangeValueDelta,
    PERCENT_RANGE.minimumValue,
    PERCENT_RANGE.maximumValue,
  );
  return applied(
    { ...state, waterLevel },
    {
      field: 'waterLevel',
      propertyName: 'rangeValue',
      value: waterLevel,
      instance: instanceId(INSTANCES.WaterLevel, ctx.endpointId),
    },
  );
};
