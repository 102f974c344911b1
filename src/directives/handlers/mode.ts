/**
 * Alexa.ModeController handlers for the coffee maker's two mode
 * instances: BrewStrength and ErrorState.
 *
 * Payload: `{ mode: { value } }`.
 */

import { z } from 'zod';
import { BREW_STRENGTHS, COFFEE_MAKER_ERRORS } from '../../types/device';
import { INSTANCES, instanceId } from '../../capabilities/catalog';
import { applied, parsePayload } from './types';
import type { ControlHandler } from './types';

const brewStrengthPayload = z.object({
  mode: z.object({ value: z.enum(BREW_STRENGTHS) }),
});

const errorStatePayload = z.object({
  mode: z.object({ value: z.enum(COFFEE_MAKER_ERRORS) }),
});

export const setBrewStrength: ControlHandler<'CoffeeMaker'> = (state, ctx) => {
  const parsed = parsePayload(brewStrengthPayload, ctx);
  if (!parsed.success) return parsed;

  const brewStrength = parsed.data.mode.value;
  return applied(
    { ...state, brewStrength },
    {
      field: 'brewStrength',
      propertyName: 'mode',
      value: brewStrength,
      instance: instanceId(INSTANCES.BrewStrength, ctx.endpointId),
    },
  );
};

export const setErrorState: ControlHandler<'CoffeeMaker'> = (state, ctx) => {
  const parsed = parsePayload(errorStatePayload, ctx);
  if (!parsed.success) return parsed;

  const errorState = parsed.data.mode.value;
  return applied(
    { ...state, errorState },
    {
      field: 'errorState',
      propertyName: 'mode',
      value: errorState,
      instance: instanceId(INSTANCES.ErrorState, ctx.endpointId),
    },
  );
};
