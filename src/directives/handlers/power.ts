/**
 * Alexa.PowerController: TurnOn / TurnOff for any device with a
 * powerState field.
 */

import type { PowerState } from '../../types/alexa';
import type { CoffeeMakerState, LightState } from '../../types/device';
import { applied } from './types';
import type { HandlerResult } from './types';

type PoweredState = CoffeeMakerState | LightState;

function setPower(powerState: PowerState) {
  return <S extends PoweredState>(state: S): HandlerResult<S> =>
    applied<S>(
      { ...state, powerState },
      { field: 'powerState', propertyName: 'powerState', value: powerState },
    );
}

export const turnOn = setPower('ON');
export const turnOff = setPower('OFF');
