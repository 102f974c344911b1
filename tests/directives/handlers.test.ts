import { adjustBrightness, setBrightness } from '../../src/directives/handlers/brightness';
import { setColor } from '../../src/directives/handlers/color';
import { setBrewStrength, setErrorState } from '../../src/directives/handlers/mode';
import { turnOff, turnOn } from '../../src/directives/handlers/power';
import { adjustWaterLevel, setWaterLevel } from '../../src/directives/handlers/range';
import {
  adjustTargetTemperature,
  convertDelta,
  setTargetTemperature,
  setThermostatMode,
} from '../../src/directives/handlers/thermostat';
import type { DirectiveContext, HandlerResult } from '../../src/directives';
import type {
  CoffeeMakerState,
  DeviceState,
  LightState,
  ThermostatState,
} from '../../src/types/device';

const light: LightState = {
  type: 'Light',
  powerState: 'OFF',
  brightness: 75,
  color: { hue: 30, saturation: 0.5, brightness: 0.75 },
};

const coffee: CoffeeMakerState = {
  type: 'CoffeeMaker',
  powerState: 'OFF',
  brewStrength: 'medium',
  waterLevel: 100,
  errorState: 'none',
};

const thermostat: ThermostatState = {
  type: 'Thermostat',
  targetSetpoint: { value: 21, scale: 'CELSIUS' },
  temperature: { value: 19.5, scale: 'CELSIUS' },
  thermostatMode: 'HEAT',
};

function ctx(
  endpointId: string,
  namespace: string,
  name: string,
  payload: unknown,
  instance?: string,
): DirectiveContext {
  return { endpointId, namespace, name, payload, instance };
}

function expectApplied<S extends DeviceState>(result: HandlerResult<S>) {
  if (!result.success) throw new Error(`expected success, got ${result.error.message}`);
  return result;
}

function expectRejected<S extends DeviceState>(result: HandlerResult<S>) {
  if (result.success) throw new Error('expected a validation failure');
  return result.error;
}

describe('command handlers', () => {
  describe('power', () => {
    it('should turn a device on and describe the change', () => {
      const result = expectApplied(turnOn(light));
      expect(result.state).toEqual({ ...light, powerState: 'ON' });
      expect(result.change).toEqual({ field: 'powerState', propertyName: 'powerState', value: 'ON' });
    });

    it('should turn a device off', () => {
      const running: CoffeeMakerState = { ...coffee, powerState: 'ON' };
      const result = expectApplied(turnOff(running));
      expect(result.state.powerState).toBe('OFF');
      expect(result.state.brewStrength).toBe('medium');
    });

    it('should be idempotent', () => {
      const once = expectApplied(turnOn(light));
      const twice = expectApplied(turnOn(once.state));
      expect(twice.state).toEqual(once.state);
    });

    it('should not mutate the input state', () => {
      turnOn(light);
      expect(light.powerState).toBe('OFF');
    });
  });

  describe('brightness', () => {
    const set = (payload: unknown) =>
      setBrightness(light, ctx('light_456', 'Alexa.BrightnessController', 'SetBrightness', payload));

    it.each([0, 100])('should accept the boundary value %d', (brightness) => {
      const result = expectApplied(set({ brightness }));
      expect(result.state.brightness).toBe(brightness);
      expect(result.change).toEqual({ field: 'brightness', propertyName: 'brightness', value: brightness });
    });

    it.each([-1, 101])('should reject %d as out of range', (brightness) => {
      const error = expectRejected(set({ brightness }));
      expect(error.errorType).toBe('VALUE_OUT_OF_RANGE');
      expect(error.statusCode).toBe(400);
    });

    it('should name the directive and endpoint in the message', () => {
      const error = expectRejected(set({ brightness: 101 }));
      expect(error.message).toBe(
        'Invalid Alexa.BrightnessController.SetBrightness payload for light_456: ' +
          'brightness: Number must be less than or equal to 100',
      );
    });

    it('should reject a string as an invalid value', () => {
      expect(expectRejected(set({ brightness: '50' })).errorType).toBe('INVALID_VALUE');
    });

    it('should reject a missing field as an invalid value', () => {
      expect(expectRejected(set({})).errorType).toBe('INVALID_VALUE');
    });

    it('should clamp relative adjustments', () => {
      const adjust = (brightnessDelta: number) =>
        expectApplied(
          adjustBrightness(
            light,
            ctx('light_456', 'Alexa.BrightnessController', 'AdjustBrightness', { brightnessDelta }),
          ),
        ).state.brightness;

      expect(adjust(-25)).toBe(50);
      expect(adjust(50)).toBe(100);
      expect(adjust(-100)).toBe(0);
    });
  });

  describe('color', () => {
    const set = (payload: unknown) =>
      setColor(light, ctx('light_456', 'Alexa.ColorController', 'SetColor', payload));

    it('should replace the whole color', () => {
      const color = { hue: 240, saturation: 1, brightness: 0.5 };
      const result = expectApplied(set({ color }));
      expect(result.state.color).toEqual(color);
      expect(result.change).toEqual({ field: 'color', propertyName: 'color', value: color });
    });

    it('should require every component', () => {
      expect(expectRejected(set({ color: { hue: 240, saturation: 1 } })).errorType).toBe('INVALID_VALUE');
    });

    it('should reject a hue past 360', () => {
      expect(
        expectRejected(set({ color: { hue: 361, saturation: 1, brightness: 1 } })).errorType,
      ).toBe('VALUE_OUT_OF_RANGE');
    });
  });

  describe('mode', () => {
    it('should set the brew strength with its instance', () => {
      const instance = 'BrewStrength.coffee_maker_123';
      const result = expectApplied(
        setBrewStrength(
          coffee,
          ctx('coffee_maker_123', 'Alexa.ModeController', 'SetMode', { mode: { value: 'strong' } }, instance),
        ),
      );
      expect(result.state.brewStrength).toBe('strong');
      expect(result.change).toEqual({
        field: 'brewStrength',
        propertyName: 'mode',
        value: 'strong',
        instance,
      });
    });

    it('should reject an unknown mode value', () => {
      const error = expectRejected(
        setBrewStrength(
          coffee,
          ctx('coffee_maker_123', 'Alexa.ModeController', 'SetMode', { mode: { value: 'espresso' } }),
        ),
      );
      expect(error.errorType).toBe('INVALID_VALUE');
    });

    it('should set the error state', () => {
      const result = expectApplied(
        setErrorState(
          coffee,
          ctx('coffee_maker_123', 'Alexa.ModeController', 'SetMode', { mode: { value: 'jammed' } }),
        ),
      );
      expect(result.state.errorState).toBe('jammed');
      expect(result.change.instance).toBe('ErrorState.coffee_maker_123');
    });
  });

  describe('range', () => {
    it('should set the water level', () => {
      const result = expectApplied(
        setWaterLevel(coffee, ctx('coffee_maker_123', 'Alexa.RangeController', 'SetRangeValue', { rangeValue: 40 })),
      );
      expect(result.state.waterLevel).toBe(40);
      expect(result.change).toEqual({
        field: 'waterLevel',
        propertyName: 'rangeValue',
        value: 40,
        instance: 'WaterLevel.coffee_maker_123',
      });
    });

    it.each([0, 100])('should accept the boundary water level %d', (rangeValue) => {
      const result = expectApplied(
        setWaterLevel(coffee, ctx('coffee_maker_123', 'Alexa.RangeController', 'SetRangeValue', { rangeValue })),
      );
      expect(result.state.waterLevel).toBe(rangeValue);
    });

    it.each([-1, 101])('should reject water level %d as out of range', (rangeValue) => {
      const error = expectRejected(
        setWaterLevel(coffee, ctx('coffee_maker_123', 'Alexa.RangeController', 'SetRangeValue', { rangeValue })),
      );
      expect(error.errorType).toBe('VALUE_OUT_OF_RANGE');
    });

    it('should reject a water level past 100', () => {
      const error = expectRejected(
        setWaterLevel(coffee, ctx('coffee_maker_123', 'Alexa.RangeController', 'SetRangeValue', { rangeValue: 120 })),
      );
      expect(error.errorType).toBe('VALUE_OUT_OF_RANGE');
    });

    it('should clamp water level adjustments', () => {
      const adjust = (rangeValueDelta: number) =>
        expectApplied(
          adjustWaterLevel(
            coffee,
            ctx('coffee_maker_123', 'Alexa.RangeController', 'AdjustRangeValue', { rangeValueDelta }),
          ),
        ).state.waterLevel;

      expect(adjust(-30)).toBe(70);
      expect(adjust(10)).toBe(100);
    });
  });

  describe('thermostat', () => {
    const tctx = (name: string, payload: unknown) =>
      ctx('thermostat_789', 'Alexa.ThermostatController', name, payload);

    it('should set the target setpoint as given', () => {
      const targetSetpoint = { value: 72, scale: 'FAHRENHEIT' };
      const result = expectApplied(setTargetTemperature(thermostat, tctx('SetTargetTemperature', { targetSetpoint })));
      expect(result.state.targetSetpoint).toEqual(targetSetpoint);
      expect(result.change).toEqual({
        field: 'targetSetpoint',
        propertyName: 'targetSetpoint',
        value: targetSetpoint,
      });
    });

    it('should reject an unknown scale', () => {
      const error = expectRejected(
        setTargetTemperature(thermostat, tctx('SetTargetTemperature', { targetSetpoint: { value: 20, scale: 'RANKINE' } })),
      );
      expect(error.errorType).toBe('INVALID_VALUE');
    });

    it('should adjust in the current scale', () => {
      const adjust = (value: number, scale: string, state: ThermostatState = thermostat) =>
        expectApplied(
          adjustTargetTemperature(state, tctx('AdjustTargetTemperature', { targetSetpointDelta: { value, scale } })),
        ).state.targetSetpoint;

      expect(adjust(1, 'CELSIUS')).toEqual({ value: 22, scale: 'CELSIUS' });
      expect(adjust(9, 'FAHRENHEIT')).toEqual({ value: 26, scale: 'CELSIUS' });

      const fahrenheit: ThermostatState = { ...thermostat, targetSetpoint: { value: 70, scale: 'FAHRENHEIT' } };
      expect(adjust(2, 'CELSIUS', fahrenheit)).toEqual({ value: 73.6, scale: 'FAHRENHEIT' });
    });

    it('should reject an adjustment that leaves no finite setpoint', () => {
      const error = expectRejected(
        adjustTargetTemperature(
          thermostat,
          tctx('AdjustTargetTemperature', { targetSetpointDelta: { value: 1e308, scale: 'CELSIUS' } }),
        ),
      );
      expect(error.errorType).toBe('VALUE_OUT_OF_RANGE');
      expect(error.message).toBe('Adjusted setpoint for thermostat_789 is not a finite temperature');
    });

    it('should set the thermostat mode', () => {
      const result = expectApplied(
        setThermostatMode(thermostat, tctx('SetThermostatMode', { thermostatMode: { value: 'COOL' } })),
      );
      expect(result.state.thermostatMode).toBe('COOL');
      expect(result.change).toEqual({ field: 'thermostatMode', propertyName: 'thermostatMode', value: 'COOL' });
    });

    it('should reject an unsupported thermostat mode', () => {
      const error = expectRejected(
        setThermostatMode(thermostat, tctx('SetThermostatMode', { thermostatMode: { value: 'ECO' } })),
      );
      expect(error.errorType).toBe('INVALID_VALUE');
    });
  });

  describe('idempotence', () => {
    it('should reach the same state when an absolute setter is applied twice', () => {
      const brew = ctx('coffee_maker_123', 'Alexa.ModeController', 'SetMode', { mode: { value: 'light' } });
      const once = expectApplied(setBrewStrength(coffee, brew)).state;
      expect(expectApplied(setBrewStrength(once, brew)).state).toEqual(once);

      const dim = ctx('light_456', 'Alexa.BrightnessController', 'SetBrightness', { brightness: 20 });
      const dimmed = expectApplied(setBrightness(light, dim)).state;
      expect(expectApplied(setBrightness(dimmed, dim)).state).toEqual(dimmed);

      const fill = ctx('coffee_maker_123', 'Alexa.RangeController', 'SetRangeValue', { rangeValue: 55 });
      const filled = expectApplied(setWaterLevel(coffee, fill)).state;
      expect(expectApplied(setWaterLevel(filled, fill)).state).toEqual(filled);

      const target = ctx('thermostat_789', 'Alexa.ThermostatController', 'SetTargetTemperature', {
        targetSetpoint: { value: 23.5, scale: 'CELSIUS' },
      });
      const warmed = expectApplied(setTargetTemperature(thermostat, target)).state;
      expect(expectApplied(setTargetTemperature(warmed, target)).state).toEqual(warmed);
    });
  });

  describe('convertDelta', () => {
    it('should scale between Fahrenheit and Celsius-sized degrees', () => {
      expect(convertDelta(9, 'FAHRENHEIT', 'CELSIUS')).toBe(5);
      expect(convertDelta(5, 'CELSIUS', 'FAHRENHEIT')).toBe(9);
      expect(convertDelta(3, 'CELSIUS', 'KELVIN')).toBe(3);
    });
  });
});
