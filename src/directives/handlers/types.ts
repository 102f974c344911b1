/**
 * Handler contract shared by every command handler.
 *
 * A handler is pure: it reads the current state and the directive, and
 * returns either the replacement state plus a description of the single
 * property it changed, or a ValidationError.  It never touches the store.
 */

import type { z } from 'zod';
import type { DeviceState, DeviceType, StateChangeDescriptor, StateOf } from '../../types/device';
import { ValidationError } from '../errors';

export interface DirectiveContext {
  endpointId: string;
  namespace: string;
  name: string;
  instance?: string;
  payload: unknown;
}

export type HandlerFailure = { success: false; error: ValidationError };

export type HandlerResult<S extends DeviceState> =
  | { success: true; state: S; change: StateChangeDescriptor }
  | HandlerFailure;

export type ControlHandler<T extends DeviceType> = (
  state: StateOf<T>,
  ctx: DirectiveContext,
) => HandlerResult<StateOf<T>>;

export function applied<S extends DeviceState>(
  state: S,
  change: StateChangeDescriptor,
): HandlerResult<S> {
  return { success: true, state, change };
}

export function rejected(error: ValidationError): HandlerFailure {
  return { success: false, error };
}

/**
 * Validate a directive payload.  Range violations map to
 * VALUE_OUT_OF_RANGE; wrong types, missing keys and unknown enum values to
 * INVALID_VALUE.
 */
export function parsePayload<T>(
  schema: z.ZodType<T>,
  ctx: DirectiveContext,
): { success: true; data: T } | HandlerFailure {
  const result = schema.safeParse(ctx.payload);
  if (result.success) return { success: true, data: result.data };

  const [first] = result.error.issues;
  const outOfRange = first.code === 'too_small' || first.code === 'too_big';
  const detail = result.error.issues
    .map((issue) => `${issue.path.join('.') || 'payload'}: ${issue.message}`)
    .join('; ');

  return rejected(
    new ValidationError(
      `Invalid ${ctx.namespace}.${ctx.name} payload for ${ctx.endpointId}: ${detail}`,
      outOfRange ? 'VALUE_OUT_OF_RANGE' : 'INVALID_VALUE',
    ),
  );
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
