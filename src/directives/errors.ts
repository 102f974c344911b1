/**
 * Error taxonomy for directive handling.
 *
 * Each error carries the HTTP status the transport answers with and the
 * Alexa ErrorResponse type it is reported as.
 */

import type { AlexaErrorType } from '../types/alexa';

export abstract class SmartHomeError extends Error {
  abstract readonly statusCode: 400 | 404;
  abstract readonly errorType: AlexaErrorType;
}

/** The endpoint id is not in the device registry. */
export class UnknownDeviceError extends SmartHomeError {
  readonly statusCode = 404;
  readonly errorType = 'NO_SUCH_ENDPOINT';

  constructor(readonly endpointId: string) {
    super(`Unknown device: ${endpointId}`);
    this.name = 'UnknownDeviceError';
  }
}

/** The namespace / name / instance is not registered for the device's type. */
export class UnsupportedCommandError extends SmartHomeError {
  readonly statusCode = 400;
  readonly errorType = 'INVALID_DIRECTIVE';

  constructor(
    readonly endpointId: string,
    readonly namespace: string,
    readonly directiveName: string,
    readonly instance?: string,
  ) {
    super(
      `Unsupported command ${namespace}.${directiveName}` +
        (instance ? ` (instance ${instance})` : '') +
        ` for device ${endpointId}`,
    );
    this.name = 'UnsupportedCommandError';
  }
}

/** The inbound envelope is not a directive at all. */
export class MalformedDirectiveError extends SmartHomeError {
  readonly statusCode = 400;
  readonly errorType = 'INVALID_DIRECTIVE';

  constructor(message: string) {
    super(message);
    this.name = 'MalformedDirectiveError';
  }
}

/** The payload is present but semantically invalid for the target field. */
export class ValidationError extends SmartHomeError {
  readonly statusCode = 400;

  constructor(
    message: string,
    readonly errorType: 'INVALID_VALUE' | 'VALUE_OUT_OF_RANGE' = 'INVALID_VALUE',
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** Raised when the actuation sink rejects. Logged, never surfaced. */
export class ActuationNotifyError extends Error {
  constructor(
    readonly deviceId: string,
    readonly field: string,
    cause: unknown,
  ) {
    super(
      `Actuation notify failed for ${deviceId}.${field}: ` +
        (cause instanceof Error ? cause.message : String(cause)),
      { cause },
    );
    this.name = 'ActuationNotifyError';
  }
}
