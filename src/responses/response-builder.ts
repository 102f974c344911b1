/**
 * Builders for the Alexa events the bridge answers with.  Each response
 * gets a fresh messageId.
 */

import { v4 as uuid } from 'uuid';
import type {
  AlexaErrorType,
  AlexaMessage,
  AlexaMessageHeader,
  AlexaPropertyState,
  DiscoveredDevice,
} from '../types/alexa';
import { NS } from '../capabilities/catalog';
import type { Directive } from '../directives/directive';

function header(namespace: string, name: string, correlationToken?: string): AlexaMessageHeader {
  return {
    namespace,
    name,
    messageId: uuid(),
    ...(correlationToken ? { correlationToken } : {}),
    payloadVersion: '3',
  };
}

export function buildDiscoveryResponse(endpoints: DiscoveredDevice[]): AlexaMessage {
  return {
    event: {
      header: header(NS.Discovery, 'Discover.Response'),
      payload: { endpoints },
    },
  };
}

/**
 * Control response: the request's namespace, `<Name>Response`, and the
 * changed property in the context block.
 */
export function buildDirectiveResponse(
  directive: Directive,
  changed: AlexaPropertyState,
): AlexaMessage {
  return {
    event: {
      header: header(directive.namespace, `${directive.name}Response`, directive.correlationToken),
      endpoint: { endpointId: directive.endpointId },
      payload: {},
    },
    context: { properties: [changed] },
  };
}

export function buildStateReport(
  directive: Pick<Directive, 'endpointId' | 'correlationToken'>,
  properties: AlexaPropertyState[],
): AlexaMessage {
  return {
    event: {
      header: header(NS.Alexa, 'StateReport', directive.correlationToken),
      endpoint: { endpointId: directive.endpointId },
      payload: {},
    },
    context: { properties },
  };
}

export function buildErrorResponse(
  type: AlexaErrorType,
  message: string,
  directive?: Pick<Directive, 'endpointId' | 'correlationToken'>,
): AlexaMessage {
  return {
    event: {
      header: header(NS.Alexa, 'ErrorResponse', directive?.correlationToken),
      ...(directive ? { endpoint: { endpointId: directive.endpointId } } : {}),
      payload: { type, message },
    },
  };
}
