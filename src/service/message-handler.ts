/**
 * Envelope-level entry point: takes a raw Alexa message, answers
 * discovery itself and hands everything else to the directive engine.
 */

import { z } from 'zod';
import { NS } from '../capabilities/catalog';
import { parseDirective } from '../directives/directive';
import { MalformedDirectiveError } from '../directives/errors';
import { buildErrorResponse } from '../responses/response-builder';
import type { DirectiveOutcome, SmartHomeService } from './smart-home-service';

export type MessageHandler = (message: unknown) => Promise<DirectiveOutcome>;

const headerSchema = z.object({
  directive: z.object({
    header: z.object({ namespace: z.string(), name: z.string() }),
  }),
});

export function createMessageHandler(service: SmartHomeService): MessageHandler {
  const journal = service.getEventLogger();

  return async function handleMessage(message: unknown): Promise<DirectiveOutcome> {
    const envelope = headerSchema.safeParse(message);

    if (envelope.success) {
      const { namespace, name } = envelope.data.directive.header;
      if (namespace === NS.Discovery) {
        await journal.logDirective({ namespace, name });
        const outcome: DirectiveOutcome =
          name === 'Discover'
            ? { statusCode: 200, message: service.discover() }
            : {
                statusCode: 400,
                message: buildErrorResponse('INVALID_DIRECTIVE', `Unsupported discovery directive: ${name}`),
              };
        await journal.logOutcome({ namespace, name }, outcome.statusCode, outcome.message);
        return outcome;
      }
    }

    try {
      return await service.handleDirective(parseDirective(message));
    } catch (err) {
      if (err instanceof MalformedDirectiveError) {
        return {
          statusCode: err.statusCode,
          message: buildErrorResponse(err.errorType, err.message),
        };
      }
      throw err;
    }
  };
}
