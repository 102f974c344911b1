/**
 * The parsed, transport-independent form of an inbound control directive.
 */

import { z } from 'zod';
import { MalformedDirectiveError } from './errors';

export interface Directive {
  namespace: string;
  name: string;
  instance?: string;
  correlationToken?: string;
  endpointId: string;
  payload: Record<string, unknown>;
}

const envelopeSchema = z.object({
  directive: z.object({
    header: z.object({
      namespace: z.string().min(1),
      name: z.string().min(1),
      instance: z.string().optional(),
      correlationToken: z.string().optional(),
    }),
    endpoint: z.object({ endpointId: z.string().min(1) }),
    payload: z.record(z.unknown()).default({}),
  }),
});

/** Extract a Directive from an `{ directive: { header, endpoint, payload } }` envelope. */
export function parseDirective(message: unknown): Directive {
  const result = envelopeSchema.safeParse(message);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new MalformedDirectiveError(`Malformed directive: ${detail}`);
  }

  const { header, endpoint, payload } = result.data.directive;
  return {
    namespace: header.namespace,
    name: header.name,
    instance: header.instance,
    correlationToken: header.correlationToken,
    endpointId: endpoint.endpointId,
    payload,
  };
}
