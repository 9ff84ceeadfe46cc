import { InboundEvent } from '../../application/handlers/InboundEventAdapter.js';
import { InboundEventSchema } from '../../schemas/index.js';

export type DecodeResult =
  | { readonly ok: true; readonly event: InboundEvent }
  | { readonly ok: false; readonly reason: string };

const UNKNOWN_EVENT_TYPE = 'unknown';

/**
 * Decode a raw broker body into an inbound event.
 * Bodies must be UTF-8 JSON objects; a missing event_type reads as "unknown".
 */
export function decodeInboundEvent(content: Buffer): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content.toString('utf8'));
  } catch (error) {
    return { ok: false, reason: `Invalid JSON in message body: ${error instanceof Error ? error.message : String(error)}` };
  }

  const result = InboundEventSchema.safeParse(parsed);
  if (!result.success) {
    return {
      ok: false,
      reason: `Unexpected message shape: ${result.error.issues.map(issue => issue.message).join('; ')}`
    };
  }

  return {
    ok: true,
    event: {
      eventType: result.data.event_type ?? UNKNOWN_EVENT_TYPE,
      payload: result.data
    }
  };
}
