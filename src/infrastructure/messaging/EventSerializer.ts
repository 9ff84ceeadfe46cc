import { TicketEvent, TicketEventType } from '../../core/events/TicketEvents.js';

export type WireEvent = Readonly<Record<string, string | number>>;

/**
 * Outbound wire format: flat snake_case JSON object
 */
export function serializeEvent(event: TicketEvent): WireEvent {
  const base = {
    event_type: event.eventType,
    ticket_id: event.ticketId,
    occurred_at: event.occurredAt.toISOString()
  };

  switch (event.eventType) {
    case TicketEventType.CREATED:
      return { ...base, title: event.title, description: event.description, status: event.status };
    case TicketEventType.STATUS_CHANGED:
      return { ...base, old_status: event.oldStatus, new_status: event.newStatus };
    case TicketEventType.PRIORITY_CHANGED:
      return {
        ...base,
        old_priority: event.oldPriority,
        new_priority: event.newPriority,
        justification: event.justification
      };
    case TicketEventType.RESPONSE_ADDED:
      return { ...base, response_id: event.responseId, text: event.text, admin_id: event.adminId };
    case TicketEventType.DELETED:
      return base;
    default:
      return assertNever(event);
  }
}

function assertNever(event: never): never {
  throw new Error(`Unhandled ticket event: ${JSON.stringify(event)}`);
}
