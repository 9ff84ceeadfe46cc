import { ASSIGNMENT_DELETED_EVENT } from '../../constants.js';
import { TicketNotFound } from '../../core/errors/DomainErrors.js';
import { AppLogger, Logger } from '../../infrastructure/logging/Logger.js';
import { InboundEventPayload } from '../../schemas/index.js';
import { DeleteTicketUseCase } from '../useCases/DeleteTicketUseCase.js';

/**
 * Event received from another service over the fan-out exchange
 */
export interface InboundEvent {
  readonly eventType: string;
  readonly payload: InboundEventPayload;
}

export type DropReason =
  | 'missing_ticket_id'
  | 'invalid_ticket_id'
  | 'ticket_not_found'
  | 'processing_error';

/**
 * What became of an inbound event. The consumer derives ack/nack from this
 * value alone; `dropped` events are never retried.
 */
export type InboundEventOutcome =
  | { readonly kind: 'processed'; readonly eventType: string }
  | { readonly kind: 'ignored'; readonly eventType: string }
  | { readonly kind: 'dropped'; readonly eventType: string; readonly reason: DropReason; readonly detail: string };

export interface InboundEventHandler {
  handle(event: InboundEvent): Promise<InboundEventOutcome>;
}

type TicketIdParse =
  | { readonly ok: true; readonly ticketId: number }
  | { readonly ok: false; readonly reason: 'missing_ticket_id' | 'invalid_ticket_id' };

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Interpret an external ticket reference. Empty values (absent, null, "", 0)
 * count as missing; anything that is not a positive integer is invalid.
 */
export function parseTicketId(value: unknown): TicketIdParse {
  if (value === undefined || value === null || value === '' || value === 0 || value === false) {
    return { ok: false, reason: 'missing_ticket_id' };
  }

  let candidate: number;
  if (typeof value === 'number') {
    candidate = value;
  } else if (typeof value === 'string' && INTEGER_PATTERN.test(value.trim())) {
    candidate = Number(value.trim());
  } else {
    return { ok: false, reason: 'invalid_ticket_id' };
  }

  if (!Number.isSafeInteger(candidate) || candidate <= 0) {
    return { ok: false, reason: 'invalid_ticket_id' };
  }
  return { ok: true, ticketId: candidate };
}

/**
 * Translates events from other services into ticket use cases.
 * The exchange is a fan-out, so anything without a route is ignored here.
 */
export class InboundEventAdapter implements InboundEventHandler {
  private readonly routes: ReadonlyMap<string, (event: InboundEvent) => Promise<InboundEventOutcome>>;

  constructor(
    private readonly deleteTicket: DeleteTicketUseCase,
    private readonly logger: AppLogger = new Logger().child('Adapter')
  ) {
    this.routes = new Map([
      [ASSIGNMENT_DELETED_EVENT, (event: InboundEvent) => this.handleAssignmentDeleted(event)]
    ]);
  }

  async handle(event: InboundEvent): Promise<InboundEventOutcome> {
    const route = this.routes.get(event.eventType);
    if (!route) {
      this.logger.debug(`Ignoring event ${event.eventType}`);
      return { kind: 'ignored', eventType: event.eventType };
    }
    return route(event);
  }

  /**
   * assignment.deleted: the ticket that backed the assignment goes too
   */
  private async handleAssignmentDeleted(event: InboundEvent): Promise<InboundEventOutcome> {
    const rawTicketId = event.payload.ticket_id;
    const parsed = parseTicketId(rawTicketId);

    if (!parsed.ok) {
      const detail = parsed.reason === 'missing_ticket_id'
        ? `${event.eventType} without ticket_id`
        : `${event.eventType} with invalid ticket_id: ${JSON.stringify(rawTicketId)}`;
      this.logger.warn(`${detail}, dropping`);
      return { kind: 'dropped', eventType: event.eventType, reason: parsed.reason, detail };
    }

    const { ticketId } = parsed;
    try {
      const result = await this.deleteTicket.execute({ ticketId });
      if (!result.published) {
        this.logger.warn(`Ticket ${ticketId} deleted by ${event.eventType}, but the deletion was not announced`);
      } else {
        this.logger.info(`Ticket ${ticketId} deleted by ${event.eventType}`);
      }
      return { kind: 'processed', eventType: event.eventType };
    } catch (error) {
      if (error instanceof TicketNotFound) {
        const detail = `Ticket ${ticketId} referenced by ${event.eventType} does not exist`;
        this.logger.warn(detail);
        return { kind: 'dropped', eventType: event.eventType, reason: 'ticket_not_found', detail };
      }

      const detail = `Failed to delete ticket ${ticketId} for ${event.eventType}: ${error instanceof Error ? error.message : String(error)}`;
      this.logger.error(detail, error);
      return { kind: 'dropped', eventType: event.eventType, reason: 'processing_error', detail };
    }
  }
}
