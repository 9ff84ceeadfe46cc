import { TicketEvent } from '../events/TicketEvents.js';

/**
 * Outbound messaging boundary.
 * A rejected promise means the event may not have reached the broker.
 */
export interface IEventPublisher {
  publish(event: TicketEvent): Promise<void>;
}
