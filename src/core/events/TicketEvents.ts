import {
  AdminResponse,
  PriorityChange,
  StatusChange,
  TicketPriority,
  TicketStatus
} from '../entities/Ticket.js';

/**
 * Domain events published after a ticket change has been persisted
 */

export enum TicketEventType {
  CREATED = 'ticket.created',
  STATUS_CHANGED = 'ticket.status_changed',
  PRIORITY_CHANGED = 'ticket.priority_changed',
  RESPONSE_ADDED = 'ticket.response_added',
  DELETED = 'ticket.deleted'
}

interface TicketEventBase {
  readonly ticketId: number;
  readonly occurredAt: Date;
}

export interface TicketCreated extends TicketEventBase {
  readonly eventType: TicketEventType.CREATED;
  readonly title: string;
  readonly description: string;
  readonly status: TicketStatus;
}

export interface TicketStatusChanged extends TicketEventBase {
  readonly eventType: TicketEventType.STATUS_CHANGED;
  readonly oldStatus: TicketStatus;
  readonly newStatus: TicketStatus;
}

export interface TicketPriorityChanged extends TicketEventBase {
  readonly eventType: TicketEventType.PRIORITY_CHANGED;
  readonly oldPriority: TicketPriority;
  readonly newPriority: TicketPriority;
  readonly justification: string;
}

export interface TicketResponseAdded extends TicketEventBase {
  readonly eventType: TicketEventType.RESPONSE_ADDED;
  readonly responseId: number;
  readonly text: string;
  readonly adminId: string;
}

export interface TicketDeleted extends TicketEventBase {
  readonly eventType: TicketEventType.DELETED;
}

export type TicketEvent =
  | TicketCreated
  | TicketStatusChanged
  | TicketPriorityChanged
  | TicketResponseAdded
  | TicketDeleted;

export function ticketCreated(
  ticketId: number,
  fields: { title: string; description: string; status: TicketStatus },
  occurredAt: Date = new Date()
): TicketCreated {
  return { eventType: TicketEventType.CREATED, ticketId, occurredAt, ...fields };
}

export function ticketStatusChanged(
  ticketId: number,
  change: StatusChange,
  occurredAt: Date = new Date()
): TicketStatusChanged {
  return {
    eventType: TicketEventType.STATUS_CHANGED,
    ticketId,
    occurredAt,
    oldStatus: change.oldStatus,
    newStatus: change.newStatus
  };
}

export function ticketPriorityChanged(
  ticketId: number,
  change: PriorityChange,
  occurredAt: Date = new Date()
): TicketPriorityChanged {
  return {
    eventType: TicketEventType.PRIORITY_CHANGED,
    ticketId,
    occurredAt,
    oldPriority: change.oldPriority,
    newPriority: change.newPriority,
    justification: change.justification
  };
}

export function ticketResponseAdded(
  ticketId: number,
  response: AdminResponse & { readonly id: number },
  occurredAt: Date = new Date()
): TicketResponseAdded {
  return {
    eventType: TicketEventType.RESPONSE_ADDED,
    ticketId,
    occurredAt,
    responseId: response.id,
    text: response.text,
    adminId: response.adminId
  };
}

export function ticketDeleted(ticketId: number, occurredAt: Date = new Date()): TicketDeleted {
  return { eventType: TicketEventType.DELETED, ticketId, occurredAt };
}
