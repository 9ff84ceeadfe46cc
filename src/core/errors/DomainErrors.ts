/**
 * Domain error taxonomy.
 * Carries a stable code and category so callers can branch on
 * structure instead of matching messages.
 */

export type DomainErrorCategory = 'validation' | 'state' | 'not_found';

export enum DomainErrorCode {
  INVALID_TICKET_DATA = 'INVALID_TICKET_DATA',
  UNKNOWN_TICKET_STATUS = 'UNKNOWN_TICKET_STATUS',
  TICKET_ALREADY_CLOSED = 'TICKET_ALREADY_CLOSED',
  INVALID_STATE_TRANSITION = 'INVALID_STATE_TRANSITION',
  INVALID_PRIORITY_TRANSITION = 'INVALID_PRIORITY_TRANSITION',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  TICKET_NOT_FOUND = 'TICKET_NOT_FOUND'
}

export abstract class DomainError extends Error {
  public abstract readonly code: DomainErrorCode;
  public abstract readonly category: DomainErrorCategory;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Caller input is malformed (blank title, over-long response, ...). */
export class InvalidTicketData extends DomainError {
  public readonly code = DomainErrorCode.INVALID_TICKET_DATA;
  public readonly category = 'validation';
}

export class UnknownTicketStatus extends DomainError {
  public readonly code = DomainErrorCode.UNKNOWN_TICKET_STATUS;
  public readonly category = 'validation';

  constructor(public readonly requestedStatus: string) {
    super(`Unknown ticket status: ${requestedStatus}`);
  }
}

export class TicketAlreadyClosed extends DomainError {
  public readonly code = DomainErrorCode.TICKET_ALREADY_CLOSED;
  public readonly category = 'state';

  constructor(public readonly ticketId: number | null) {
    super(`Ticket ${ticketId ?? '(unsaved)'} is closed and cannot be modified`);
  }
}

export class InvalidTicketStateTransition extends DomainError {
  public readonly code = DomainErrorCode.INVALID_STATE_TRANSITION;
  public readonly category = 'state';

  constructor(
    public readonly from: string,
    public readonly to: string
  ) {
    super(`Invalid status transition: ${from} -> ${to}`);
  }
}

export class InvalidPriorityTransition extends DomainError {
  public readonly code = DomainErrorCode.INVALID_PRIORITY_TRANSITION;
  public readonly category = 'state';

  constructor(
    public readonly from: string,
    public readonly to: string
  ) {
    super(`Invalid priority transition: ${from} -> ${to}`);
  }
}

export class PermissionDenied extends DomainError {
  public readonly code = DomainErrorCode.PERMISSION_DENIED;
  public readonly category = 'state';
}

export class TicketNotFound extends DomainError {
  public readonly code = DomainErrorCode.TICKET_NOT_FOUND;
  public readonly category = 'not_found';

  constructor(public readonly ticketId: number) {
    super(`Ticket ${ticketId} not found`);
  }
}

export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}
