import { RESPONSE_TEXT_MAX_LENGTH } from '../../constants.js';
import {
  InvalidPriorityTransition,
  InvalidTicketData,
  InvalidTicketStateTransition,
  PermissionDenied,
  TicketAlreadyClosed,
  UnknownTicketStatus
} from '../errors/DomainErrors.js';
import { UserRole, canChangePriority } from './Role.js';

/**
 * Ticket Entity - Domain Model
 * Aggregate root owning its admin responses
 */

export enum TicketStatus {
  OPEN = 'OPEN',
  IN_PROGRESS = 'IN_PROGRESS',
  CLOSED = 'CLOSED'
}

export enum TicketPriority {
  UNASSIGNED = 'Unassigned',
  LOW = 'Low',
  MEDIUM = 'Medium',
  HIGH = 'High'
}

const STATUS_VALUES: readonly string[] = Object.values(TicketStatus);
const PRIORITY_VALUES: readonly string[] = Object.values(TicketPriority);

// Directed edges of the status machine; same-status requests are no-ops, not edges.
const STATUS_TRANSITIONS: Record<TicketStatus, readonly TicketStatus[]> = {
  [TicketStatus.OPEN]: [TicketStatus.IN_PROGRESS],
  [TicketStatus.IN_PROGRESS]: [TicketStatus.CLOSED],
  [TicketStatus.CLOSED]: []
};

export function isTicketStatus(value: string): value is TicketStatus {
  return STATUS_VALUES.includes(value);
}

export function isTicketPriority(value: string): value is TicketPriority {
  return PRIORITY_VALUES.includes(value);
}

export interface AdminResponse {
  readonly id: number | null;
  readonly text: string;
  readonly adminId: string;
  readonly createdAt: Date;
}

export interface TicketSnapshot {
  readonly id: number | null;
  readonly title: string;
  readonly description: string;
  readonly status: TicketStatus;
  readonly priority: TicketPriority;
  readonly priorityJustification: string | null;
  readonly userId: string;
  readonly responses: readonly AdminResponse[];
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface NewTicketProps {
  readonly title: string;
  readonly description: string;
  readonly userId: string;
}

export interface StatusChange {
  readonly oldStatus: TicketStatus;
  readonly newStatus: TicketStatus;
}

export interface PriorityChange {
  readonly oldPriority: TicketPriority;
  readonly newPriority: TicketPriority;
  readonly justification: string;
}

/**
 * Result of a transition request. `changed: false` means the request
 * matched the current value: nothing mutated and nothing to announce.
 */
export type TransitionOutcome<T> =
  | { readonly changed: false }
  | { readonly changed: true; readonly change: T };

const UNCHANGED = { changed: false } as const;

export class Ticket {
  private status: TicketStatus;
  private priority: TicketPriority;
  private priorityJustification: string | null;
  private readonly responses: AdminResponse[];
  private updatedAt: Date;

  private constructor(private readonly snapshot: TicketSnapshot) {
    this.status = snapshot.status;
    this.priority = snapshot.priority;
    this.priorityJustification = snapshot.priorityJustification;
    this.responses = snapshot.responses.map(response => ({ ...response }));
    this.updatedAt = snapshot.updatedAt;
  }

  /**
   * Open a new ticket. Status and priority always start at OPEN / Unassigned.
   */
  static create(props: NewTicketProps, now: Date = new Date()): Ticket {
    if (isBlank(props.title)) {
      throw new InvalidTicketData('Ticket title cannot be empty');
    }
    if (isBlank(props.description)) {
      throw new InvalidTicketData('Ticket description cannot be empty');
    }

    return new Ticket({
      id: null,
      title: props.title,
      description: props.description,
      status: TicketStatus.OPEN,
      priority: TicketPriority.UNASSIGNED,
      priorityJustification: null,
      userId: props.userId,
      responses: [],
      createdAt: now,
      updatedAt: now
    });
  }

  /**
   * Rehydrate a ticket from persisted state (no validation, no events)
   */
  static restore(snapshot: TicketSnapshot): Ticket {
    return new Ticket(snapshot);
  }

  get id(): number | null {
    return this.snapshot.id;
  }

  get title(): string {
    return this.snapshot.title;
  }

  get description(): string {
    return this.snapshot.description;
  }

  get userId(): string {
    return this.snapshot.userId;
  }

  get createdAt(): Date {
    return this.snapshot.createdAt;
  }

  get currentStatus(): TicketStatus {
    return this.status;
  }

  get currentPriority(): TicketPriority {
    return this.priority;
  }

  get justification(): string | null {
    return this.priorityJustification;
  }

  get adminResponses(): readonly AdminResponse[] {
    return this.responses;
  }

  get lastUpdatedAt(): Date {
    return this.updatedAt;
  }

  get isClosed(): boolean {
    return this.status === TicketStatus.CLOSED;
  }

  changeStatus(newStatus: string, now: Date = new Date()): TransitionOutcome<StatusChange> {
    if (!isTicketStatus(newStatus)) {
      throw new UnknownTicketStatus(newStatus);
    }

    if (newStatus === this.status) {
      return UNCHANGED;
    }

    if (this.isClosed) {
      throw new TicketAlreadyClosed(this.id);
    }

    if (!STATUS_TRANSITIONS[this.status].includes(newStatus)) {
      throw new InvalidTicketStateTransition(this.status, newStatus);
    }

    const oldStatus = this.status;
    this.status = newStatus;
    this.updatedAt = now;

    return { changed: true, change: { oldStatus, newStatus } };
  }

  changePriority(
    newPriority: string,
    justification: string,
    requesterRole: UserRole,
    now: Date = new Date()
  ): TransitionOutcome<PriorityChange> {
    if (!canChangePriority(requesterRole)) {
      throw new PermissionDenied(`Role ${requesterRole} has insufficient permission to change ticket priority`);
    }

    if (this.isClosed) {
      throw new TicketAlreadyClosed(this.id);
    }

    if (!isTicketPriority(newPriority)) {
      throw new InvalidTicketData(`Unknown ticket priority: ${newPriority}`);
    }

    if (newPriority === TicketPriority.UNASSIGNED && this.priority !== TicketPriority.UNASSIGNED) {
      throw new InvalidPriorityTransition(this.priority, newPriority);
    }

    if (newPriority === this.priority) {
      return UNCHANGED;
    }

    const oldPriority = this.priority;
    this.priority = newPriority;
    this.priorityJustification = justification;
    this.updatedAt = now;

    return { changed: true, change: { oldPriority, newPriority, justification } };
  }

  addResponse(text: string, adminId: string, now: Date = new Date()): AdminResponse {
    validateResponseText(text);

    if (this.isClosed) {
      throw new TicketAlreadyClosed(this.id);
    }

    const response: AdminResponse = { id: null, text, adminId, createdAt: now };
    this.responses.push(response);
    this.updatedAt = now;

    return response;
  }

  toSnapshot(): TicketSnapshot {
    return {
      ...this.snapshot,
      status: this.status,
      priority: this.priority,
      priorityJustification: this.priorityJustification,
      responses: this.responses.map(response => ({ ...response })),
      updatedAt: this.updatedAt
    };
  }
}

/**
 * Response text must hold 1..RESPONSE_TEXT_MAX_LENGTH code points
 */
export function validateResponseText(text: string): void {
  if (isBlank(text)) {
    throw new InvalidTicketData('Response text cannot be empty');
  }
  if (Array.from(text).length > RESPONSE_TEXT_MAX_LENGTH) {
    throw new InvalidTicketData(`Response text cannot exceed ${RESPONSE_TEXT_MAX_LENGTH} characters`);
  }
}

function isBlank(value: string): boolean {
  return value.trim().length === 0;
}
