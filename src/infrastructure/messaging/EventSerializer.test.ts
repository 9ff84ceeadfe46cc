import { describe, expect, it } from 'vitest';
import { TicketPriority, TicketStatus } from '../../core/entities/Ticket.js';
import {
  ticketCreated,
  ticketDeleted,
  ticketPriorityChanged,
  ticketResponseAdded,
  ticketStatusChanged
} from '../../core/events/TicketEvents.js';
import { serializeEvent } from './EventSerializer.js';

const AT = new Date('2024-06-01T12:30:00.000Z');

describe('serializeEvent', () => {
  it('writes ticket.created', () => {
    const event = ticketCreated(3, { title: 'Phone', description: 'No dial tone', status: TicketStatus.OPEN }, AT);

    expect(serializeEvent(event)).toEqual({
      event_type: 'ticket.created',
      ticket_id: 3,
      occurred_at: '2024-06-01T12:30:00.000Z',
      title: 'Phone',
      description: 'No dial tone',
      status: 'OPEN'
    });
  });

  it('writes ticket.status_changed', () => {
    const event = ticketStatusChanged(3, { oldStatus: TicketStatus.OPEN, newStatus: TicketStatus.IN_PROGRESS }, AT);

    expect(serializeEvent(event)).toEqual({
      event_type: 'ticket.status_changed',
      ticket_id: 3,
      occurred_at: '2024-06-01T12:30:00.000Z',
      old_status: 'OPEN',
      new_status: 'IN_PROGRESS'
    });
  });

  it('writes ticket.priority_changed', () => {
    const event = ticketPriorityChanged(
      3,
      { oldPriority: TicketPriority.UNASSIGNED, newPriority: TicketPriority.LOW, justification: 'Cosmetic' },
      AT
    );

    expect(serializeEvent(event)).toEqual({
      event_type: 'ticket.priority_changed',
      ticket_id: 3,
      occurred_at: '2024-06-01T12:30:00.000Z',
      old_priority: 'Unassigned',
      new_priority: 'Low',
      justification: 'Cosmetic'
    });
  });

  it('writes ticket.response_added', () => {
    const event = ticketResponseAdded(3, { id: 11, text: 'Line fixed', adminId: 'admin-4', createdAt: AT }, AT);

    expect(serializeEvent(event)).toEqual({
      event_type: 'ticket.response_added',
      ticket_id: 3,
      occurred_at: '2024-06-01T12:30:00.000Z',
      response_id: 11,
      text: 'Line fixed',
      admin_id: 'admin-4'
    });
  });

  it('writes ticket.deleted with the common fields only', () => {
    expect(serializeEvent(ticketDeleted(3, AT))).toEqual({
      event_type: 'ticket.deleted',
      ticket_id: 3,
      occurred_at: '2024-06-01T12:30:00.000Z'
    });
  });
});
