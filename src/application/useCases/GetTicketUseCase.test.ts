import { describe, expect, it } from 'vitest';
import { Ticket } from '../../core/entities/Ticket.js';
import { InvalidTicketData, TicketNotFound } from '../../core/errors/DomainErrors.js';
import { InMemoryTicketRepository } from '../../infrastructure/memory/InMemoryTicketRepository.js';
import { GetTicketUseCase } from './GetTicketUseCase.js';

describe('GetTicketUseCase', () => {
  it('loads a stored ticket', async () => {
    const repository = new InMemoryTicketRepository();
    await repository.save(Ticket.create({ title: 'Monitor', description: 'Flickers', userId: 'u-5' }));

    const ticket = await new GetTicketUseCase(repository).execute({ ticketId: 1 });

    expect(ticket.id).toBe(1);
    expect(ticket.title).toBe('Monitor');
  });

  it('throws TicketNotFound for an unknown id', async () => {
    await expect(new GetTicketUseCase(new InMemoryTicketRepository()).execute({ ticketId: 3 }))
      .rejects.toThrow(TicketNotFound);
  });

  it('rejects a non-integer id', async () => {
    await expect(new GetTicketUseCase(new InMemoryTicketRepository()).execute({ ticketId: 1.5 }))
      .rejects.toThrow(new InvalidTicketData('Invalid command: ticketId: Ticket ID must be an integer'));
  });
});
