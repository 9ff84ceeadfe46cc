import { describe, expect, it } from 'vitest';
import { Ticket, TicketStatus } from '../../core/entities/Ticket.js';
import { TicketNotFound } from '../../core/errors/DomainErrors.js';
import { InMemoryTicketRepository } from './InMemoryTicketRepository.js';

function newTicket(title = 'Chair'): Ticket {
  return Ticket.create({ title, description: 'Broken wheel', userId: 'u-1' });
}

describe('InMemoryTicketRepository', () => {
  it('assigns ticket and response ids on save', async () => {
    const repository = new InMemoryTicketRepository();
    const first = await repository.save(newTicket('Chair'));
    const second = await repository.save(newTicket('Lamp'));

    second.addResponse('Ordered a bulb', 'admin-1');
    const updated = await repository.save(second);

    expect(first.id).toBe(1);
    expect(second.id).toBe(2);
    expect(updated.adminResponses.map(response => response.id)).toEqual([1]);
    expect(repository.size).toBe(2);
  });

  it('hands out detached copies', async () => {
    const repository = new InMemoryTicketRepository();
    const saved = await repository.save(newTicket());

    const loaded = await repository.findById(1);
    loaded.changeStatus('IN_PROGRESS');
    saved.addResponse('Not persisted', 'admin-1');

    expect(repository.snapshotOf(1)?.status).toBe(TicketStatus.OPEN);
    expect(repository.snapshotOf(1)?.responses).toEqual([]);
  });

  it('refuses to update a ticket it does not hold', async () => {
    const repository = new InMemoryTicketRepository();
    const saved = await repository.save(newTicket());
    await repository.delete(1);

    await expect(repository.save(saved)).rejects.toThrow(new TicketNotFound(1));
  });

  it('throws TicketNotFound for unknown ids', async () => {
    const repository = new InMemoryTicketRepository();

    await expect(repository.findById(5)).rejects.toThrow(TicketNotFound);
    await expect(repository.delete(5)).rejects.toThrow(TicketNotFound);
  });

  it('reports itself healthy', async () => {
    await expect(new InMemoryTicketRepository().healthCheck()).resolves.toBe(true);
  });
});
