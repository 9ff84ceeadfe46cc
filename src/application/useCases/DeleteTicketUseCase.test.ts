import { beforeEach, describe, expect, it } from 'vitest';
import { Ticket } from '../../core/entities/Ticket.js';
import { TicketNotFound } from '../../core/errors/DomainErrors.js';
import { InMemoryTicketRepository } from '../../infrastructure/memory/InMemoryTicketRepository.js';
import { RecordingPublisher, silentLogger } from '../../testing/fakes.js';
import { DeleteTicketUseCase } from './DeleteTicketUseCase.js';
import { GetTicketUseCase } from './GetTicketUseCase.js';

describe('DeleteTicketUseCase', () => {
  let repository: InMemoryTicketRepository;
  let publisher: RecordingPublisher;
  let useCase: DeleteTicketUseCase;
  let ticketId: number;

  beforeEach(async () => {
    repository = new InMemoryTicketRepository();
    publisher = new RecordingPublisher();
    useCase = new DeleteTicketUseCase(repository, publisher, silentLogger());

    const saved = await repository.save(Ticket.create({ title: 'Desk', description: 'Wobbly', userId: 'u-4' }));
    ticketId = saved.id ?? 0;
  });

  it('removes the ticket and publishes the deletion', async () => {
    const result = await useCase.execute({ ticketId });

    expect(result.persisted).toBe(true);
    expect(result.published).toBe(true);
    expect(result.value.title).toBe('Desk');
    expect(repository.size).toBe(0);
    expect(publisher.events).toHaveLength(1);
    expect(publisher.events[0]).toMatchObject({ eventType: 'ticket.deleted', ticketId });
    await expect(new GetTicketUseCase(repository).execute({ ticketId })).rejects.toThrow(TicketNotFound);
  });

  it('fails for a missing ticket without publishing', async () => {
    await expect(useCase.execute({ ticketId: 42 })).rejects.toThrow('Ticket 42 not found');

    expect(repository.size).toBe(1);
    expect(publisher.events).toEqual([]);
  });

  it('keeps the deletion when the announcement fails', async () => {
    publisher.failWith(new Error('channel closed'));

    const result = await useCase.execute({ ticketId });

    expect(result.persisted).toBe(true);
    expect(result.published).toBe(false);
    expect(repository.size).toBe(0);
  });
});
