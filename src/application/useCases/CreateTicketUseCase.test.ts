import { beforeEach, describe, expect, it } from 'vitest';
import { TicketPriority, TicketStatus } from '../../core/entities/Ticket.js';
import { InvalidTicketData } from '../../core/errors/DomainErrors.js';
import { EventPublishError } from '../../infrastructure/errors/InfrastructureError.js';
import { InMemoryTicketRepository } from '../../infrastructure/memory/InMemoryTicketRepository.js';
import { FakeLogger, RecordingPublisher, silentLogger } from '../../testing/fakes.js';
import { CreateTicketUseCase } from './CreateTicketUseCase.js';

describe('CreateTicketUseCase', () => {
  let repository: InMemoryTicketRepository;
  let publisher: RecordingPublisher;
  let logger: FakeLogger;
  let useCase: CreateTicketUseCase;

  beforeEach(() => {
    repository = new InMemoryTicketRepository();
    publisher = new RecordingPublisher();
    logger = silentLogger();
    useCase = new CreateTicketUseCase(repository, publisher, logger);
  });

  it('persists an OPEN, Unassigned ticket and announces it', async () => {
    const result = await useCase.execute({ title: 'VPN down', description: 'No intranet access', userId: 'u-1' });

    expect(result.persisted).toBe(true);
    expect(result.published).toBe(true);
    expect(result.publishError).toBeUndefined();
    expect(result.value.id).toBe(1);
    expect(result.value.currentStatus).toBe(TicketStatus.OPEN);
    expect(result.value.currentPriority).toBe(TicketPriority.UNASSIGNED);

    expect(repository.snapshotOf(1)?.title).toBe('VPN down');
    expect(publisher.events).toHaveLength(1);
    expect(publisher.events[0]).toMatchObject({
      eventType: 'ticket.created',
      ticketId: 1,
      title: 'VPN down',
      description: 'No intranet access',
      status: 'OPEN'
    });
  });

  it('rejects a blank title without touching storage', async () => {
    await expect(useCase.execute({ title: ' ', description: 'x', userId: 'u-1' }))
      .rejects.toThrow(new InvalidTicketData('Invalid command: title: Title cannot be empty'));

    expect(repository.size).toBe(0);
    expect(publisher.events).toEqual([]);
  });

  it('reports a failed publish as a partial success', async () => {
    const cause = new Error('broker down');
    publisher.failWith(cause);

    const result = await useCase.execute({ title: 'VPN down', description: 'No intranet access', userId: 'u-1' });

    expect(result.persisted).toBe(true);
    expect(result.published).toBe(false);
    expect(result.publishError).toBeInstanceOf(EventPublishError);
    expect(result.publishError?.message).toBe('Failed to publish ticket.created');
    expect(result.publishError?.eventType).toBe('ticket.created');
    expect(result.publishError?.cause).toBe(cause);
    expect(repository.size).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith(
      'Ticket 1 was persisted but ticket.created could not be published',
      result.publishError
    );
  });
});
