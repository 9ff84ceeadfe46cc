import { beforeEach, describe, expect, it } from 'vitest';
import { Ticket } from '../../core/entities/Ticket.js';
import { InvalidTicketData, TicketAlreadyClosed } from '../../core/errors/DomainErrors.js';
import { InMemoryTicketRepository } from '../../infrastructure/memory/InMemoryTicketRepository.js';
import { RecordingPublisher, silentLogger } from '../../testing/fakes.js';
import { AddTicketResponseUseCase } from './AddTicketResponseUseCase.js';
import { ChangeTicketStatusUseCase } from './ChangeTicketStatusUseCase.js';
import { ListTicketResponsesUseCase } from './ListTicketResponsesUseCase.js';

describe('AddTicketResponseUseCase', () => {
  let repository: InMemoryTicketRepository;
  let publisher: RecordingPublisher;
  let useCase: AddTicketResponseUseCase;
  let ticketId: number;

  beforeEach(async () => {
    repository = new InMemoryTicketRepository();
    publisher = new RecordingPublisher();
    useCase = new AddTicketResponseUseCase(repository, publisher, silentLogger());

    const saved = await repository.save(Ticket.create({ title: 'Login', description: 'Locked out', userId: 'u-3' }));
    ticketId = saved.id ?? 0;
  });

  it('stores the response with an id and publishes it', async () => {
    const result = await useCase.execute({ ticketId, text: 'Account unlocked', adminId: 'admin-1' });

    expect(result).toMatchObject({
      persisted: true,
      published: true,
      value: { id: 1, text: 'Account unlocked', adminId: 'admin-1' }
    });
    expect(publisher.events[0]).toMatchObject({
      eventType: 'ticket.response_added',
      ticketId,
      responseId: 1,
      text: 'Account unlocked',
      adminId: 'admin-1'
    });
  });

  it('keeps responses in insertion order', async () => {
    await useCase.execute({ ticketId, text: 'Looking into it', adminId: 'admin-1' });
    await useCase.execute({ ticketId, text: 'Fixed', adminId: 'admin-2' });

    const responses = await new ListTicketResponsesUseCase(repository).execute({ ticketId });

    expect(responses.map(response => [response.id, response.text, response.adminId])).toEqual([
      [1, 'Looking into it', 'admin-1'],
      [2, 'Fixed', 'admin-2']
    ]);
  });

  it('rejects over-long text before loading the ticket', async () => {
    await expect(useCase.execute({ ticketId: 99, text: 'x'.repeat(2001), adminId: 'admin-1' }))
      .rejects.toThrow(new InvalidTicketData('Response text cannot exceed 2000 characters'));

    expect(publisher.events).toEqual([]);
  });

  it('accepts text at the length limit', async () => {
    const result = await useCase.execute({ ticketId, text: 'x'.repeat(2000), adminId: 'admin-1' });

    expect(result.value.text).toHaveLength(2000);
  });

  it('refuses responses on a closed ticket', async () => {
    const status = new ChangeTicketStatusUseCase(repository, publisher, silentLogger());
    await status.execute({ ticketId, newStatus: 'IN_PROGRESS' });
    await status.execute({ ticketId, newStatus: 'CLOSED' });

    await expect(useCase.execute({ ticketId, text: 'One more thing', adminId: 'admin-1' }))
      .rejects.toThrow(TicketAlreadyClosed);
    expect(repository.snapshotOf(ticketId)?.responses).toEqual([]);
  });
});
