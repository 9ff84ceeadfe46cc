import { Ticket } from '../../core/entities/Ticket.js';
import { ticketCreated } from '../../core/events/TicketEvents.js';
import { CreateTicketCommand, CreateTicketCommandSchema, parseCommand } from '../../schemas/index.js';
import { TicketUseCase, UseCaseResult } from './TicketUseCase.js';

/**
 * Open a ticket (always OPEN / Unassigned) and announce it
 */
export class CreateTicketUseCase extends TicketUseCase<CreateTicketCommand, Ticket> {
  async execute(command: CreateTicketCommand): Promise<UseCaseResult<Ticket>> {
    const { title, description, userId } = parseCommand(CreateTicketCommandSchema, command);

    const ticket = Ticket.create({ title, description, userId });
    const saved = await this.repository.save(ticket);
    const ticketId = this.requireId(saved);

    this.logger.info(`Ticket ${ticketId} created for user ${userId}`);

    return this.publishAfterPersist(
      saved,
      ticketCreated(ticketId, {
        title: saved.title,
        description: saved.description,
        status: saved.currentStatus
      })
    );
  }
}
