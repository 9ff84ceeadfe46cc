import { Ticket } from '../../core/entities/Ticket.js';
import { ticketDeleted } from '../../core/events/TicketEvents.js';
import { DeleteTicketCommand, TicketReferenceSchema, parseCommand } from '../../schemas/index.js';
import { TicketUseCase, UseCaseResult } from './TicketUseCase.js';

/**
 * Physically remove a ticket; the result carries the ticket as it was before deletion
 */
export class DeleteTicketUseCase extends TicketUseCase<DeleteTicketCommand, Ticket> {
  async execute(command: DeleteTicketCommand): Promise<UseCaseResult<Ticket>> {
    const { ticketId } = parseCommand(TicketReferenceSchema, command);

    const ticket = await this.repository.findById(ticketId);
    await this.repository.delete(ticketId);
    this.logger.info(`Ticket ${ticketId} deleted`);

    return this.publishAfterPersist(ticket, ticketDeleted(ticketId));
  }
}
