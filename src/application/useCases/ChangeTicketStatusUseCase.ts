import { Ticket } from '../../core/entities/Ticket.js';
import { ticketStatusChanged } from '../../core/events/TicketEvents.js';
import {
  ChangeTicketStatusCommand,
  ChangeTicketStatusCommandSchema,
  parseCommand
} from '../../schemas/index.js';
import { TicketUseCase, UseCaseResult } from './TicketUseCase.js';

export class ChangeTicketStatusUseCase extends TicketUseCase<ChangeTicketStatusCommand, Ticket> {
  async execute(command: ChangeTicketStatusCommand): Promise<UseCaseResult<Ticket>> {
    const { ticketId, newStatus } = parseCommand(ChangeTicketStatusCommandSchema, command);

    const ticket = await this.repository.findById(ticketId);
    const outcome = ticket.changeStatus(newStatus);

    if (!outcome.changed) {
      this.logger.debug(`Ticket ${ticketId} already ${newStatus}, nothing to do`);
      return this.unchanged(ticket);
    }

    const saved = await this.repository.save(ticket);
    this.logger.info(`Ticket ${ticketId} status ${outcome.change.oldStatus} -> ${outcome.change.newStatus}`);

    return this.publishAfterPersist(saved, ticketStatusChanged(this.requireId(saved), outcome.change));
  }
}
