import { Ticket } from '../../core/entities/Ticket.js';
import { ticketPriorityChanged } from '../../core/events/TicketEvents.js';
import {
  ChangeTicketPriorityCommand,
  ChangeTicketPriorityCommandSchema,
  parseCommand
} from '../../schemas/index.js';
import { TicketUseCase, UseCaseResult } from './TicketUseCase.js';

/**
 * Reprioritize a ticket on behalf of a requester whose role is checked by the entity
 */
export class ChangeTicketPriorityUseCase extends TicketUseCase<ChangeTicketPriorityCommand, Ticket> {
  async execute(command: ChangeTicketPriorityCommand): Promise<UseCaseResult<Ticket>> {
    const { ticketId, newPriority, justification, requesterRole } =
      parseCommand(ChangeTicketPriorityCommandSchema, command);

    const ticket = await this.repository.findById(ticketId);
    const outcome = ticket.changePriority(newPriority, justification, requesterRole);

    if (!outcome.changed) {
      return this.unchanged(ticket);
    }

    const saved = await this.repository.save(ticket);
    this.logger.info(
      `Ticket ${ticketId} priority ${outcome.change.oldPriority} -> ${outcome.change.newPriority}`
    );

    return this.publishAfterPersist(saved, ticketPriorityChanged(this.requireId(saved), outcome.change));
  }
}
