import { AdminResponse, validateResponseText } from '../../core/entities/Ticket.js';
import { ticketResponseAdded } from '../../core/events/TicketEvents.js';
import { PersistenceError } from '../../infrastructure/errors/InfrastructureError.js';
import {
  AddTicketResponseCommand,
  AddTicketResponseCommandSchema,
  parseCommand
} from '../../schemas/index.js';
import { TicketUseCase, UseCaseResult } from './TicketUseCase.js';

export type PersistedResponse = AdminResponse & { readonly id: number };

export class AddTicketResponseUseCase extends TicketUseCase<AddTicketResponseCommand, PersistedResponse> {
  async execute(command: AddTicketResponseCommand): Promise<UseCaseResult<PersistedResponse>> {
    const { ticketId, text, adminId } = parseCommand(AddTicketResponseCommandSchema, command);

    // Reject bad text before the aggregate is even loaded
    validateResponseText(text);

    const ticket = await this.repository.findById(ticketId);
    ticket.addResponse(text, adminId);

    const saved = await this.repository.save(ticket);
    const stored = saved.adminResponses.at(-1);
    if (stored === undefined || stored.id === null) {
      throw new PersistenceError(`Response for ticket ${ticketId} was not assigned an id`);
    }

    const response: PersistedResponse = { ...stored, id: stored.id };
    this.logger.info(`Admin ${adminId} responded to ticket ${ticketId} (response ${response.id})`);

    return this.publishAfterPersist(response, ticketResponseAdded(this.requireId(saved), response));
  }
}
