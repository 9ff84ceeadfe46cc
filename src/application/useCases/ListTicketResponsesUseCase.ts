import { AdminResponse } from '../../core/entities/Ticket.js';
import { ITicketRepository } from '../../core/repositories/ITicketRepository.js';
import { TicketReference, TicketReferenceSchema, parseCommand } from '../../schemas/index.js';

/**
 * Admin responses of a ticket in the order they were added
 */
export class ListTicketResponsesUseCase {
  constructor(private readonly repository: ITicketRepository) {}

  async execute(query: TicketReference): Promise<readonly AdminResponse[]> {
    const { ticketId } = parseCommand(TicketReferenceSchema, query);
    const ticket = await this.repository.findById(ticketId);
    return ticket.adminResponses;
  }
}
