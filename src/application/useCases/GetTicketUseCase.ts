import { Ticket } from '../../core/entities/Ticket.js';
import { ITicketRepository } from '../../core/repositories/ITicketRepository.js';
import { TicketReference, TicketReferenceSchema, parseCommand } from '../../schemas/index.js';

/**
 * Read-only lookup; throws TicketNotFound when absent
 */
export class GetTicketUseCase {
  constructor(private readonly repository: ITicketRepository) {}

  async execute(query: TicketReference): Promise<Ticket> {
    const { ticketId } = parseCommand(TicketReferenceSchema, query);
    return this.repository.findById(ticketId);
  }
}
