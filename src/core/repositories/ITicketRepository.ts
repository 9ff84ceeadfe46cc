import { Ticket } from '../entities/Ticket.js';

/**
 * Repository Interface for Ticket persistence
 * Infrastructure layer will implement this
 */
export interface ITicketRepository {
  /**
   * Insert or update the aggregate, including newly appended responses.
   * Returns the stored ticket with every id assigned.
   */
  save(ticket: Ticket): Promise<Ticket>;

  /**
   * Load a ticket with its responses; throws TicketNotFound when absent
   */
  findById(id: number): Promise<Ticket>;

  /**
   * Physically remove a ticket; throws TicketNotFound when absent
   */
  delete(id: number): Promise<void>;

  /**
   * Health check - verify repository is operational
   */
  healthCheck(): Promise<boolean>;
}
