import { Ticket, TicketSnapshot } from '../../core/entities/Ticket.js';
import { TicketNotFound } from '../../core/errors/DomainErrors.js';
import { ITicketRepository } from '../../core/repositories/ITicketRepository.js';

/**
 * In-memory Ticket Repository
 * Stores detached snapshots so callers never share state with the store.
 * Backs TICKET_STORE=memory and the test suite.
 */
export class InMemoryTicketRepository implements ITicketRepository {
  private readonly tickets = new Map<number, TicketSnapshot>();
  private nextTicketId = 1;
  private nextResponseId = 1;

  async save(ticket: Ticket): Promise<Ticket> {
    const snapshot = ticket.toSnapshot();
    const id = snapshot.id ?? this.nextTicketId++;

    if (snapshot.id !== null && !this.tickets.has(snapshot.id)) {
      throw new TicketNotFound(snapshot.id);
    }

    const stored: TicketSnapshot = {
      ...snapshot,
      id,
      responses: snapshot.responses.map(response =>
        response.id === null ? { ...response, id: this.nextResponseId++ } : response
      )
    };

    this.tickets.set(id, structuredClone(stored));
    return Ticket.restore(structuredClone(stored));
  }

  async findById(id: number): Promise<Ticket> {
    const snapshot = this.tickets.get(id);
    if (!snapshot) {
      throw new TicketNotFound(id);
    }
    return Ticket.restore(structuredClone(snapshot));
  }

  async delete(id: number): Promise<void> {
    if (!this.tickets.delete(id)) {
      throw new TicketNotFound(id);
    }
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  /**
   * Raw stored state, for assertions on what was persisted
   */
  snapshotOf(id: number): TicketSnapshot | undefined {
    const snapshot = this.tickets.get(id);
    return snapshot ? structuredClone(snapshot) : undefined;
  }

  get size(): number {
    return this.tickets.size;
  }
}
