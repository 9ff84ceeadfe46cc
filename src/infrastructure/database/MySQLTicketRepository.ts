import type { RowDataPacket } from 'mysql2/promise';
import {
  AdminResponse,
  Ticket,
  TicketSnapshot,
  isTicketPriority,
  isTicketStatus
} from '../../core/entities/Ticket.js';
import { TicketNotFound, isDomainError } from '../../core/errors/DomainErrors.js';
import { ITicketRepository } from '../../core/repositories/ITicketRepository.js';
import { PersistenceError } from '../errors/InfrastructureError.js';
import { SqlDatabase, SqlExecutor } from './DatabaseConnectionManager.js';

interface TicketRow extends RowDataPacket {
  id: number;
  title: string;
  description: string;
  status: string;
  priority: string;
  priority_justification: string | null;
  user_id: string;
  created_at: Date;
  updated_at: Date;
}

interface ResponseRow extends RowDataPacket {
  id: number;
  text: string;
  admin_id: string;
  created_at: Date;
}

/**
 * MySQL Implementation of Ticket Repository
 * A ticket and its responses are written in one transaction; responses are append-only
 */
export class MySQLTicketRepository implements ITicketRepository {
  constructor(
    private readonly db: SqlDatabase,
    private readonly tablePrefix: string = ''
  ) {}

  async save(ticket: Ticket): Promise<Ticket> {
    const snapshot = ticket.toSnapshot();

    try {
      const stored = await this.db.transaction(async tx => {
        const id = snapshot.id === null
          ? await this.insertTicket(tx, snapshot)
          : await this.updateTicket(tx, snapshot.id, snapshot);

        const responses: AdminResponse[] = [];
        for (const response of snapshot.responses) {
          responses.push(response.id === null ? await this.insertResponse(tx, id, response) : response);
        }

        return { ...snapshot, id, responses };
      });

      return Ticket.restore(stored);
    } catch (error) {
      throw this.wrap(error, `save ticket ${snapshot.id ?? '(new)'}`);
    }
  }

  /**
   * Find ticket by ID with all responses (2 queries)
   */
  async findById(id: number): Promise<Ticket> {
    try {
      const [ticketRow] = await this.db.query<TicketRow>(
        `SELECT id, title, description, status, priority, priority_justification, user_id, created_at, updated_at
         FROM ${this.tablePrefix}tickets
         WHERE id = ?`,
        [id]
      );
      if (!ticketRow) {
        throw new TicketNotFound(id);
      }

      const responseRows = await this.db.query<ResponseRow>(
        `SELECT id, text, admin_id, created_at
         FROM ${this.tablePrefix}ticket_responses
         WHERE ticket_id = ?
         ORDER BY id ASC`,
        [id]
      );

      return Ticket.restore(this.mapTicket(ticketRow, responseRows));
    } catch (error) {
      throw this.wrap(error, `load ticket ${id}`);
    }
  }

  async delete(id: number): Promise<void> {
    try {
      // ticket_responses rows go with it (ON DELETE CASCADE)
      const result = await this.db.execute(`DELETE FROM ${this.tablePrefix}tickets WHERE id = ?`, [id]);
      if (result.affectedRows === 0) {
        throw new TicketNotFound(id);
      }
    } catch (error) {
      throw this.wrap(error, `delete ticket ${id}`);
    }
  }

  async healthCheck(): Promise<boolean> {
    return this.db.healthCheck();
  }

  private async insertTicket(tx: SqlExecutor, snapshot: TicketSnapshot): Promise<number> {
    const result = await tx.execute(
      `INSERT INTO ${this.tablePrefix}tickets
         (title, description, status, priority, priority_justification, user_id, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        snapshot.title,
        snapshot.description,
        snapshot.status,
        snapshot.priority,
        snapshot.priorityJustification,
        snapshot.userId,
        snapshot.createdAt,
        snapshot.updatedAt
      ]
    );
    return result.insertId;
  }

  // title, description and user_id are immutable after creation
  private async updateTicket(tx: SqlExecutor, id: number, snapshot: TicketSnapshot): Promise<number> {
    const result = await tx.execute(
      `UPDATE ${this.tablePrefix}tickets
       SET status = ?, priority = ?, priority_justification = ?, updated_at = ?
       WHERE id = ?`,
      [snapshot.status, snapshot.priority, snapshot.priorityJustification, snapshot.updatedAt, id]
    );
    if (result.affectedRows === 0) {
      throw new TicketNotFound(id);
    }
    return id;
  }

  private async insertResponse(tx: SqlExecutor, ticketId: number, response: AdminResponse): Promise<AdminResponse> {
    const result = await tx.execute(
      `INSERT INTO ${this.tablePrefix}ticket_responses (ticket_id, text, admin_id, created_at)
       VALUES (?, ?, ?, ?)`,
      [ticketId, response.text, response.adminId, response.createdAt]
    );
    return { ...response, id: result.insertId };
  }

  private mapTicket(row: TicketRow, responseRows: ResponseRow[]): TicketSnapshot {
    if (!isTicketStatus(row.status)) {
      throw new PersistenceError(`Ticket ${row.id} has unknown status "${row.status}" in storage`);
    }
    if (!isTicketPriority(row.priority)) {
      throw new PersistenceError(`Ticket ${row.id} has unknown priority "${row.priority}" in storage`);
    }

    return {
      id: row.id,
      title: row.title,
      description: row.description,
      status: row.status,
      priority: row.priority,
      priorityJustification: row.priority_justification,
      userId: row.user_id,
      responses: responseRows.map(response => ({
        id: response.id,
        text: response.text,
        adminId: response.admin_id,
        createdAt: response.created_at
      })),
      createdAt: row.created_at,
      updatedAt: row.updated_at
    };
  }

  private wrap(error: unknown, operation: string): Error {
    if (isDomainError(error) || error instanceof PersistenceError) {
      return error;
    }
    return new PersistenceError(`Failed to ${operation}`, { cause: error });
  }
}
