/**
 * Zod Schemas for the ticket service
 *
 * Runtime validation of use case commands and inbound broker payloads.
 */

import { z } from 'zod';
import { UserRole } from '../core/entities/Role.js';
import { InvalidTicketData } from '../core/errors/DomainErrors.js';

// ============================================================================
// Common Schemas
// ============================================================================

export const TicketIdSchema = z.number()
  .int('Ticket ID must be an integer')
  .positive('Ticket ID must be positive')
  .describe('Internal ticket database ID');

const nonBlank = (field: string) => z.string()
  .refine(value => value.trim().length > 0, `${field} cannot be empty`);

// ============================================================================
// Command Schemas
// ============================================================================

export const CreateTicketCommandSchema = z.object({
  title: nonBlank('Title'),
  description: nonBlank('Description'),
  userId: nonBlank('User ID')
}).strict();

export const ChangeTicketStatusCommandSchema = z.object({
  ticketId: TicketIdSchema,
  newStatus: z.string().describe('Requested status; unknown values are rejected by the entity')
}).strict();

export const ChangeTicketPriorityCommandSchema = z.object({
  ticketId: TicketIdSchema,
  newPriority: z.string(),
  justification: z.string(),
  requesterRole: z.nativeEnum(UserRole)
}).strict();

export const AddTicketResponseCommandSchema = z.object({
  ticketId: TicketIdSchema,
  text: z.string(),
  adminId: nonBlank('Admin ID')
}).strict();

export const TicketReferenceSchema = z.object({
  ticketId: TicketIdSchema
}).strict();

// ============================================================================
// Inbound broker payloads
// ============================================================================

/**
 * Fan-out payloads carry arbitrary fields; only the event type and
 * ticket reference are read here, the rest passes through untouched.
 */
export const InboundEventSchema = z.object({
  event_type: z.string().optional(),
  ticket_id: z.unknown().optional()
}).passthrough();

// ============================================================================
// Type Exports
// ============================================================================

export type CreateTicketCommand = z.infer<typeof CreateTicketCommandSchema>;
export type ChangeTicketStatusCommand = z.infer<typeof ChangeTicketStatusCommandSchema>;
export type ChangeTicketPriorityCommand = z.infer<typeof ChangeTicketPriorityCommandSchema>;
export type AddTicketResponseCommand = z.infer<typeof AddTicketResponseCommandSchema>;
export type TicketReference = z.infer<typeof TicketReferenceSchema>;
export type DeleteTicketCommand = TicketReference;
export type InboundEventPayload = z.infer<typeof InboundEventSchema>;

/**
 * Parse a command, turning schema violations into InvalidTicketData
 */
export function parseCommand<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new InvalidTicketData(`Invalid command: ${details}`);
  }
  return result.data;
}
