import { Ticket } from '../../core/entities/Ticket.js';
import { TicketEvent } from '../../core/events/TicketEvents.js';
import { IEventPublisher } from '../../core/repositories/IEventPublisher.js';
import { ITicketRepository } from '../../core/repositories/ITicketRepository.js';
import { EventPublishError, PersistenceError } from '../../infrastructure/errors/InfrastructureError.js';
import { AppLogger, Logger } from '../../infrastructure/logging/Logger.js';

/**
 * Outcome of a mutating use case.
 * `persisted && !published` is the documented gap: the stored state is
 * authoritative but downstream services were not notified.
 */
export interface UseCaseResult<T> {
  readonly value: T;
  readonly persisted: boolean;
  readonly published: boolean;
  readonly publishError?: EventPublishError;
}

type PublishOutcome =
  | { readonly published: true }
  | { readonly published: false; readonly publishError: EventPublishError };

/**
 * Base for the mutating ticket use cases: persistence always happens
 * before publication, and a failed publish is reported instead of
 * rolling the write back.
 */
export abstract class TicketUseCase<TCommand, TValue> {
  constructor(
    protected readonly repository: ITicketRepository,
    protected readonly eventPublisher: IEventPublisher,
    protected readonly logger: AppLogger = new Logger().child('UseCase')
  ) {}

  abstract execute(command: TCommand): Promise<UseCaseResult<TValue>>;

  protected unchanged(value: TValue): UseCaseResult<TValue> {
    return { value, persisted: false, published: false };
  }

  protected async publishAfterPersist(value: TValue, event: TicketEvent): Promise<UseCaseResult<TValue>> {
    const outcome = await this.publish(event);
    return { value, persisted: true, ...outcome };
  }

  protected requireId(ticket: Ticket): number {
    if (ticket.id === null) {
      throw new PersistenceError('Repository returned a ticket without an id');
    }
    return ticket.id;
  }

  private async publish(event: TicketEvent): Promise<PublishOutcome> {
    try {
      await this.eventPublisher.publish(event);
      return { published: true };
    } catch (error) {
      const publishError = error instanceof EventPublishError
        ? error
        : new EventPublishError(event.eventType, `Failed to publish ${event.eventType}`, { cause: error });

      this.logger.warn(
        `Ticket ${event.ticketId} was persisted but ${event.eventType} could not be published`,
        publishError
      );
      return { published: false, publishError };
    }
  }
}
