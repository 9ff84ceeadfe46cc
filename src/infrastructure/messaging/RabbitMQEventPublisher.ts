import amqp from 'amqplib';
import { RabbitMQSettings } from '../../config/Configuration.js';
import { TicketEvent } from '../../core/events/TicketEvents.js';
import { IEventPublisher } from '../../core/repositories/IEventPublisher.js';
import { EventPublishError } from '../errors/InfrastructureError.js';
import { AppLogger, Logger } from '../logging/Logger.js';
import { amqpConnectOptions } from './AmqpBrokerConnector.js';
import { serializeEvent } from './EventSerializer.js';

export interface PublishOptions {
  persistent?: boolean;
  contentType?: string;
  type?: string;
  timestamp?: number;
}

/**
 * The slice of an amqplib confirm channel the publisher relies on
 */
export interface ConfirmChannelLike {
  assertExchange(exchange: string, type: string, options?: { durable?: boolean }): Promise<unknown>;
  publish(exchange: string, routingKey: string, content: Buffer, options?: PublishOptions): boolean;
  waitForConfirms(): Promise<void>;
  on(event: 'close' | 'error', listener: (error?: unknown) => void): unknown;
}

export interface PublisherConnectionLike {
  createConfirmChannel(): Promise<ConfirmChannelLike>;
  close(): Promise<void>;
  on(event: 'close' | 'error', listener: (error?: unknown) => void): unknown;
}

export type PublisherConnect = () => Promise<PublisherConnectionLike>;

/**
 * Publishes ticket events to a durable fan-out exchange.
 * The connection is opened lazily and reopened after it drops; each publish
 * waits for the broker's confirm so a failure surfaces to the caller.
 */
export class RabbitMQEventPublisher implements IEventPublisher {
  private connection: PublisherConnectionLike | null = null;
  private channel: Promise<ConfirmChannelLike> | null = null;

  constructor(
    private readonly settings: RabbitMQSettings,
    private readonly logger: AppLogger = new Logger().child('Publisher'),
    private readonly connect: PublisherConnect = () => amqp.connect(amqpConnectOptions(settings))
  ) {}

  async publish(event: TicketEvent): Promise<void> {
    const body = Buffer.from(JSON.stringify(serializeEvent(event)));

    try {
      const channel = await this.getChannel();
      channel.publish(this.settings.publishExchangeName, '', body, {
        persistent: true,
        contentType: 'application/json',
        type: event.eventType,
        timestamp: Math.floor(event.occurredAt.getTime() / 1000)
      });
      await channel.waitForConfirms();
    } catch (error) {
      throw new EventPublishError(
        event.eventType,
        `Failed to publish ${event.eventType} for ticket ${event.ticketId}`,
        { cause: error }
      );
    }

    this.logger.debug(`Published ${event.eventType} for ticket ${event.ticketId}`);
  }

  async close(): Promise<void> {
    const connection = this.connection;
    this.connection = null;
    this.channel = null;

    if (connection) {
      await connection.close();
      this.logger.info('Publisher connection closed');
    }
  }

  private getChannel(): Promise<ConfirmChannelLike> {
    if (!this.channel) {
      this.channel = this.openChannel().catch((error: unknown) => {
        this.channel = null;
        throw error;
      });
    }
    return this.channel;
  }

  private async openConnection(): Promise<PublisherConnectionLike> {
    if (this.connection) {
      return this.connection;
    }

    const connection = await this.connect();
    connection.on('error', error => this.logger.warn('Publisher connection error', error));
    connection.on('close', () => {
      this.connection = null;
      this.channel = null;
    });
    this.connection = connection;
    return connection;
  }

  private async openChannel(): Promise<ConfirmChannelLike> {
    const connection = await this.openConnection();
    const channel = await connection.createConfirmChannel();
    channel.on('error', error => this.logger.warn('Publisher channel error', error));
    channel.on('close', () => {
      this.channel = null;
    });

    await channel.assertExchange(this.settings.publishExchangeName, 'fanout', { durable: true });
    this.logger.info(`Publisher ready on exchange '${this.settings.publishExchangeName}'`);
    return channel;
  }
}
