import amqp, { type Channel, type ConsumeMessage, type Options } from 'amqplib';
import { RabbitMQSettings } from '../../config/Configuration.js';
import { BrokerConnectionError } from '../errors/InfrastructureError.js';
import { AppLogger, Logger } from '../logging/Logger.js';
import {
  BrokerConnector,
  BrokerSession,
  ConsumerTopology,
  DeliveryListener,
  InboundDelivery
} from './BrokerSession.js';

export type AmqpConnection = Awaited<ReturnType<typeof amqp.connect>>;

export function amqpConnectOptions(settings: RabbitMQSettings): Options.Connect {
  return {
    protocol: 'amqp',
    hostname: settings.hostname,
    port: settings.port,
    username: settings.username,
    password: settings.password,
    vhost: settings.vhost,
    heartbeat: settings.heartbeatSeconds
  };
}

/**
 * Opens one connection + channel per consumer run (no shared module state)
 */
export class AmqpBrokerConnector implements BrokerConnector {
  constructor(
    private readonly settings: RabbitMQSettings,
    private readonly logger: AppLogger = new Logger().child('Broker')
  ) {}

  async connect(): Promise<BrokerSession> {
    const target = `${this.settings.hostname}:${this.settings.port}`;

    let connection: AmqpConnection;
    try {
      connection = await amqp.connect(amqpConnectOptions(this.settings));
    } catch (error) {
      throw new BrokerConnectionError(`Cannot connect to RabbitMQ at ${target}`, { cause: error });
    }

    try {
      const channel = await connection.createChannel();
      this.logger.info(`Connected to RabbitMQ at ${target}`);
      return new AmqpBrokerSession(connection, channel, this.logger);
    } catch (error) {
      await connection.close().catch((closeError: unknown) => {
        this.logger.warn('Failed to close half-open connection', closeError);
      });
      throw new BrokerConnectionError(`Cannot open a channel on ${target}`, { cause: error });
    }
  }
}

export class AmqpBrokerSession implements BrokerSession {
  private connectionOpen = true;
  private closing = false;
  private readonly closed: Promise<Error>;
  private deliveries: Promise<void> = Promise.resolve();

  constructor(
    private readonly connection: AmqpConnection,
    private readonly channel: Channel,
    private readonly logger: AppLogger
  ) {
    this.closed = new Promise<Error>(resolve => {
      connection.on('close', (error?: unknown) => {
        this.connectionOpen = false;
        resolve(asBrokerError(error, 'Connection closed'));
      });
      // A channel-only close (e.g. PRECONDITION_FAILED) leaves the connection up
      channel.on('close', () => {
        resolve(new BrokerConnectionError('Channel closed'));
      });
    });

    // Without listeners these would be thrown as uncaught 'error' events
    connection.on('error', (error: unknown) => this.logger.warn('Connection error', error));
    channel.on('error', (error: unknown) => this.logger.warn('Channel error', error));
    connection.on('blocked', (reason: unknown) => this.logger.warn(`Connection blocked by broker: ${String(reason)}`));
  }

  async declareTopology(topology: ConsumerTopology): Promise<void> {
    await this.channel.assertExchange(topology.exchange, 'fanout', { durable: true });
    await this.channel.assertQueue(topology.queue, { durable: true });
    await this.channel.bindQueue(topology.queue, topology.exchange, '');
    await this.channel.prefetch(1);
  }

  async consume(queue: string, listener: DeliveryListener): Promise<void> {
    await this.channel.consume(
      queue,
      message => {
        if (message === null) {
          this.logger.warn(`Consumer on '${queue}' was cancelled by the broker`);
          this.close().catch((error: unknown) => this.logger.warn('Failed to close cancelled session', error));
          return;
        }

        const delivery = this.toDelivery(message);
        this.deliveries = this.deliveries
          .then(() => listener(delivery))
          .catch((error: unknown) => this.logger.error(`Delivery ${delivery.deliveryTag} failed`, error));
      },
      { noAck: false }
    );
  }

  waitForClose(): Promise<Error> {
    return this.closed;
  }

  async close(): Promise<void> {
    if (!this.connectionOpen || this.closing) return;
    this.closing = true;
    await this.connection.close();
  }

  private toDelivery(message: ConsumeMessage): InboundDelivery {
    return {
      content: message.content,
      deliveryTag: message.fields.deliveryTag,
      redelivered: message.fields.redelivered,
      ack: () => this.settle(message, 'ack'),
      nack: () => this.settle(message, 'nack')
    };
  }

  // A closed channel makes settling throw; the broker redelivers unacked messages on reconnect.
  private settle(message: ConsumeMessage, decision: 'ack' | 'nack'): void {
    try {
      if (decision === 'ack') {
        this.channel.ack(message);
      } else {
        this.channel.nack(message, false, false);
      }
    } catch (error) {
      this.logger.warn(`Could not ${decision} delivery ${message.fields.deliveryTag}`, error);
    }
  }
}

function asBrokerError(error: unknown, fallback: string): BrokerConnectionError {
  if (error instanceof Error) {
    return new BrokerConnectionError(`${fallback}: ${error.message}`, { cause: error });
  }
  return new BrokerConnectionError(fallback);
}
