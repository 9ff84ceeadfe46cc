import { EventEmitter } from 'events';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { RabbitMQSettings } from '../../config/Configuration.js';
import { FakeLogger, silentLogger } from '../../testing/fakes.js';
import { BrokerConnectionError } from '../errors/InfrastructureError.js';
import { AmqpBrokerConnector } from './AmqpBrokerConnector.js';
import { InboundDelivery } from './BrokerSession.js';

const amqpMock = vi.hoisted(() => ({ connect: vi.fn() }));

vi.mock('amqplib', () => ({ default: { connect: amqpMock.connect } }));

const SETTINGS: RabbitMQSettings = {
  hostname: 'localhost',
  port: 5672,
  username: 'guest',
  password: 'test-secret',
  vhost: '/',
  heartbeatSeconds: 30,
  exchangeName: 'tickets',
  queueName: 'tickets_queue',
  publishExchangeName: 'tickets'
};

type OnMessage = (message: unknown) => void;

class FakeChannel extends EventEmitter {
  readonly assertExchange = vi.fn(async () => ({}));
  readonly assertQueue = vi.fn(async () => ({}));
  readonly bindQueue = vi.fn(async () => ({}));
  readonly prefetch = vi.fn(async () => ({}));
  readonly ack = vi.fn();
  readonly nack = vi.fn();
  onMessage: OnMessage | null = null;

  readonly consume = vi.fn(async (_queue: string, onMessage: OnMessage) => {
    this.onMessage = onMessage;
    return { consumerTag: 'ctag-1' };
  });
}

class FakeConnection extends EventEmitter {
  readonly channel = new FakeChannel();
  readonly createChannel = vi.fn(async () => this.channel);
  readonly close = vi.fn(async () => undefined);
}

function message(body: string, deliveryTag = 1): { content: Buffer; fields: { deliveryTag: number; redelivered: boolean } } {
  return { content: Buffer.from(body, 'utf8'), fields: { deliveryTag, redelivered: false } };
}

describe('AmqpBrokerConnector', () => {
  let connection: FakeConnection;
  let logger: FakeLogger;
  let connector: AmqpBrokerConnector;

  beforeEach(() => {
    connection = new FakeConnection();
    amqpMock.connect.mockReset();
    amqpMock.connect.mockResolvedValue(connection);
    logger = silentLogger();
    connector = new AmqpBrokerConnector(SETTINGS, logger);
  });

  it('connects with the configured credentials and heartbeat', async () => {
    await connector.connect();

    expect(amqpMock.connect).toHaveBeenCalledWith({
      protocol: 'amqp',
      hostname: 'localhost',
      port: 5672,
      username: 'guest',
      password: 'test-secret',
      vhost: '/',
      heartbeat: 30
    });
    expect(connection.createChannel).toHaveBeenCalledTimes(1);
  });

  it('wraps a refused connection', async () => {
    amqpMock.connect.mockRejectedValueOnce(new Error('ECONNREFUSED'));

    await expect(connector.connect())
      .rejects.toThrow(new BrokerConnectionError('Cannot connect to RabbitMQ at localhost:5672'));
  });

  it('closes the connection when no channel can be opened', async () => {
    connection.createChannel.mockRejectedValueOnce(new Error('channel_max reached'));

    await expect(connector.connect())
      .rejects.toThrow(new BrokerConnectionError('Cannot open a channel on localhost:5672'));
    expect(connection.close).toHaveBeenCalledTimes(1);
  });

  describe('session', () => {
    it('declares a durable fan-out topology with prefetch 1', async () => {
      const session = await connector.connect();

      await session.declareTopology({ exchange: 'tickets', queue: 'tickets_queue' });

      const { channel } = connection;
      expect(channel.assertExchange).toHaveBeenCalledWith('tickets', 'fanout', { durable: true });
      expect(channel.assertQueue).toHaveBeenCalledWith('tickets_queue', { durable: true });
      expect(channel.bindQueue).toHaveBeenCalledWith('tickets_queue', 'tickets', '');
      expect(channel.prefetch).toHaveBeenCalledWith(1);
    });

    it('hands deliveries to the listener and settles them on the channel', async () => {
      const session = await connector.connect();
      const received: InboundDelivery[] = [];
      await session.consume('tickets_queue', async delivery => {
        received.push(delivery);
      });

      const first = message('{"event_type":"a"}', 1);
      const second = message('{"event_type":"b"}', 2);
      connection.channel.onMessage?.(first);
      connection.channel.onMessage?.(second);
      await vi.waitFor(() => expect(received).toHaveLength(2));

      received[0]?.ack();
      received[1]?.nack();

      expect(connection.channel.consume).toHaveBeenCalledWith('tickets_queue', expect.any(Function), { noAck: false });
      expect(received.map(delivery => delivery.deliveryTag)).toEqual([1, 2]);
      expect(received[0]?.content.toString('utf8')).toBe('{"event_type":"a"}');
      expect(connection.channel.ack).toHaveBeenCalledWith(first);
      expect(connection.channel.nack).toHaveBeenCalledWith(second, false, false);
    });

    it('logs instead of throwing when settling on a dead channel', async () => {
      const session = await connector.connect();
      const received: InboundDelivery[] = [];
      await session.consume('tickets_queue', async delivery => {
        received.push(delivery);
      });
      connection.channel.ack.mockImplementationOnce(() => {
        throw new Error('Channel closed');
      });

      connection.channel.onMessage?.(message('{}', 7));
      await vi.waitFor(() => expect(received).toHaveLength(1));

      expect(() => received[0]?.ack()).not.toThrow();
      expect(logger.warn).toHaveBeenCalledWith('Could not ack delivery 7', expect.any(Error));
    });

    it('reports a dropped connection through waitForClose', async () => {
      const session = await connector.connect();

      connection.emit('close', new Error('heartbeat timeout'));

      const reason = await session.waitForClose();
      expect(reason).toBeInstanceOf(BrokerConnectionError);
      expect(reason.message).toBe('Connection closed: heartbeat timeout');
      await session.close();
      expect(connection.close).not.toHaveBeenCalled();
    });

    it('reports a closed channel through waitForClose and still closes the connection', async () => {
      const session = await connector.connect();

      connection.channel.emit('close');

      const reason = await session.waitForClose();
      expect(reason).toBeInstanceOf(BrokerConnectionError);
      expect(reason.message).toBe('Channel closed');
      await session.close();
      expect(connection.close).toHaveBeenCalledTimes(1);
    });

    it('closes the connection when the broker cancels the consumer', async () => {
      const session = await connector.connect();
      await session.consume('tickets_queue', async () => undefined);

      connection.channel.onMessage?.(null);

      await vi.waitFor(() => expect(connection.close).toHaveBeenCalledTimes(1));
    });

    it('closes only once', async () => {
      const session = await connector.connect();

      await session.close();
      await session.close();

      expect(connection.close).toHaveBeenCalledTimes(1);
    });
  });
});
