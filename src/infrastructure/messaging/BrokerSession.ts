/**
 * Broker-facing contracts of the consumer loop.
 * The amqplib implementation lives in AmqpBrokerConnector; tests supply fakes.
 */

export interface ConsumerTopology {
  /** Fan-out exchange the queue is bound to */
  readonly exchange: string;
  /** Durable queue consumed with manual acknowledgement */
  readonly queue: string;
}

export interface InboundDelivery {
  readonly content: Buffer;
  readonly deliveryTag: number;
  readonly redelivered: boolean;
  ack(): void;
  /** Negative acknowledgement without requeue */
  nack(): void;
}

export type DeliveryListener = (delivery: InboundDelivery) => Promise<void>;

export interface BrokerSession {
  declareTopology(topology: ConsumerTopology): Promise<void>;

  /**
   * Register the listener. Deliveries are handed over one at a time, in broker order.
   */
  consume(queue: string, listener: DeliveryListener): Promise<void>;

  /**
   * Resolves with the reason once the connection or channel is gone
   */
  waitForClose(): Promise<Error>;

  close(): Promise<void>;
}

export interface BrokerConnector {
  connect(): Promise<BrokerSession>;
}
