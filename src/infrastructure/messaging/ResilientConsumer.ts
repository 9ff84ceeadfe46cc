import { setTimeout as delay } from 'timers/promises';
import {
  InboundEventHandler,
  InboundEventOutcome
} from '../../application/handlers/InboundEventAdapter.js';
import { AppLogger, Logger } from '../logging/Logger.js';
import { BackoffPolicy } from './BackoffPolicy.js';
import { BrokerConnector, BrokerSession, ConsumerTopology, InboundDelivery } from './BrokerSession.js';
import { decodeInboundEvent } from './InboundEventDecoder.js';

export enum ConsumerState {
  DISCONNECTED = 'DISCONNECTED',
  CONNECTING = 'CONNECTING',
  CONSUMING = 'CONSUMING',
  STOPPED = 'STOPPED'
}

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

const abortableSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) throw error;
  }
};

export interface ResilientConsumerOptions {
  readonly topology: ConsumerTopology;
  readonly backoff: BackoffPolicy;
  readonly sleep?: Sleep;
}

/**
 * Long-running consumer of the inbound fan-out queue.
 *
 * DISCONNECTED -> CONNECTING -> CONSUMING, back to DISCONNECTED whenever the
 * connection fails (then sleep with backoff and reconnect, forever), and
 * STOPPED once the abort signal fires. Deliveries are processed one at a time:
 * acked once the handler returns, rejected without requeue when the body cannot
 * be decoded or the handler throws.
 */
export class ResilientConsumer {
  private state = ConsumerState.DISCONNECTED;
  private attempt = 0;
  private awaitingFirstDelivery = false;
  private running = false;
  private readonly sleep: Sleep;

  constructor(
    private readonly connector: BrokerConnector,
    private readonly handler: InboundEventHandler,
    private readonly options: ResilientConsumerOptions,
    private readonly logger: AppLogger = new Logger().child('Consumer')
  ) {
    this.sleep = options.sleep ?? abortableSleep;
  }

  getState(): ConsumerState {
    return this.state;
  }

  /**
   * Consecutive failed connection attempts since the last delivery
   */
  getAttempt(): number {
    return this.attempt;
  }

  /**
   * Resolves only after `signal` aborts; connection failures never escape.
   */
  async run(signal: AbortSignal): Promise<void> {
    if (this.running) {
      throw new Error('Consumer is already running');
    }
    this.running = true;

    try {
      while (!signal.aborted) {
        let session: BrokerSession | null = null;
        try {
          session = await this.open();
          const reason = await this.consumeUntilClosed(session, signal);
          if (reason === null) break;
          throw reason;
        } catch (error) {
          if (signal.aborted) break;
          await this.closeSession(session);
          session = null;
          await this.backOff(error, signal);
        } finally {
          if (signal.aborted) {
            await this.closeSession(session);
          }
        }
      }
    } finally {
      this.running = false;
      this.transition(ConsumerState.STOPPED);
      this.logger.info('Consumer stopped');
    }
  }

  private async open(): Promise<BrokerSession> {
    const { topology } = this.options;
    this.transition(ConsumerState.CONNECTING);
    this.logger.info(`Connecting to broker (exchange '${topology.exchange}', queue '${topology.queue}')...`);

    const session = await this.connector.connect();
    try {
      await session.declareTopology(topology);
      this.awaitingFirstDelivery = true;
      await session.consume(topology.queue, delivery => this.onDelivery(delivery));
    } catch (error) {
      await this.closeSession(session);
      throw error;
    }

    if (this.attempt > 0) {
      this.logger.info(`Reconnected to broker after ${this.attempt} attempt(s)`);
    }
    this.transition(ConsumerState.CONSUMING);
    this.logger.info(`Consumer started, waiting for messages on queue '${topology.queue}'`);
    return session;
  }

  /**
   * Resolves with the close reason, or null when the signal aborted first
   */
  private async consumeUntilClosed(session: BrokerSession, signal: AbortSignal): Promise<Error | null> {
    let onAbort = (): void => undefined;
    const aborted = new Promise<null>(resolve => {
      onAbort = () => resolve(null);
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
    });

    try {
      return await Promise.race([session.waitForClose(), aborted]);
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  private async backOff(error: unknown, signal: AbortSignal): Promise<void> {
    this.attempt++;
    const delayMs = this.options.backoff.delayFor(this.attempt);
    this.transition(ConsumerState.DISCONNECTED);
    this.logger.warn(
      `Connection lost (${describe(error)}). Reconnection attempt ${this.attempt} in ${(delayMs / 1000).toFixed(1)}s...`
    );
    await this.sleep(delayMs, signal);
  }

  private async onDelivery(delivery: InboundDelivery): Promise<void> {
    if (this.awaitingFirstDelivery) {
      this.awaitingFirstDelivery = false;
      this.attempt = 0;
    }

    const decoded = decodeInboundEvent(delivery.content);
    if (!decoded.ok) {
      this.logger.error(`Discarding message ${delivery.deliveryTag}: ${decoded.reason}`);
      delivery.nack();
      return;
    }

    const { event } = decoded;
    let outcome: InboundEventOutcome;
    try {
      outcome = await this.handler.handle(event);
    } catch (error) {
      this.logger.error(`Error processing event ${event.eventType}`, error);
      delivery.nack();
      return;
    }

    // Drops were logged by the handler and are settled like any handled event
    delivery.ack();
    this.logger.info(`Event ${outcome.kind}: ${event.eventType}`);
  }

  private async closeSession(session: BrokerSession | null): Promise<void> {
    if (!session) return;
    try {
      await session.close();
    } catch (error) {
      this.logger.warn('Error while closing broker session', error);
    }
  }

  private transition(next: ConsumerState): void {
    if (this.state !== next) {
      this.logger.debug(`State ${this.state} -> ${next}`);
      this.state = next;
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
