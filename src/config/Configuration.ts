import * as dotenv from 'dotenv';
import {
  DEFAULT_EXCHANGE_NAME,
  DEFAULT_HEARTBEAT_SECONDS,
  DEFAULT_INITIAL_RETRY_DELAY_MS,
  DEFAULT_MAX_RETRY_DELAY_MS,
  DEFAULT_QUEUE_NAME,
  DEFAULT_RETRY_BACKOFF_FACTOR
} from '../constants.js';
import { LogLevel, isLogLevel } from '../infrastructure/logging/Logger.js';

export type TicketStore = 'mysql' | 'memory';

export interface RabbitMQSettings {
  readonly hostname: string;
  readonly port: number;
  readonly username: string;
  readonly password: string;
  readonly vhost: string;
  readonly heartbeatSeconds: number;
  readonly exchangeName: string;
  readonly queueName: string;
  readonly publishExchangeName: string;
}

export interface RetrySettings {
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly backoffFactor: number;
}

export interface DatabaseSettings {
  readonly host: string;
  readonly port: number;
  readonly database: string;
  readonly user: string;
  readonly password: string;
  readonly connectionLimit: number;
}

/**
 * Application Configuration
 * Loads and validates environment variables for the broker, storage and logging
 */
export class Configuration {
  public readonly rabbitmq: RabbitMQSettings;
  public readonly retry: RetrySettings;
  public readonly ticketStore: TicketStore;
  public readonly database: DatabaseSettings | null;
  public readonly logLevel: LogLevel;
  public readonly logFile: string | null;

  private readonly env: NodeJS.ProcessEnv;

  /**
   * Without an explicit environment, `.env` from the working directory is
   * loaded into process.env first.
   */
  constructor(env?: NodeJS.ProcessEnv) {
    if (env === undefined) {
      dotenv.config();
    }
    this.env = env ?? process.env;

    this.rabbitmq = {
      hostname: this.get('RABBITMQ_HOST', 'rabbitmq'),
      port: this.getInteger('RABBITMQ_PORT', 5672),
      username: this.get('RABBITMQ_USER', 'guest'),
      password: this.get('RABBITMQ_PASSWORD', 'guest'),
      vhost: this.get('RABBITMQ_VHOST', '/'),
      heartbeatSeconds: this.getInteger('RABBITMQ_HEARTBEAT', DEFAULT_HEARTBEAT_SECONDS),
      exchangeName: this.get('RABBITMQ_EXCHANGE_NAME', DEFAULT_EXCHANGE_NAME),
      queueName: this.get('RABBITMQ_QUEUE_TICKETS', DEFAULT_QUEUE_NAME),
      publishExchangeName: this.get('RABBITMQ_PUBLISH_EXCHANGE', DEFAULT_EXCHANGE_NAME)
    };

    this.retry = {
      initialDelayMs: this.getInteger('CONSUMER_INITIAL_RETRY_DELAY_MS', DEFAULT_INITIAL_RETRY_DELAY_MS),
      maxDelayMs: this.getInteger('CONSUMER_MAX_RETRY_DELAY_MS', DEFAULT_MAX_RETRY_DELAY_MS),
      backoffFactor: this.getNumber('CONSUMER_RETRY_BACKOFF_FACTOR', DEFAULT_RETRY_BACKOFF_FACTOR)
    };

    const store = this.get('TICKET_STORE', 'mysql');
    if (store !== 'mysql' && store !== 'memory') {
      throw new Error(`Invalid TICKET_STORE: ${store} (expected "mysql" or "memory")`);
    }
    this.ticketStore = store;

    this.database = store === 'mysql'
      ? {
          host: this.getRequired('DB_HOST'),
          port: this.getInteger('DB_PORT', 3306),
          database: this.getRequired('DB_NAME'),
          user: this.getRequired('DB_USER'),
          password: this.getRequired('DB_PASSWORD'),
          connectionLimit: this.getInteger('DB_CONNECTION_LIMIT', 10)
        }
      : null;

    const logLevel = this.get('LOG_LEVEL', 'info');
    if (!isLogLevel(logLevel)) {
      throw new Error(`Invalid LOG_LEVEL: ${logLevel}`);
    }
    this.logLevel = logLevel;
    this.logFile = this.get('LOG_FILE', '') || null;

    this.validate();
  }

  /**
   * Get environment variable with default
   */
  private get(key: string, defaultValue: string): string {
    return this.env[key] || defaultValue;
  }

  /**
   * Get required environment variable
   */
  private getRequired(key: string): string {
    const value = this.env[key];
    if (!value) {
      throw new Error(`Missing required environment variable: ${key}`);
    }
    return value;
  }

  private getInteger(key: string, defaultValue: number): number {
    const raw = this.env[key];
    if (!raw) return defaultValue;

    const value = Number(raw);
    if (!Number.isInteger(value)) {
      throw new Error(`Invalid ${key}: ${raw} (expected an integer)`);
    }
    return value;
  }

  private getNumber(key: string, defaultValue: number): number {
    const raw = this.env[key];
    if (!raw) return defaultValue;

    const value = Number(raw);
    if (!Number.isFinite(value)) {
      throw new Error(`Invalid ${key}: ${raw} (expected a number)`);
    }
    return value;
  }

  private validate(): void {
    if (this.rabbitmq.port <= 0 || this.rabbitmq.port > 65535) {
      throw new Error(`Invalid RABBITMQ_PORT: ${this.rabbitmq.port}`);
    }

    if (this.retry.initialDelayMs <= 0) {
      throw new Error('CONSUMER_INITIAL_RETRY_DELAY_MS must be positive');
    }

    if (this.retry.maxDelayMs < this.retry.initialDelayMs) {
      throw new Error('CONSUMER_MAX_RETRY_DELAY_MS cannot be lower than CONSUMER_INITIAL_RETRY_DELAY_MS');
    }

    if (this.retry.backoffFactor < 1) {
      throw new Error('CONSUMER_RETRY_BACKOFF_FACTOR must be at least 1');
    }

    if (this.database && this.database.connectionLimit < 1) {
      throw new Error('DB_CONNECTION_LIMIT must be at least 1');
    }
  }

  /**
   * Log configuration (without sensitive data)
   */
  public logSummary(write: (line: string) => void = line => process.stderr.write(line + '\n')): void {
    write('[Config] Loaded configuration:');
    write(`  RabbitMQ: ${this.rabbitmq.username}:${mask(this.rabbitmq.password)}@${this.rabbitmq.hostname}:${this.rabbitmq.port}${this.rabbitmq.vhost}`);
    write(`  Consume: exchange=${this.rabbitmq.exchangeName} queue=${this.rabbitmq.queueName}`);
    write(`  Publish: exchange=${this.rabbitmq.publishExchangeName}`);
    write(`  Retry: initial=${this.retry.initialDelayMs}ms max=${this.retry.maxDelayMs}ms factor=${this.retry.backoffFactor}`);
    write(`  Ticket store: ${this.ticketStore}${this.database ? ` (${this.database.user}@${this.database.host}:${this.database.port}/${this.database.database})` : ''}`);
    write(`  Log Level: ${this.logLevel}${this.logFile ? ` -> ${this.logFile}` : ''}`);
  }
}

function mask(secret: string): string {
  return secret ? '***' + secret.slice(-2) : 'not set';
}
