#!/usr/bin/env node

/**
 * Support Ticket Service
 *
 * Consumes events from the shared fan-out exchange, applies them to tickets
 * and announces ticket changes to other services.
 */

// Configuration
import { Configuration } from './config/Configuration.js';

// Infrastructure
import { Logger } from './infrastructure/logging/Logger.js';
import { DatabaseConnectionManager } from './infrastructure/database/DatabaseConnectionManager.js';
import { MySQLTicketRepository } from './infrastructure/database/MySQLTicketRepository.js';
import { InMemoryTicketRepository } from './infrastructure/memory/InMemoryTicketRepository.js';
import { AmqpBrokerConnector } from './infrastructure/messaging/AmqpBrokerConnector.js';
import { BackoffPolicy } from './infrastructure/messaging/BackoffPolicy.js';
import { RabbitMQEventPublisher } from './infrastructure/messaging/RabbitMQEventPublisher.js';
import { ResilientConsumer } from './infrastructure/messaging/ResilientConsumer.js';

// Application
import { InboundEventAdapter } from './application/handlers/InboundEventAdapter.js';
import { DeleteTicketUseCase } from './application/useCases/index.js';
import { ITicketRepository } from './core/repositories/ITicketRepository.js';

// Constants
import { SERVICE_NAME, SERVICE_VERSION } from './constants.js';

// ============================================================================
// Service Setup
// ============================================================================

const config = new Configuration();

const logger = new Logger(config.logLevel, {
  logFilePath: config.logFile ?? undefined
});

const shutdown = new AbortController();

async function main(): Promise<void> {
  logger.info(`Starting ${SERVICE_NAME} v${SERVICE_VERSION}...`);
  config.logSummary();

  let database: DatabaseConnectionManager | null = null;
  let repository: ITicketRepository;

  if (config.database) {
    database = new DatabaseConnectionManager(config.database, logger.child('DB'));
    await database.connect();
    repository = new MySQLTicketRepository(database);
    logger.info('✓ Database ready');
  } else {
    repository = new InMemoryTicketRepository();
    logger.warn('Using the in-memory ticket store, tickets are lost on restart');
  }

  const publisher = new RabbitMQEventPublisher(config.rabbitmq, logger.child('Publisher'));
  const deleteTicket = new DeleteTicketUseCase(repository, publisher, logger.child('UseCase'));
  const adapter = new InboundEventAdapter(deleteTicket, logger.child('Adapter'));

  const consumer = new ResilientConsumer(
    new AmqpBrokerConnector(config.rabbitmq, logger.child('Broker')),
    adapter,
    {
      topology: { exchange: config.rabbitmq.exchangeName, queue: config.rabbitmq.queueName },
      backoff: new BackoffPolicy(config.retry)
    },
    logger.child('Consumer')
  );

  try {
    await consumer.run(shutdown.signal);
  } finally {
    await publisher.close().catch((error: unknown) => logger.warn('Failed to close publisher', error));
    await database?.disconnect();
  }

  logger.info('✓ Service stopped');
}

// Handle graceful shutdown
process.on('SIGINT', () => {
  logger.info('Received SIGINT, shutting down...');
  shutdown.abort();
});

process.on('SIGTERM', () => {
  logger.info('Received SIGTERM, shutting down...');
  shutdown.abort();
});

// Start service
main().catch((error: unknown) => {
  logger.error('Service failed:', error);
  process.exit(1);
});
