/**
 * Shared constants for the support ticket service
 */

// Admin response limits
export const RESPONSE_TEXT_MAX_LENGTH = 2000; // Unicode code points

// Consumer reconnection defaults
export const DEFAULT_INITIAL_RETRY_DELAY_MS = 1000;
export const DEFAULT_MAX_RETRY_DELAY_MS = 60000;
export const DEFAULT_RETRY_BACKOFF_FACTOR = 2;

// Broker defaults
export const DEFAULT_EXCHANGE_NAME = 'tickets';
export const DEFAULT_QUEUE_NAME = 'tickets_queue';
export const DEFAULT_HEARTBEAT_SECONDS = 30;

// Inbound event types this service reacts to
export const ASSIGNMENT_DELETED_EVENT = 'assignment.deleted';

// Service info
export const SERVICE_NAME = 'support-ticket-service';
export const SERVICE_VERSION = '1.0.0';
