import { RetrySettings } from '../../config/Configuration.js';

/**
 * Bounded exponential backoff for broker reconnection.
 * delay(attempt) = min(initialDelay * factor^attempt, maxDelay); attempts start at 1.
 */
export class BackoffPolicy {
  constructor(private readonly settings: RetrySettings) {}

  delayFor(attempt: number): number {
    const raw = this.settings.initialDelayMs * Math.pow(this.settings.backoffFactor, attempt);
    return Math.min(raw, this.settings.maxDelayMs);
  }
}
