/**
 * Infrastructure failures (storage, broker).
 * Wrap the underlying library error as `cause` so it stays inspectable.
 */
export class InfrastructureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class PersistenceError extends InfrastructureError {}

export class EventPublishError extends InfrastructureError {
  public readonly eventType: string;

  constructor(eventType: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.eventType = eventType;
  }
}

export class BrokerConnectionError extends InfrastructureError {}
