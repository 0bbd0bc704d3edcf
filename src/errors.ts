/**
 * Typed errors raised by the robust channel layer.
 *
 * Each error carries a machine-readable `code`. Broker errors coming back
 * from amqplib (declaration or delete rejected) are not wrapped.
 */

export type ChannelErrorCode =
  | 'CONNECTION_LOST'
  | 'UNSUPPORTED_OPERATION'
  | 'CHANNEL_CLOSED'
  | 'TIMEOUT';

export class ChannelError extends Error {
  readonly code: ChannelErrorCode;

  constructor(code: ChannelErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
  }
}

/**
 * The connection under a pending operation was replaced. The broker-side
 * outcome of the operation is unknown and should be treated as not having
 * happened.
 */
export class ConnectionLostError extends ChannelError {
  constructor(message = 'Connection lost', options?: ErrorOptions) {
    super('CONNECTION_LOST', message, options);
  }
}

/**
 * The request cannot be replayed after a reconnect and is refused.
 */
export class UnsupportedOperationError extends ChannelError {
  constructor(message: string) {
    super('UNSUPPORTED_OPERATION', message);
  }
}

/**
 * No raw channel is open, or the channel was closed on purpose.
 */
export class ChannelClosedError extends ChannelError {
  constructor(message = 'Channel is closed') {
    super('CHANNEL_CLOSED', message);
  }
}

export class OperationTimeoutError extends ChannelError {
  readonly timeout: number;

  constructor(operation: string, timeout: number) {
    super('TIMEOUT', `${operation} timed out after ${timeout}ms`);
    this.timeout = timeout;
  }
}
