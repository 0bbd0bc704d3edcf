/**
 * Connection-side driver of channel recovery.
 * Hands out robust channels and moves them onto a replacement connection.
 * Deciding when and how to reconnect is left to the caller.
 */

import { EventEmitter } from 'node:events';
import { ChannelOptions, ConnectionOptions, RawConnection } from './types';
import { ChannelClosedError, ConnectionLostError } from './errors';
import { FutureStore } from './future-store';
import { RobustChannel, createRobustChannel } from './robust-channel';
import { openConnection, closeConnection } from './connection';
import { createLogger, Logger } from './logger';

/**
 * Owns the connection-level future store and the channels opened on it.
 *
 * Events:
 * - `disconnect` when the current raw connection closes unexpectedly
 * - `reconnect` after every channel was restored
 * - `close` after an explicit close
 */
export class RobustConnection extends EventEmitter {
  readonly futures: FutureStore = new FutureStore();
  private connection: RawConnection;
  private readonly channels: Set<RobustChannel> = new Set();
  private nextChannelNumber = 1;
  private closed = false;
  private readonly maxListeners: number;
  private readonly logger: Logger;

  constructor(connection: RawConnection, options: ConnectionOptions = {}) {
    super();
    this.connection = connection;
    this.maxListeners = options.maxListeners ?? 100;
    this.logger = options.logger ?? createLogger();
    this.watch(connection);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  getConnection(): RawConnection {
    return this.connection;
  }

  /**
   * Open channels, in creation order.
   */
  getChannels(): RobustChannel[] {
    return Array.from(this.channels);
  }

  /**
   * Opens a robust channel on the current connection.
   *
   * @throws ChannelClosedError if the connection was closed
   */
  async channel(options: Pick<ChannelOptions, 'entityFactory'> = {}): Promise<RobustChannel> {
    if (this.closed) {
      throw new ChannelClosedError('Connection is closed');
    }

    const channel = createRobustChannel(this.connection, this.futures, {
      ...options,
      channelNumber: this.nextChannelNumber++,
      maxListeners: this.maxListeners,
      logger: this.logger,
    });

    this.channels.add(channel);
    channel.once('close', () => this.channels.delete(channel));

    try {
      await channel.initialize();
    } catch (error) {
      this.channels.delete(channel);
      throw error;
    }

    return channel;
  }

  /**
   * Fails everything pending on the old connection, then moves every open
   * channel onto the new one, one after another in creation order. Channel numbers are reassigned from 1.
   * The first channel that fails to recover aborts the call.
   *
   * @param connection - Replacement connection
   */
  async reconnect(connection: RawConnection): Promise<void> {
    if (this.closed) {
      throw new ChannelClosedError('Connection is closed');
    }

    this.futures.rejectAll(new ConnectionLostError('Connection replaced during reconnect'));
    this.connection = connection;
    this.watch(connection);
    this.nextChannelNumber = 1;

    this.logger.info('Restoring channels on new connection', { channels: this.channels.size });

    for (const channel of Array.from(this.channels)) {
      await channel.onReconnect(connection, this.nextChannelNumber++);
    }

    this.emit('reconnect');
  }

  /**
   * Closes every channel, then the connection. Calling it again is a no-op.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;

    for (const channel of Array.from(this.channels)) {
      await channel.close();
    }

    await closeConnection(this.connection, this.logger);
    this.logger.info('Connection closed');
    this.emit('close');
  }

  private watch(connection: RawConnection): void {
    connection.on('error', (err: Error) => this.logger.error('Connection error', err));
    connection.once('close', () => {
      if (this.closed || this.connection !== connection) {
        return;
      }
      this.logger.warn('Connection lost', { channels: this.channels.size });
      this.emit('disconnect');
    });
  }
}

/**
 * Opens a connection and wraps it for channel recovery.
 *
 * @param url - RabbitMQ connection URL
 * @param options - Connection options
 * @returns Promise resolving to the robust connection
 */
export const connect = async (url: string, options: ConnectionOptions = {}): Promise<RobustConnection> => {
  const connection = await openConnection(url);
  return new RobustConnection(connection, options);
};
