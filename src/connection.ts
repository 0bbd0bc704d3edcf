/**
 * Raw connection and channel helpers over amqplib.
 */

import amqp from 'amqplib';
import { RawConnection, RawChannel } from './types';
import { Logger } from './logger';

/**
 * Opens a single connection. Retrying is left to the caller.
 *
 * @param url - RabbitMQ connection URL
 * @returns Promise resolving to the connection
 */
export const openConnection = async (url: string): Promise<RawConnection> => {
  return amqp.connect(url);
};

/**
 * Creates a channel from a connection.
 *
 * @param connection - RabbitMQ connection
 * @param maxListeners - Listener limit for the new channel
 * @returns Promise resolving to the channel
 */
export const createChannel = async (connection: RawConnection, maxListeners = 100): Promise<RawChannel> => {
  const channel = await connection.createChannel();
  channel.setMaxListeners(maxListeners);
  return channel;
};

/**
 * Closes a connection, tolerating one that is already closed.
 *
 * @param connection - RabbitMQ connection to close
 * @param logger - Receives the close failure, if any
 */
export const closeConnection = async (connection: RawConnection, logger?: Logger): Promise<void> => {
  try {
    await connection.close();
  } catch (error) {
    logger?.debug('Connection already closed', { error: String(error) });
  }
};

/**
 * Closes a channel, tolerating one that is already closed.
 *
 * @param channel - RabbitMQ channel to close
 * @param logger - Receives the close failure, if any
 */
export const closeChannel = async (channel: RawChannel, logger?: Logger): Promise<void> => {
  try {
    await channel.close();
  } catch (error) {
    logger?.debug('Channel already closed', { error: String(error) });
  }
};
