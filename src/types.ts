/**
 * Type definitions for the robust channel layer.
 * Wraps amqplib's raw handles and describes the declaration options the
 * recovery layer remembers.
 */

import amqp from 'amqplib';
import type { Logger } from './logger';
import type { BaseChannel } from './channel';
import type { Exchange } from './exchange';
import type { Queue } from './queue';

/**
 * Supported RabbitMQ exchange types.
 */
export type ExchangeType = 'direct' | 'topic' | 'fanout' | 'headers';

/**
 * Exchange declaration options.
 */
export interface ExchangeSpec {
  /** Type of exchange. Default: 'direct'. */
  type?: ExchangeType;
  /** Whether exchange should survive broker restart. Default: true. */
  durable?: boolean;
  /** Whether exchange should be deleted when no longer in use. Default: false. */
  autoDelete?: boolean;
  /** Broker-managed exchange that clients cannot publish to. Never recovered. Default: false. */
  internal?: boolean;
  /** Only check that the exchange exists. Default: false. */
  passive?: boolean;
  /** Alternate exchange for unrouteable messages. Default: undefined. */
  alternateExchange?: string;
  /** Additional exchange arguments. */
  arguments?: Record<string, unknown>;
  /** Milliseconds to wait for the broker's reply. */
  timeout?: number;
  /** Re-declare the exchange after a reconnect. Default: true. */
  robust?: boolean;
}

/**
 * Queue declaration options.
 */
export interface QueueSpec {
  /** Whether queue should survive broker restart. Default: true. */
  durable?: boolean;
  /** Whether queue should be deleted when no longer in use. Default: false. */
  autoDelete?: boolean;
  /** Whether queue is exclusive to this connection. Default: false. */
  exclusive?: boolean;
  /** Only check that the queue exists. Default: false. */
  passive?: boolean;
  /** Maximum message priority. Default: undefined (no priorities). */
  maxPriority?: number;
  /** Per-message time to live in milliseconds. */
  messageTtl?: number;
  /** Queue expiration time in milliseconds. */
  expires?: number;
  /** Dead-letter exchange. */
  deadLetterExchange?: string;
  /** Dead-letter routing key. */
  deadLetterRoutingKey?: string;
  /** Additional queue arguments. */
  arguments?: Record<string, unknown>;
  /** Milliseconds to wait for the broker's reply. */
  timeout?: number;
  /** Re-declare the queue, its bindings and consumers after a reconnect. Default: true. */
  robust?: boolean;
}

export interface ExchangeDeleteOptions {
  ifUnused?: boolean;
  /** Do not wait for the broker to confirm the delete. */
  nowait?: boolean;
  timeout?: number;
}

export interface QueueDeleteOptions {
  ifUnused?: boolean;
  ifEmpty?: boolean;
  /** Do not wait for the broker to confirm the delete. */
  nowait?: boolean;
  timeout?: number;
}

/**
 * Consumer options. The consumer tag is generated when omitted and reused
 * when the consumer is restored after a reconnect.
 */
export interface ConsumeOptions {
  consumerTag?: string;
  noAck?: boolean;
  noLocal?: boolean;
  exclusive?: boolean;
  arguments?: Record<string, unknown>;
  timeout?: number;
}

/**
 * Channel-level prefetch settings.
 */
export interface Qos {
  prefetchCount: number;
  prefetchSize: number;
}

/**
 * Consumer event object passed to callback.
 */
export interface ConsumerEvent {
  metadata: MessageMetadata;
  /** Acknowledges the message on the channel it was delivered on. */
  ack: () => void;
  nack: (requeue?: boolean) => void;
  original: RawMessage;
}

/**
 * Consumer callback function.
 * Message content is parsed from JSON when possible.
 */
export type ConsumerCallback = (message: unknown, event: ConsumerEvent) => Promise<void> | void;

/**
 * Metadata associated with a consumed message.
 */
export interface MessageMetadata {
  deliveryTag: number;
  redelivered: boolean;
  exchange: string;
  routingKey: string;
  consumerTag: string;
  headers?: Record<string, unknown>;
  properties: amqp.MessageProperties;
}

/**
 * Something that can re-assert its own broker-side state on a freshly
 * opened channel.
 */
export interface RecoveryHook {
  onReconnect(channel: BaseChannel): Promise<void>;
}

/**
 * Builds the entity objects a channel hands out on declare.
 */
export interface EntityFactory {
  createExchange(channel: BaseChannel, name: string, spec: ExchangeSpec): Exchange;
  createQueue(channel: BaseChannel, name: string, spec: QueueSpec): Queue;
}

/**
 * Options for a single channel.
 */
export interface ChannelOptions {
  /** Channel number assigned by the connection. Default: 1. */
  channelNumber?: number;
  /** Default: robust exchanges and queues. */
  entityFactory?: EntityFactory;
  /** Listener limit set on each raw channel. Default: 100. */
  maxListeners?: number;
  logger?: Logger;
}

/**
 * Options for a robust connection.
 */
export interface ConnectionOptions {
  /** Listener limit set on each raw channel. Default: 100. */
  maxListeners?: number;
  logger?: Logger;
}

export type RawMessage = amqp.ConsumeMessage;

export type RawConnection = Awaited<ReturnType<typeof amqp.connect>>;

export type RawChannel = amqp.Channel;

export type EmptyReply = amqp.Replies.Empty;

export type DeleteQueueReply = amqp.Replies.DeleteQueue;
