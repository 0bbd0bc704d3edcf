/**
 * Base channel: the raw amqplib channel of one connection lifetime and the
 * broker primitives spoken over it.
 */

import { EventEmitter } from 'node:events';
import {
  ChannelOptions,
  DeleteQueueReply,
  EmptyReply,
  EntityFactory,
  ExchangeDeleteOptions,
  ExchangeSpec,
  QueueDeleteOptions,
  QueueSpec,
  RawChannel,
  RawConnection,
} from './types';
import { ChannelClosedError } from './errors';
import { FutureStore } from './future-store';
import { createChannel, closeChannel } from './connection';
import { robustEntityFactory } from './factory';
import { withTimeout } from './sync';
import { createLogger, Logger } from './logger';
import type { Exchange } from './exchange';
import type { Queue } from './queue';

export type EntityKind = 'exchange' | 'queue';

/**
 * Primitives the recovery layer drives. Entities talk to the broker through
 * `call`, so their requests are tracked and failed together with the channel's.
 */
export interface BaseChannel {
  readonly futures: FutureStore;
  readonly channelNumber: number;
  readonly isOpen: boolean;
  getRawChannel(): RawChannel | null;
  attach(connection: RawConnection, channelNumber: number): void;
  open(timeout?: number): Promise<RawChannel>;
  close(): Promise<void>;
  release(): void;
  call<T>(fn: (channel: RawChannel) => Promise<T>, timeout?: number, operation?: string): Promise<T>;
  declareExchange(name: string, spec?: ExchangeSpec): Promise<Exchange>;
  deleteExchange(name: string, options?: ExchangeDeleteOptions): Promise<EmptyReply | undefined>;
  declareQueue(name: string, spec?: QueueSpec): Promise<Queue>;
  deleteQueue(name: string, options?: QueueDeleteOptions): Promise<DeleteQueueReply | undefined>;
  setQos(prefetchCount: number, prefetchSize: number, global?: boolean, timeout?: number): Promise<void>;
  onClose(listener: () => void): void;
  onDelete(listener: (kind: EntityKind, name: string) => void): void;
}

/**
 * amqplib-backed channel session.
 *
 * Emits `close` once the raw channel of the current lifetime has closed and
 * `delete` after an exchange or queue delete went through.
 */
export class ChannelSession extends EventEmitter implements BaseChannel {
  readonly futures: FutureStore;
  private connection: RawConnection;
  private number: number;
  private channel: RawChannel | null = null;
  private readonly factory: EntityFactory;
  private readonly maxListeners: number;
  private readonly logger: Logger;

  constructor(connection: RawConnection, futures: FutureStore, options: ChannelOptions = {}) {
    super();
    this.connection = connection;
    this.futures = futures;
    this.number = options.channelNumber ?? 1;
    this.factory = options.entityFactory ?? robustEntityFactory;
    this.maxListeners = options.maxListeners ?? 100;
    this.logger = options.logger ?? createLogger();
  }

  get channelNumber(): number {
    return this.number;
  }

  get isOpen(): boolean {
    return this.channel !== null;
  }

  getConnection(): RawConnection {
    return this.connection;
  }

  getRawChannel(): RawChannel | null {
    return this.channel;
  }

  /**
   * Adopts a new connection. The raw channel of the previous one is dropped
   * without a close request; it died with its connection.
   */
  attach(connection: RawConnection, channelNumber: number): void {
    this.connection = connection;
    this.number = channelNumber;
    this.channel = null;
  }

  async open(timeout?: number): Promise<RawChannel> {
    const channel = await withTimeout(
      this.futures.wrap(createChannel(this.connection, this.maxListeners)),
      timeout,
      'channel.open'
    );

    this.channel = channel;
    channel.once('close', () => this.handleClosed(channel));
    channel.on('error', (err: Error) => this.logger.error('Channel error', err));

    this.logger.debug('Channel opened', { channel: this.number });
    return channel;
  }

  /**
   * Requests the raw channel to close. Resolves once it has.
   */
  async close(): Promise<void> {
    const channel = this.channel;
    if (! channel) {
      return;
    }

    await closeChannel(channel, this.logger);
    this.handleClosed(channel);
  }

  release(): void {
    this.channel = null;
  }

  /**
   * Runs a broker request on the current raw channel. The request is tracked
   * in this channel's future store and bounded by `timeout` when given.
   *
   * @throws ChannelClosedError if no raw channel is open
   */
  async call<T>(fn: (channel: RawChannel) => Promise<T>, timeout?: number, operation = 'channel request'): Promise<T> {
    const channel = this.channel;
    if (! channel) {
      throw new ChannelClosedError(`Channel ${this.number} is not open`);
    }

    return withTimeout(this.futures.wrap(fn(channel)), timeout, operation);
  }

  async declareExchange(name: string, spec: ExchangeSpec = {}): Promise<Exchange> {
    const exchange = this.factory.createExchange(this, name, spec);
    await exchange.declare();
    return exchange;
  }

  async deleteExchange(name: string, options: ExchangeDeleteOptions = {}): Promise<EmptyReply | undefined> {
    const { ifUnused = false, nowait = false, timeout } = options;
    const request = this.call((channel) => channel.deleteExchange(name, { ifUnused }), timeout, 'exchange.delete');

    if (nowait) {
      void request.catch((error: unknown) => {
        this.logger.warn('Exchange delete failed', { exchange: name, error: String(error) });
      });
      this.emit('delete', 'exchange', name);
      return undefined;
    }

    const reply = await request;
    this.emit('delete', 'exchange', name);
    return reply;
  }

  /**
   * Declares a queue. An empty name lets the broker generate one; the
   * returned queue carries it.
   */
  async declareQueue(name: string, spec: QueueSpec = {}): Promise<Queue> {
    const queue = this.factory.createQueue(this, name, spec);
    await queue.declare();
    return queue;
  }

  async deleteQueue(name: string, options: QueueDeleteOptions = {}): Promise<DeleteQueueReply | undefined> {
    const { ifUnused = false, ifEmpty = false, nowait = false, timeout } = options;
    const request = this.call((channel) => channel.deleteQueue(name, { ifUnused, ifEmpty }), timeout, 'queue.delete');

    if (nowait) {
      void request.catch((error: unknown) => {
        this.logger.warn('Queue delete failed', { queue: name, error: String(error) });
      });
      this.emit('delete', 'queue', name);
      return undefined;
    }

    const reply = await request;
    this.emit('delete', 'queue', name);
    return reply;
  }

  /**
   * Applies basic.qos. amqplib sends only the prefetch count, so a nonzero
   * prefetch size is logged and left out.
   */
  async setQos(prefetchCount: number, prefetchSize: number, global = false, timeout?: number): Promise<void> {
    if (prefetchSize !== 0) {
      this.logger.warn('Prefetch size is not supported by the client, ignoring it', { prefetchSize });
    }

    await this.call((channel) => channel.prefetch(prefetchCount, global), timeout, 'basic.qos');
    this.logger.debug('QoS applied', { channel: this.number, prefetchCount, global });
  }

  onClose(listener: () => void): void {
    this.on('close', listener);
  }

  onDelete(listener: (kind: EntityKind, name: string) => void): void {
    this.on('delete', listener);
  }

  private handleClosed(channel: RawChannel): void {
    if (this.channel !== channel) {
      return;
    }

    this.channel = null;
    this.logger.debug('Channel closed', { channel: this.number });
    this.emit('close');
  }
}
