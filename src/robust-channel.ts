/**
 * Robust channel: remembers QoS and the exchanges and queues declared
 * through it, and replays them when its connection is replaced.
 */

import { EventEmitter } from 'node:events';
import {
  ChannelOptions,
  DeleteQueueReply,
  EmptyReply,
  ExchangeDeleteOptions,
  ExchangeSpec,
  Qos,
  QueueDeleteOptions,
  QueueSpec,
  RawChannel,
  RawConnection,
} from './types';
import { BaseChannel, ChannelSession, EntityKind } from './channel';
import { ChannelClosedError, ConnectionLostError, UnsupportedOperationError } from './errors';
import { FutureStore } from './future-store';
import { CompletionSignal, WriteLock } from './sync';
import { Exchange } from './exchange';
import { Queue } from './queue';
import { createLogger, Logger } from './logger';

/**
 * Channel that survives connection replacement.
 *
 * Events:
 * - `reconnect` (channelNumber) after the whole replay succeeded
 * - `close` after an explicit close
 */
export class RobustChannel extends EventEmitter {
  private readonly session: BaseChannel;
  private readonly logger: Logger;
  private readonly closingSignal = new CompletionSignal();
  private readonly writeLock = new WriteLock();
  private exchanges: Map<string, Exchange> = new Map();
  private queues: Map<string, Queue> = new Map();
  private qosState: Qos = { prefetchCount: 0, prefetchSize: 0 };
  private closed = false;

  constructor(session: BaseChannel, options: { logger?: Logger } = {}) {
    super();
    this.session = session;
    this.logger = options.logger ?? createLogger();

    session.onClose(() => this.closingSignal.resolve());
    session.onDelete((kind, name) => this.forget(kind, name));
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get channelNumber(): number {
    return this.session.channelNumber;
  }

  /**
   * QoS that is applied on every (re)open.
   */
  get qos(): Qos {
    return { ...this.qosState };
  }

  /**
   * Settles when the raw channel of the current lifetime has closed.
   * Rejects with ConnectionLostError if the connection is replaced first.
   */
  get closing(): Promise<void> {
    return this.closingSignal.promise;
  }

  get futures(): FutureStore {
    return this.session.futures;
  }

  getRawChannel(): RawChannel | null {
    return this.session.getRawChannel();
  }

  /**
   * Exchanges that will be re-declared after a reconnect.
   */
  getExchanges(): Map<string, Exchange> {
    return new Map(this.exchanges);
  }

  /**
   * Queues that will be re-declared after a reconnect.
   */
  getQueues(): Map<string, Queue> {
    return new Map(this.queues);
  }

  getExchange(name: string): Exchange | undefined {
    return this.exchanges.get(name);
  }

  getQueue(name: string): Queue | undefined {
    return this.queues.get(name);
  }

  /**
   * Moves the channel onto a new connection: fails everything pending,
   * re-opens, reapplies QoS, then restores exchanges before queues.
   * The first failing step aborts the replay and is rethrown. A close
   * that lands during the replay wins: the new raw channel is closed
   * again and `reconnect` is not emitted.
   *
   * @param connection - Replacement connection
   * @param channelNumber - Channel number on the new connection
   */
  async onReconnect(connection: RawConnection, channelNumber: number): Promise<void> {
    if (this.closed) {
      this.logger.debug('Skipping reconnect of closed channel', { channel: this.channelNumber });
      return;
    }

    const error = new ConnectionLostError('Connection replaced during reconnect');

    this.closingSignal.replace(error);
    this.futures.rejectAll(error);
    this.session.attach(connection, channelNumber);

    this.logger.info('Reconnecting channel', {
      channel: channelNumber,
      exchanges: this.exchanges.size,
      queues: this.queues.size,
    });

    let restored = false;
    try {
      restored = await this.replay();
    } catch (failure) {
      if (! this.closed) {
        throw failure;
      }
    }

    if (! restored) {
      await this.discardReplay(channelNumber);
      return;
    }

    this.logger.info('Channel reconnected', { channel: channelNumber });
    this.emit('reconnect', channelNumber);
  }

  /**
   * Re-opens and restores entities. Returns false as soon as the channel
   * turns out to have been closed meanwhile.
   */
  private async replay(): Promise<boolean> {
    await this.initialize();
    if (this.closed) {
      return false;
    }

    for (const exchange of Array.from(this.exchanges.values())) {
      await exchange.onReconnect(this.session);
      this.logger.debug('Exchange restored', { exchange: exchange.getName() });
      if (this.closed) {
        return false;
      }
    }

    for (const queue of Array.from(this.queues.values())) {
      try {
        await queue.onReconnect(this.session);
      } finally {
        // Broker-named queues come back under a new name.
        this.rekeyQueue(queue);
      }
      this.logger.debug('Queue restored', { queue: queue.getName() });
      if (this.closed) {
        return false;
      }
    }

    return true;
  }

  /**
   * Closes the raw channel a replay opened after the channel was closed.
   */
  private async discardReplay(channelNumber: number): Promise<void> {
    if (this.session.isOpen) {
      await this.session.close();
    }
    this.session.release();
    this.logger.info('Channel closed during reconnect', { channel: channelNumber });
  }

  /**
   * Opens the raw channel and applies the remembered QoS.
   *
   * @returns The raw amqplib channel
   */
  async initialize(timeout?: number): Promise<RawChannel> {
    if (this.closed) {
      throw new ChannelClosedError(`Channel ${this.channelNumber} is closed`);
    }

    const channel = await this.session.open(timeout);
    const { prefetchCount, prefetchSize } = this.qosState;

    await this.setQos(prefetchCount, prefetchSize);

    return channel;
  }

  /**
   * Sets channel QoS. The values are remembered before the broker is asked,
   * so a reconnect replays the latest request.
   *
   * @throws UnsupportedOperationError if allChannels is set
   */
  async setQos(prefetchCount = 0, prefetchSize = 0, allChannels = false, timeout?: number): Promise<void> {
    if (allChannels) {
      throw new UnsupportedOperationError('QoS for all channels cannot be restored after a reconnect');
    }
    if (! Number.isInteger(prefetchCount) || prefetchCount < 0) {
      throw new RangeError(`Invalid prefetch count: ${prefetchCount}`);
    }
    if (! Number.isInteger(prefetchSize) || prefetchSize < 0) {
      throw new RangeError(`Invalid prefetch size: ${prefetchSize}`);
    }

    this.qosState = { prefetchCount, prefetchSize };

    await this.session.setQos(prefetchCount, prefetchSize, false, timeout);
  }

  /**
   * Closes the channel. Calling it again is a no-op.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    const closedNow = await this.writeLock.runExclusive(async () => {
      if (this.closed) {
        return false;
      }

      this.closed = true;

      if (! this.session.isOpen) {
        this.closingSignal.resolve();
      }

      await this.session.close();
      await this.closingSignal.promise;
      this.session.release();
      this.futures.detach();
      return true;
    });

    if (closedNow) {
      this.logger.info('Channel closed', { channel: this.channelNumber });
      this.emit('close');
    }
  }

  /**
   * Declares an exchange. It is remembered for recovery unless it is
   * internal or declared with `robust: false`.
   */
  async declareExchange(name: string, spec: ExchangeSpec = {}): Promise<Exchange> {
    const exchange = await this.session.declareExchange(name, spec);

    if (! spec.internal && spec.robust !== false) {
      this.exchanges.set(name, exchange);
    }

    return exchange;
  }

  async exchangeDelete(name: string, options: ExchangeDeleteOptions = {}): Promise<EmptyReply | undefined> {
    const result = await this.session.deleteExchange(name, options);
    this.exchanges.delete(name);
    return result;
  }

  /**
   * Declares a queue. It is remembered for recovery under the name the
   * broker returned, unless declared with `robust: false`.
   *
   * @param name - Queue name, or '' for a broker-generated one
   */
  async declareQueue(name = '', spec: QueueSpec = {}): Promise<Queue> {
    const queue = await this.session.declareQueue(name, spec);

    if (spec.robust !== false) {
      this.queues.set(queue.getName(), queue);
    }

    return queue;
  }

  async queueDelete(name: string, options: QueueDeleteOptions = {}): Promise<DeleteQueueReply | undefined> {
    const result = await this.session.deleteQueue(name, options);
    this.dropQueue(name);
    return result;
  }

  private rekeyQueue(queue: Queue): void {
    this.queues = new Map(
      Array.from(this.queues, ([key, entry]): [string, Queue] => [entry === queue ? queue.getName() : key, entry])
    );
  }

  /**
   * Removes a queue by key and by current name, which differ when a replay
   * renamed a broker-named queue.
   */
  private dropQueue(name: string): boolean {
    let removed = this.queues.delete(name);
    for (const [key, queue] of Array.from(this.queues)) {
      if (queue.getName() === name) {
        this.queues.delete(key);
        removed = true;
      }
    }
    return removed;
  }

  private forget(kind: EntityKind, name: string): void {
    const removed = kind === 'exchange' ? this.exchanges.delete(name) : this.dropQueue(name);
    if (removed) {
      this.logger.debug('Dropped from recovery', { kind, name });
    }
  }
}

/**
 * Creates a robust channel on an amqplib connection. The channel tracks its
 * requests in a child of `futures`.
 *
 * @param connection - Current connection
 * @param futures - The connection's future store
 * @param options - Channel options
 */
export const createRobustChannel = (
  connection: RawConnection,
  futures: FutureStore,
  options: ChannelOptions = {}
): RobustChannel => {
  const logger = options.logger ?? createLogger();
  const session = new ChannelSession(connection, futures.getChild(), { ...options, logger });
  return new RobustChannel(session, { logger });
};
