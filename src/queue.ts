/**
 * Queue abstraction for RabbitMQ.
 * Handles queue declaration, bindings, consumers and recovery.
 */

import amqp from 'amqplib';
import {
  ConsumeOptions,
  ConsumerCallback,
  ConsumerEvent,
  DeleteQueueReply,
  EmptyReply,
  MessageMetadata,
  QueueDeleteOptions,
  QueueSpec,
  RawChannel,
  RawMessage,
  RecoveryHook,
} from './types';
import type { BaseChannel } from './channel';
import type { Exchange } from './exchange';

export interface QueueBinding {
  exchange: string;
  routingKey: string;
  arguments: Record<string, unknown>;
}

export interface QueueConsumer {
  callback: ConsumerCallback;
  options: ConsumeOptions & { consumerTag: string };
}

const bindingKey = (exchange: string, routingKey: string): string => JSON.stringify([exchange, routingKey]);

/**
 * Represents a RabbitMQ queue declared on a channel.
 * After a reconnect it re-declares itself, nothing more.
 */
export class Queue implements RecoveryHook {
  protected channel: BaseChannel;
  private name: string;
  private readonly requestedName: string;
  private readonly spec: QueueSpec;

  /**
   * @param name - Queue name. An empty name asks the broker to generate one on declare.
   */
  constructor(channel: BaseChannel, name: string, spec: QueueSpec = {}) {
    this.channel = channel;
    this.name = name;
    this.requestedName = name;
    this.spec = spec;
  }

  /**
   * Gets the queue name. For broker-named queues this is the name returned
   * by the last declare.
   */
  getName(): string {
    return this.name;
  }

  getSpec(): QueueSpec {
    return this.spec;
  }

  isDurable(): boolean {
    return this.spec.durable !== false;
  }

  isExclusive(): boolean {
    return this.spec.exclusive === true;
  }

  /**
   * Checks if the broker picks this queue's name.
   */
  isServerNamed(): boolean {
    return this.requestedName === '';
  }

  getDeadLetterExchange(): string | undefined {
    return this.spec.deadLetterExchange;
  }

  /**
   * Declares the queue with the configured specification, or only checks
   * that it exists when the spec is passive.
   *
   * @returns The queue name the broker reports
   */
  async declare(): Promise<string> {
    const {
      durable = true,
      autoDelete = false,
      exclusive = false,
      passive = false,
      maxPriority,
      messageTtl,
      expires,
      deadLetterExchange,
      deadLetterRoutingKey,
      arguments: args = {},
      timeout,
    } = this.spec;

    if (passive) {
      const ok = await this.channel.call((channel) => channel.checkQueue(this.name), timeout, 'queue.declare');
      this.name = ok.queue;
      return this.name;
    }

    const queueArgs: Record<string, unknown> = { ...args };

    if (maxPriority !== undefined) {
      queueArgs['x-max-priority'] = maxPriority;
    }
    if (messageTtl !== undefined) {
      queueArgs['x-message-ttl'] = messageTtl;
    }
    if (expires !== undefined) {
      queueArgs['x-expires'] = expires;
    }
    if (deadLetterExchange !== undefined) {
      queueArgs['x-dead-letter-exchange'] = deadLetterExchange;
    }
    if (deadLetterRoutingKey !== undefined) {
      queueArgs['x-dead-letter-routing-key'] = deadLetterRoutingKey;
    }

    // Broker-named queues ask for a fresh name on every declare.
    const ok = await this.channel.call(
      (channel) =>
        channel.assertQueue(this.requestedName, {
          durable,
          autoDelete,
          exclusive,
          arguments: queueArgs,
        }),
      timeout,
      'queue.declare'
    );

    this.name = ok.queue;
    return this.name;
  }

  /**
   * Binds the queue to an exchange.
   *
   * @param exchange - Exchange or its name
   * @param routingKey - Routing key to bind with. Default: the queue name.
   * @param args - Binding arguments
   */
  async bind(exchange: Exchange | string, routingKey?: string, args: Record<string, unknown> = {}): Promise<EmptyReply> {
    const exchangeName = typeof exchange === 'string' ? exchange : exchange.getName();
    const key = routingKey ?? this.name;
    return this.channel.call(
      (channel) => channel.bindQueue(this.name, exchangeName, key, args),
      undefined,
      'queue.bind'
    );
  }

  async unbind(exchange: Exchange | string, routingKey?: string, args: Record<string, unknown> = {}): Promise<EmptyReply> {
    const exchangeName = typeof exchange === 'string' ? exchange : exchange.getName();
    const key = routingKey ?? this.name;
    return this.channel.call(
      (channel) => channel.unbindQueue(this.name, exchangeName, key, args),
      undefined,
      'queue.unbind'
    );
  }

  /**
   * Starts a consumer on the queue.
   * Callback receives the parsed message and an event with metadata, ack and nack.
   *
   * @returns The consumer tag
   */
  async consume(callback: ConsumerCallback, options: ConsumeOptions = {}): Promise<string> {
    const {
      consumerTag = `consumer-${Date.now()}-${Math.random().toString(36).slice(2)}`,
      noAck = false,
      noLocal = false,
      exclusive = false,
      arguments: args,
      timeout,
    } = options;

    const ok = await this.channel.call(
      (channel) =>
        channel.consume(
          this.name,
          (msg) => {
            if (! msg) {
              return;
            }
            this.dispatch(channel, msg, callback, noAck);
          },
          { consumerTag, noAck, noLocal, exclusive, arguments: args }
        ),
      timeout,
      'basic.consume'
    );

    return ok.consumerTag;
  }

  async cancel(consumerTag: string, timeout?: number): Promise<EmptyReply> {
    return this.channel.call((channel) => channel.cancel(consumerTag), timeout, 'basic.cancel');
  }

  /**
   * Purges the queue of all messages.
   *
   * @returns Promise resolving with the number of messages purged
   */
  async purge(): Promise<number> {
    const ok = await this.channel.call((channel) => channel.purgeQueue(this.name), undefined, 'queue.purge');
    return ok.messageCount;
  }

  async getMessageCount(): Promise<number> {
    const ok = await this.channel.call((channel) => channel.checkQueue(this.name), undefined, 'queue.declare');
    return ok.messageCount;
  }

  /**
   * Deletes the queue. It is dropped from the channel's recovery set.
   * WARNING: This is permanent.
   */
  async delete(options: QueueDeleteOptions = {}): Promise<DeleteQueueReply | undefined> {
    return this.channel.deleteQueue(this.name, options);
  }

  getChannel(): BaseChannel {
    return this.channel;
  }

  async onReconnect(channel: BaseChannel): Promise<void> {
    this.channel = channel;
    await this.declare();
  }

  /**
   * Delivery tags belong to the raw channel the message arrived on, so
   * ack and nack are bound to it rather than to the current one.
   */
  private dispatch(channel: RawChannel, msg: RawMessage, callback: ConsumerCallback, noAck: boolean): void {
    const ack = () => {
      if (! noAck) channel.ack(msg);
    };
    const nack = (requeue = true) => {
      if (! noAck) channel.nack(msg, false, requeue);
    };

    const event: ConsumerEvent = {
      metadata: this.parseMessageMetadata(msg),
      ack,
      nack,
      original: msg,
    };

    Promise.resolve()
      .then(() => callback(this.parseMessageContent(msg.content), event))
      .catch(() => {
        // If callback throws, nack with requeue
        nack(true);
      });
  }

  private parseMessageContent(content: Buffer): unknown {
    const text = content.toString('utf-8');
    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  }

  private parseMessageMetadata(msg: amqp.ConsumeMessage): MessageMetadata {
    return {
      deliveryTag: msg.fields.deliveryTag,
      redelivered: msg.fields.redelivered,
      exchange: msg.fields.exchange,
      routingKey: msg.fields.routingKey,
      consumerTag: msg.fields.consumerTag,
      headers: msg.properties.headers,
      properties: msg.properties,
    };
  }
}

/**
 * Queue that also restores its bindings and consumers after a reconnect.
 */
export class RobustQueue extends Queue {
  private readonly bindings: Map<string, QueueBinding> = new Map();
  private readonly consumers: Map<string, QueueConsumer> = new Map();

  async bind(exchange: Exchange | string, routingKey?: string, args: Record<string, unknown> = {}): Promise<EmptyReply> {
    const reply = await super.bind(exchange, routingKey, args);
    const exchangeName = typeof exchange === 'string' ? exchange : exchange.getName();
    const key = routingKey ?? this.getName();
    this.bindings.set(bindingKey(exchangeName, key), { exchange: exchangeName, routingKey: key, arguments: args });
    return reply;
  }

  async unbind(exchange: Exchange | string, routingKey?: string, args: Record<string, unknown> = {}): Promise<EmptyReply> {
    const reply = await super.unbind(exchange, routingKey, args);
    const exchangeName = typeof exchange === 'string' ? exchange : exchange.getName();
    this.bindings.delete(bindingKey(exchangeName, routingKey ?? this.getName()));
    return reply;
  }

  async consume(callback: ConsumerCallback, options: ConsumeOptions = {}): Promise<string> {
    const consumerTag = await super.consume(callback, options);
    this.consumers.set(consumerTag, { callback, options: { ...options, consumerTag } });
    return consumerTag;
  }

  async cancel(consumerTag: string, timeout?: number): Promise<EmptyReply> {
    const reply = await super.cancel(consumerTag, timeout);
    this.consumers.delete(consumerTag);
    return reply;
  }

  getBindings(): QueueBinding[] {
    return Array.from(this.bindings.values());
  }

  getConsumerTags(): string[] {
    return Array.from(this.consumers.keys());
  }

  async onReconnect(channel: BaseChannel): Promise<void> {
    await super.onReconnect(channel);

    for (const binding of this.bindings.values()) {
      await super.bind(binding.exchange, binding.routingKey, binding.arguments);
    }

    for (const consumer of this.consumers.values()) {
      await super.consume(consumer.callback, consumer.options);
    }
  }
}
