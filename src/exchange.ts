/**
 * Exchange abstraction for RabbitMQ.
 * Handles exchange declaration, exchange-to-exchange bindings and recovery.
 */

import { EmptyReply, ExchangeDeleteOptions, ExchangeSpec, ExchangeType, RecoveryHook } from './types';
import type { BaseChannel } from './channel';

export interface ExchangeBinding {
  source: string;
  routingKey: string;
  arguments: Record<string, unknown>;
}

const bindingKey = (source: string, routingKey: string): string => JSON.stringify([source, routingKey]);

/**
 * Represents a RabbitMQ exchange declared on a channel.
 * After a reconnect it re-declares itself, nothing more.
 */
export class Exchange implements RecoveryHook {
  protected channel: BaseChannel;
  private readonly name: string;
  private readonly spec: ExchangeSpec;

  constructor(channel: BaseChannel, name: string, spec: ExchangeSpec = {}) {
    this.channel = channel;
    this.name = name;
    this.spec = spec;
  }

  getName(): string {
    return this.name;
  }

  getSpec(): ExchangeSpec {
    return this.spec;
  }

  /**
   * Checks if the exchange is configured as durable.
   *
   * @returns true if exchange is durable, false otherwise
   */
  isDurable(): boolean {
    return this.spec.durable !== false;
  }

  /**
   * Checks if the exchange is broker-managed.
   */
  isInternal(): boolean {
    return this.spec.internal === true;
  }

  /**
   * Gets the exchange type.
   *
   * @returns Exchange type: 'direct', 'topic', 'fanout', or 'headers'
   */
  getType(): ExchangeType {
    return this.spec.type || 'direct';
  }

  /**
   * Declares the exchange with the configured specification, or only checks
   * that it exists when the spec is passive.
   */
  async declare(): Promise<void> {
    const {
      type = 'direct',
      durable = true,
      autoDelete = false,
      internal = false,
      passive = false,
      alternateExchange,
      arguments: args = {},
      timeout,
    } = this.spec;

    if (passive) {
      await this.channel.call((channel) => channel.checkExchange(this.name), timeout, 'exchange.declare');
      return;
    }

    const exchangeArgs: Record<string, unknown> = { ...args };

    if (alternateExchange !== undefined) {
      exchangeArgs['alternate-exchange'] = alternateExchange;
    }

    await this.channel.call(
      (channel) =>
        channel.assertExchange(this.name, type, {
          durable,
          autoDelete,
          internal,
          arguments: exchangeArgs,
        }),
      timeout,
      'exchange.declare'
    );
  }

  /**
   * Binds this exchange to a source exchange.
   *
   * @param source - Source exchange or its name
   * @param routingKey - Routing key to bind with. Default: ''.
   * @param args - Binding arguments
   */
  async bind(source: Exchange | string, routingKey = '', args: Record<string, unknown> = {}): Promise<EmptyReply> {
    const sourceName = typeof source === 'string' ? source : source.getName();
    return this.channel.call(
      (channel) => channel.bindExchange(this.name, sourceName, routingKey, args),
      undefined,
      'exchange.bind'
    );
  }

  async unbind(source: Exchange | string, routingKey = '', args: Record<string, unknown> = {}): Promise<EmptyReply> {
    const sourceName = typeof source === 'string' ? source : source.getName();
    return this.channel.call(
      (channel) => channel.unbindExchange(this.name, sourceName, routingKey, args),
      undefined,
      'exchange.unbind'
    );
  }

  /**
   * Deletes the exchange. It is dropped from the channel's recovery set.
   * WARNING: This is permanent.
   */
  async delete(options: ExchangeDeleteOptions = {}): Promise<EmptyReply | undefined> {
    return this.channel.deleteExchange(this.name, options);
  }

  getChannel(): BaseChannel {
    return this.channel;
  }

  async onReconnect(channel: BaseChannel): Promise<void> {
    this.channel = channel;
    await this.declare();
  }
}

/**
 * Exchange that also restores its bindings to other exchanges.
 */
export class RobustExchange extends Exchange {
  private readonly bindings: Map<string, ExchangeBinding> = new Map();

  async bind(source: Exchange | string, routingKey = '', args: Record<string, unknown> = {}): Promise<EmptyReply> {
    const reply = await super.bind(source, routingKey, args);
    const sourceName = typeof source === 'string' ? source : source.getName();
    this.bindings.set(bindingKey(sourceName, routingKey), { source: sourceName, routingKey, arguments: args });
    return reply;
  }

  async unbind(source: Exchange | string, routingKey = '', args: Record<string, unknown> = {}): Promise<EmptyReply> {
    const reply = await super.unbind(source, routingKey, args);
    const sourceName = typeof source === 'string' ? source : source.getName();
    this.bindings.delete(bindingKey(sourceName, routingKey));
    return reply;
  }

  getBindings(): ExchangeBinding[] {
    return Array.from(this.bindings.values());
  }

  async onReconnect(channel: BaseChannel): Promise<void> {
    await super.onReconnect(channel);

    for (const binding of this.bindings.values()) {
      await super.bind(binding.source, binding.routingKey, binding.arguments);
    }
  }
}
