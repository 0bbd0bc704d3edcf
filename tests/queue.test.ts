/**
 * Tests for the Queue abstraction.
 */

import { vi } from 'vitest';
import { Queue, RobustQueue } from '../src/queue';
import { Exchange } from '../src/exchange';
import { ChannelSession } from '../src/channel';
import { FutureStore } from '../src/future-store';
import {
  asConnection,
  createMockChannel,
  createMockConnection,
  createMockLogger,
  message,
  MockChannel,
} from './mocks';

const openSession = async (channel: MockChannel): Promise<ChannelSession> => {
  const session = new ChannelSession(asConnection(createMockConnection(channel)), new FutureStore(), {
    logger: createMockLogger(),
  });
  await session.open();
  return session;
};

describe('Queue', () => {
  let mockChannel: MockChannel;
  let session: ChannelSession;
  let queue: Queue;

  beforeEach(async () => {
    mockChannel = createMockChannel();
    session = await openSession(mockChannel);
    queue = new Queue(session, 'test-queue', {
      durable: true,
      autoDelete: false,
    });
  });

  describe('constructor and getters', () => {
    it('should initialize with correct name and spec', () => {
      expect(queue.getName()).toBe('test-queue');
      expect(queue.getSpec()).toEqual({
        durable: true,
        autoDelete: false,
      });
      expect(queue.isDurable()).toBe(true);
      expect(queue.isExclusive()).toBe(false);
      expect(queue.isServerNamed()).toBe(false);
    });
  });

  describe('declare', () => {
    it('should declare queue with default options', async () => {
      const name = await queue.declare();

      expect(name).toBe('test-queue');
      expect(mockChannel.assertQueue).toHaveBeenCalledWith('test-queue', {
        durable: true,
        autoDelete: false,
        exclusive: false,
        arguments: {},
      });
    });

    it('should pass through all queue options', async () => {
      const queueWithOptions = new Queue(session, 'test-queue', {
        durable: false,
        autoDelete: true,
        exclusive: true,
        maxPriority: 10,
        messageTtl: 5000,
        expires: 10000,
        deadLetterExchange: 'dlx',
        deadLetterRoutingKey: 'dead',
      });

      await queueWithOptions.declare();

      expect(mockChannel.assertQueue).toHaveBeenCalledWith('test-queue', {
        durable: false,
        autoDelete: true,
        exclusive: true,
        arguments: {
          'x-max-priority': 10,
          'x-message-ttl': 5000,
          'x-expires': 10000,
          'x-dead-letter-exchange': 'dlx',
          'x-dead-letter-routing-key': 'dead',
        },
      });
      expect(queueWithOptions.getDeadLetterExchange()).toBe('dlx');
    });

    it('should take the broker-generated name', async () => {
      const anonymous = new Queue(session, '', { exclusive: true });

      const name = await anonymous.declare();

      expect(name).toBe('amq.gen-1');
      expect(anonymous.getName()).toBe('amq.gen-1');
      expect(anonymous.isServerNamed()).toBe(true);
      expect(mockChannel.assertQueue).toHaveBeenCalledWith('', expect.any(Object));
    });

    it('should ask for a fresh name when a broker-named queue is declared again', async () => {
      const anonymous = new Queue(session, '');

      await anonymous.declare();
      await anonymous.declare();

      expect(mockChannel.assertQueue).toHaveBeenNthCalledWith(2, '', expect.any(Object));
      expect(anonymous.getName()).toBe('amq.gen-2');
    });

    it('should only check a passive queue', async () => {
      await new Queue(session, 'existing', { passive: true }).declare();

      expect(mockChannel.checkQueue).toHaveBeenCalledWith('existing');
      expect(mockChannel.assertQueue).not.toHaveBeenCalled();
    });
  });

  describe('bind and unbind', () => {
    it('should bind to an exchange with a routing key', async () => {
      await queue.bind(new Exchange(session, 'my-exchange'), 'routing.key');

      expect(mockChannel.bindQueue).toHaveBeenCalledWith('test-queue', 'my-exchange', 'routing.key', {});
    });

    it('should default the routing key to the queue name', async () => {
      await queue.bind('my-exchange');

      expect(mockChannel.bindQueue).toHaveBeenCalledWith('test-queue', 'my-exchange', 'test-queue', {});
    });

    it('should unbind queue from exchange', async () => {
      await queue.unbind('my-exchange', 'routing.key');

      expect(mockChannel.unbindQueue).toHaveBeenCalledWith('test-queue', 'my-exchange', 'routing.key', {});
    });
  });

  describe('consume', () => {
    it('should deliver parsed messages with metadata', async () => {
      const callback = vi.fn();
      const msg = message(JSON.stringify({ hello: 'world' }));

      mockChannel.consume.mockImplementationOnce(async (_queue, onMessage) => {
        onMessage(msg);
        return { consumerTag: 'tag' };
      });

      const tag = await queue.consume(callback);
      await new Promise((resolve) => setTimeout(resolve, 0));

      expect(tag).toBe('tag');
      expect(callback).toHaveBeenCalledWith(
        { hello: 'world' },
        expect.objectContaining({
          metadata: expect.objectContaining({
            deliveryTag: 1,
            redelivered: false,
            exchange: 'events',
            routingKey: 'user.created',
            consumerTag: 'tag',
          }),
          ack: expect.any(Function),
          nack: expect.any(Function),
          original: msg,
        })
      );
    });

    it('should pass consumer options and the consumer tag to the broker', async () => {
      await queue.consume(vi.fn(), { consumerTag: 'audit', exclusive: true });

      expect(mockChannel.consume).toHaveBeenCalledWith('test-queue', expect.any(Function), {
        consumerTag: 'audit',
        noAck: false,
        noLocal: false,
        exclusive: true,
        arguments: undefined,
      });
    });

    it('should return raw string if JSON parsing fails', async () => {
      const callback = vi.fn();

      mockChannel.consume.mockImplementationOnce(async (_queue, onMessage) => {
        onMessage(message('not valid json'));
        return { consumerTag: 'tag' };
      });

      await queue.consume(callback);
      await new Promise((resolve) => setTimeout(resolve, 0));

      expect(callback).toHaveBeenCalledWith('not valid json', expect.any(Object));
    });

    it('should ack on the channel the message arrived on', async () => {
      const msg = message('{}');

      mockChannel.consume.mockImplementationOnce(async (_queue, onMessage) => {
        onMessage(msg);
        return { consumerTag: 'tag' };
      });

      await queue.consume((_content, event) => event.ack());
      await new Promise((resolve) => setTimeout(resolve, 0));

      expect(mockChannel.ack).toHaveBeenCalledWith(msg);
    });

    it('should nack message on consumer error', async () => {
      const msg = message('{}');

      mockChannel.consume.mockImplementationOnce(async (_queue, onMessage) => {
        onMessage(msg);
        return { consumerTag: 'tag' };
      });

      await queue.consume(vi.fn().mockRejectedValue(new Error('Processing failed')));
      await new Promise((resolve) => setTimeout(resolve, 10));

      expect(mockChannel.nack).toHaveBeenCalledWith(msg, false, true);
    });

    it('should ignore a null delivery from a cancelled consumer', async () => {
      const callback = vi.fn();

      mockChannel.consume.mockImplementationOnce(async (_queue, onMessage) => {
        onMessage(null);
        return { consumerTag: 'tag' };
      });

      await queue.consume(callback);
      await new Promise((resolve) => setTimeout(resolve, 0));

      expect(callback).not.toHaveBeenCalled();
    });

    it('should cancel a consumer by tag', async () => {
      await queue.cancel('audit');

      expect(mockChannel.cancel).toHaveBeenCalledWith('audit');
    });
  });

  describe('purge and counts', () => {
    it('should purge queue and return message count', async () => {
      expect(await queue.purge()).toBe(5);
      expect(mockChannel.purgeQueue).toHaveBeenCalledWith('test-queue');
    });

    it('should get current message count', async () => {
      expect(await queue.getMessageCount()).toBe(3);
    });
  });

  describe('delete', () => {
    it('should delete queue through the channel', async () => {
      await queue.delete({ ifEmpty: true });

      expect(mockChannel.deleteQueue).toHaveBeenCalledWith('test-queue', { ifUnused: false, ifEmpty: true });
    });
  });
});

describe('RobustQueue', () => {
  let mockChannel: MockChannel;
  let session: ChannelSession;
  let queue: RobustQueue;

  beforeEach(async () => {
    mockChannel = createMockChannel();
    session = await openSession(mockChannel);
    queue = new RobustQueue(session, 'audit');
    await queue.declare();
  });

  it('should remember bindings and forget unbound ones', async () => {
    await queue.bind('events', 'user.*');
    await queue.bind('events');
    await queue.unbind('events', 'user.*');

    expect(queue.getBindings()).toEqual([{ exchange: 'events', routingKey: 'audit', arguments: {} }]);
  });

  it('should remember consumers until cancelled', async () => {
    await queue.consume(vi.fn(), { consumerTag: 'first' });
    await queue.consume(vi.fn(), { consumerTag: 'second' });
    await queue.cancel('first');

    expect(queue.getConsumerTags()).toEqual(['second']);
  });

  it('should restore declaration, bindings and consumers on reconnect', async () => {
    const callback = vi.fn();
    await queue.bind('events', 'user.*');
    await queue.consume(callback, { consumerTag: 'audit-consumer', exclusive: true });

    const nextChannel = createMockChannel();
    const nextSession = await openSession(nextChannel);

    await queue.onReconnect(nextSession);

    expect(queue.getChannel()).toBe(nextSession);
    expect(nextChannel.assertQueue).toHaveBeenCalledWith('audit', expect.any(Object));
    expect(nextChannel.bindQueue).toHaveBeenCalledWith('audit', 'events', 'user.*', {});
    expect(nextChannel.consume).toHaveBeenCalledWith('audit', expect.any(Function), {
      consumerTag: 'audit-consumer',
      noAck: false,
      noLocal: false,
      exclusive: true,
      arguments: undefined,
    });

    const [declared] = nextChannel.assertQueue.mock.invocationCallOrder;
    const [bound] = nextChannel.bindQueue.mock.invocationCallOrder;
    const [consumed] = nextChannel.consume.mock.invocationCallOrder;
    expect(declared).toBeLessThan(bound);
    expect(bound).toBeLessThan(consumed);
    expect(queue.getConsumerTags()).toEqual(['audit-consumer']);
  });

  it('should deliver restored consumer messages to the original callback', async () => {
    const callback = vi.fn();
    await queue.consume(callback, { consumerTag: 'c1' });

    const nextChannel = createMockChannel();
    nextChannel.consume.mockImplementationOnce(async (_queue, onMessage) => {
      onMessage(message('"after reconnect"', 'c1'));
      return { consumerTag: 'c1' };
    });

    await queue.onReconnect(await openSession(nextChannel));
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(callback).toHaveBeenCalledWith('after reconnect', expect.any(Object));
  });

  it('should not restore cancelled consumers or removed bindings', async () => {
    await queue.bind('events', 'a');
    await queue.unbind('events', 'a');
    await queue.consume(vi.fn(), { consumerTag: 'gone' });
    await queue.cancel('gone');

    const nextChannel = createMockChannel();
    await queue.onReconnect(await openSession(nextChannel));

    expect(nextChannel.assertQueue).toHaveBeenCalledTimes(1);
    expect(nextChannel.bindQueue).not.toHaveBeenCalled();
    expect(nextChannel.consume).not.toHaveBeenCalled();
  });

  it('should fail the recovery when re-declaration is refused', async () => {
    await queue.bind('events', 'a');

    const nextChannel = createMockChannel();
    nextChannel.assertQueue.mockRejectedValueOnce(new Error('PRECONDITION_FAILED'));

    await expect(queue.onReconnect(await openSession(nextChannel))).rejects.toThrow('PRECONDITION_FAILED');
    expect(nextChannel.bindQueue).not.toHaveBeenCalled();
  });
});
