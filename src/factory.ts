/**
 * Entity factories. A channel receives one at construction and uses it for
 * every exchange and queue it declares.
 */

import { EntityFactory } from './types';
import { Exchange, RobustExchange } from './exchange';
import { Queue, RobustQueue } from './queue';

/**
 * Entities that restore bindings and consumers after a reconnect.
 */
export const robustEntityFactory: EntityFactory = {
  createExchange: (channel, name, spec) => new RobustExchange(channel, name, spec),
  createQueue: (channel, name, spec) => new RobustQueue(channel, name, spec),
};

/**
 * Entities that only re-declare themselves after a reconnect.
 */
export const plainEntityFactory: EntityFactory = {
  createExchange: (channel, name, spec) => new Exchange(channel, name, spec),
  createQueue: (channel, name, spec) => new Queue(channel, name, spec),
};
