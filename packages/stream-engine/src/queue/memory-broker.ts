import { QueueUnavailableError, toError } from '../errors.js';
import { createComponentLogger, type Logger } from '../logger.js';
import type { BrokerMessage, MessageBroker, MessageHandler } from './broker.js';

interface GroupSubscription {
  handlers: MessageHandler[];
  cursor: number;
  tail: Promise<void>;
}

export interface InMemoryBrokerOptions {
  logger?: Logger;
}

/**
 * Single-process stand-in for Kafka. Every consumer group sees every message
 * of a topic; within a group handlers take turns and run one message at a
 * time.
 */
export class InMemoryBroker implements MessageBroker {
  readonly name = 'memory';
  private readonly topics = new Map<string, Map<string, GroupSubscription>>();
  private readonly logger: Logger;
  private connected = false;
  private available = true;
  private publishedCount = 0;

  constructor(options: InMemoryBrokerOptions = {}) {
    this.logger = createComponentLogger('memory-broker', options.logger);
  }

  get isConnected(): boolean {
    return this.connected;
  }

  get published(): number {
    return this.publishedCount;
  }

  /** Simulates an outage: while unavailable, connect and publish fail. */
  setAvailable(available: boolean): void {
    this.available = available;
    if (!available) {
      this.connected = false;
    }
  }

  async connect(): Promise<void> {
    if (!this.available) {
      throw new QueueUnavailableError('In-memory broker is unavailable');
    }
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
    this.topics.clear();
  }

  async publish(topic: string, key: string, value: string): Promise<void> {
    if (!this.connected) {
      throw new QueueUnavailableError(`Broker not connected, cannot publish to ${topic}`);
    }

    this.publishedCount += 1;
    const groups = this.topics.get(topic);
    if (!groups) {
      return;
    }

    const message: BrokerMessage = { topic, key, value };
    for (const [groupId, group] of groups.entries()) {
      const handler = group.handlers[group.cursor % group.handlers.length];
      group.cursor += 1;
      group.tail = group.tail.then(() =>
        handler(message).catch((error: unknown) => {
          this.logger.error({ err: toError(error), topic, groupId, key }, 'Message handler failed');
        }),
      );
    }
  }

  async subscribe(topic: string, groupId: string, handler: MessageHandler): Promise<void> {
    if (!this.connected) {
      throw new QueueUnavailableError(`Broker not connected, cannot subscribe to ${topic}`);
    }

    let groups = this.topics.get(topic);
    if (!groups) {
      groups = new Map();
      this.topics.set(topic, groups);
    }

    const group = groups.get(groupId);
    if (group) {
      group.handlers.push(handler);
      return;
    }
    groups.set(groupId, { handlers: [handler], cursor: 0, tail: Promise.resolve() });
  }

  /** Resolves once every delivered message, including ones published by handlers, has been handled. */
  async drain(): Promise<void> {
    for (;;) {
      const tails = this.tails();
      await Promise.all(tails);
      const after = this.tails();
      if (after.length === tails.length && after.every((tail, index) => tail === tails[index])) {
        return;
      }
    }
  }

  private tails(): Promise<void>[] {
    return Array.from(this.topics.values()).flatMap((groups) =>
      Array.from(groups.values()).map((group) => group.tail),
    );
  }
}
