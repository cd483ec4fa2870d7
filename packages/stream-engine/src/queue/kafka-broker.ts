import { Kafka, logLevel, type Consumer, type LogEntry, type Producer } from 'kafkajs';

import { QueueUnavailableError, toError } from '../errors.js';
import { createComponentLogger, type Logger } from '../logger.js';
import type { MessageBroker, MessageHandler, SubscribeOptions } from './broker.js';

export interface KafkaBrokerOptions {
  clientId: string;
  brokers: string[];
  logger?: Logger;
  connectionTimeoutMs?: number;
}

function routeKafkaLogs(logger: Logger) {
  return () =>
    ({ namespace, level, log }: LogEntry) => {
      const { message, ...extra } = log;
      const bindings = { namespace, ...extra };
      switch (level) {
        case logLevel.ERROR:
          logger.error(bindings, message);
          break;
        case logLevel.WARN:
          logger.warn(bindings, message);
          break;
        case logLevel.INFO:
          logger.info(bindings, message);
          break;
        default:
          logger.debug(bindings, message);
      }
    };
}

export class KafkaBroker implements MessageBroker {
  readonly name = 'kafka';
  private readonly kafka: Kafka;
  private readonly logger: Logger;
  private producer?: Producer;
  private readonly consumers: Consumer[] = [];

  constructor(options: KafkaBrokerOptions) {
    this.logger = createComponentLogger('kafka', options.logger);
    this.kafka = new Kafka({
      clientId: options.clientId,
      brokers: options.brokers,
      connectionTimeout: options.connectionTimeoutMs ?? 3000,
      logLevel: logLevel.INFO,
      logCreator: routeKafkaLogs(this.logger),
      // Reconnection is handled by the queue bridge.
      retry: { retries: 2 },
    });
  }

  async connect(): Promise<void> {
    if (this.producer) {
      return;
    }
    const producer = this.kafka.producer({ allowAutoTopicCreation: true });
    try {
      await producer.connect();
    } catch (error) {
      throw new QueueUnavailableError('Kafka producer failed to connect', error);
    }
    this.producer = producer;
  }

  async disconnect(): Promise<void> {
    const consumers = this.consumers.splice(0);
    const producer = this.producer;
    this.producer = undefined;

    const results = await Promise.allSettled([
      ...consumers.map((consumer) => consumer.disconnect()),
      ...(producer ? [producer.disconnect()] : []),
    ]);
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.warn({ err: toError(result.reason) }, 'Kafka client did not disconnect cleanly');
      }
    }
  }

  async publish(topic: string, key: string, value: string): Promise<void> {
    if (!this.producer) {
      throw new QueueUnavailableError(`Kafka producer not connected, cannot publish to ${topic}`);
    }
    await this.producer.send({ topic, messages: [{ key, value }] });
  }

  async subscribe(
    topic: string,
    groupId: string,
    handler: MessageHandler,
    options: SubscribeOptions = {},
  ): Promise<void> {
    const consumer = this.kafka.consumer({ groupId });
    await consumer.connect();
    this.consumers.push(consumer);
    await consumer.subscribe({ topic, fromBeginning: false });
    await consumer.run({
      partitionsConsumedConcurrently: options.concurrency ?? 1,
      eachMessage: async ({ message }) => {
        if (!message.value) {
          return;
        }
        await handler({
          topic,
          key: message.key?.toString() ?? '',
          value: message.value.toString(),
        });
      },
    });
    this.logger.info({ topic, groupId }, 'Subscribed to topic');
  }
}
