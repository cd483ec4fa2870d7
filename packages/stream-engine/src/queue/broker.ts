export interface BrokerMessage {
  topic: string;
  key: string;
  value: string;
}

export type MessageHandler = (message: BrokerMessage) => Promise<void>;

export interface SubscribeOptions {
  /** Partitions handled concurrently; messages of one key stay sequential. */
  concurrency?: number;
}

/**
 * Minimal durable-bus contract. `disconnect` drops every subscription, so a
 * caller that reconnects subscribes again.
 */
export interface MessageBroker {
  readonly name: string;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  publish(topic: string, key: string, value: string): Promise<void>;
  subscribe(topic: string, groupId: string, handler: MessageHandler, options?: SubscribeOptions): Promise<void>;
}
