import type { EventListener } from './types.js';

type ListenerTable<Events> = { [K in keyof Events]?: Set<EventListener<Events[K]>> };

export class TypedEventEmitter<Events extends { [K in keyof Events]: unknown }> {
  private listeners: ListenerTable<Events> = {};

  on<K extends keyof Events>(event: K, listener: EventListener<Events[K]>): () => void {
    const bucket = this.listeners[event] ?? new Set<EventListener<Events[K]>>();
    bucket.add(listener);
    this.listeners[event] = bucket;
    return () => this.off(event, listener);
  }

  once<K extends keyof Events>(event: K, listener: EventListener<Events[K]>): () => void {
    const wrapper: EventListener<Events[K]> = (payload) => {
      this.off(event, wrapper);
      listener(payload);
    };
    return this.on(event, wrapper);
  }

  off<K extends keyof Events>(event: K, listener: EventListener<Events[K]>): void {
    const bucket = this.listeners[event];
    if (!bucket) return;
    bucket.delete(listener);
    if (bucket.size === 0) {
      delete this.listeners[event];
    }
  }

  emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    const bucket = this.listeners[event];
    if (!bucket) return;
    for (const listener of Array.from(bucket)) {
      listener(payload);
    }
  }

  listenerCount(event: keyof Events): number {
    return this.listeners[event]?.size ?? 0;
  }

  removeAll(): void {
    this.listeners = {};
  }
}
