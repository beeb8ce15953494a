import type { CompletionErrorKind } from '../errors.ts';
import type { RouteKind } from '../types.ts';

export type EventMap = {
  'message-received': { text: string };
  'route-selected': { route: RouteKind; name: string };
  'typing-failed': { message: string };
  'handler-error': { route: RouteKind; name: string; message: string };
  'completion-error': { kind: CompletionErrorKind; detail: string; route: RouteKind };
  'dispatch-finished': { route: RouteKind; name: string; durationMs: number; responseType: 'text' | 'card' };
};

type Listener<T> = (data: T) => void;

type ListenerSets = { [K in keyof EventMap]?: Set<Listener<EventMap[K]>> };

export class EventBus {
  private listeners: ListenerSets = {};

  on<K extends keyof EventMap>(event: K, listener: Listener<EventMap[K]>): void {
    this.listenersFor(event).add(listener);
  }

  off<K extends keyof EventMap>(event: K, listener: Listener<EventMap[K]>): void {
    this.listenersFor(event).delete(listener);
  }

  emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
    for (const listener of this.listenersFor(event)) {
      try {
        listener(data);
      } catch (err) {
        console.error(`[EventBus] Listener for "${event}" threw:`, err);
      }
    }
  }

  removeAllListeners(): void {
    this.listeners = {};
  }

  private listenersFor<K extends keyof EventMap>(event: K): Set<Listener<EventMap[K]>> {
    const existing: Set<Listener<EventMap[K]>> | undefined = this.listeners[event];
    if (existing) return existing;
    const created = new Set<Listener<EventMap[K]>>();
    this.listeners[event] = created;
    return created;
  }
}
