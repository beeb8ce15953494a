import type { EventBus } from './event-bus.ts';

/** Ring buffer of recent dispatch log lines. */
export class LogBuffer {
  private entries: string[] = [];

  constructor(private maxEntries = 500) {}

  push(entry: string): void {
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
  }

  tail(count: number): string[] {
    if (count <= 0) return [];
    return this.entries.slice(-count);
  }

  filter(pattern: 'error'): string[] {
    return this.entries.filter((e) => e.toLowerCase().includes(pattern));
  }

  get size(): number {
    return this.entries.length;
  }

  static attach(eventBus: EventBus, maxEntries?: number): LogBuffer {
    const buf = new LogBuffer(maxEntries);
    const ts = () => new Date().toISOString().slice(11, 19);

    eventBus.on('route-selected', (d) => {
      buf.push(`[${ts()}] route: ${d.route}/${d.name}`);
    });
    eventBus.on('typing-failed', (d) => {
      buf.push(`[${ts()}] typing error: ${d.message}`);
    });
    eventBus.on('handler-error', (d) => {
      buf.push(`[${ts()}] handler error (${d.route}/${d.name}): ${d.message}`);
    });
    eventBus.on('completion-error', (d) => {
      buf.push(`[${ts()}] completion error (${d.kind}, via ${d.route}): ${d.detail}`);
    });
    eventBus.on('dispatch-finished', (d) => {
      buf.push(`[${ts()}] done: ${d.route}/${d.name} -> ${d.responseType} (${d.durationMs}ms)`);
    });

    return buf;
  }
}
