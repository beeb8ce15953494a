import type { ChannelMessage, ChannelReply } from './messages.ts';

export class AsyncQueue<T> {
  private queue: T[] = [];
  private waiters: Array<{ resolve: (value: T) => void }> = [];

  enqueue(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(item);
    } else {
      this.queue.push(item);
    }
  }

  /** Resolves with the next item; rejects with the signal's reason if aborted first. */
  dequeue(signal?: AbortSignal): Promise<T> {
    const item = this.queue.shift();
    if (item !== undefined) {
      return Promise.resolve(item);
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }
    return new Promise<T>((resolve, reject) => {
      const waiter = {
        resolve: (value: T) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(value);
        },
      };
      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        reject(signal?.reason);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  get size(): number {
    return this.queue.length;
  }

  get pending(): number {
    return this.waiters.length;
  }
}

export class MessageBus {
  private inbound = new AsyncQueue<ChannelMessage>();
  private outbound = new AsyncQueue<ChannelReply>();

  publishInbound(msg: ChannelMessage): void {
    this.inbound.enqueue(msg);
  }

  consumeInbound(signal?: AbortSignal): Promise<ChannelMessage> {
    return this.inbound.dequeue(signal);
  }

  publishOutbound(msg: ChannelReply): void {
    this.outbound.enqueue(msg);
  }

  consumeOutbound(signal?: AbortSignal): Promise<ChannelReply> {
    return this.outbound.dequeue(signal);
  }

  get inboundSize(): number {
    return this.inbound.size;
  }

  get outboundSize(): number {
    return this.outbound.size;
  }
}
