import type { MessageBus } from './bus.ts';
import type { BaseChannel } from './base-channel.ts';
import type { ChannelReply } from './messages.ts';

export class ChannelManager {
  private channels = new Map<string, BaseChannel>();
  private abortController: AbortController | null = null;

  constructor(private bus: MessageBus) {}

  register(channel: BaseChannel): void {
    this.channels.set(channel.name, channel);
  }

  getChannel(name: string): BaseChannel | undefined {
    return this.channels.get(name);
  }

  getStatus(): Record<string, { enabled: boolean; running: boolean }> {
    const result: Record<string, { enabled: boolean; running: boolean }> = {};
    for (const [name, ch] of this.channels) {
      result[name] = { enabled: true, running: ch.isRunning };
    }
    return result;
  }

  async sendTyping(channelName: string, chatId: string): Promise<void> {
    const channel = this.channels.get(channelName);
    if (!channel) {
      throw new Error(`Unknown channel: ${channelName}`);
    }
    await channel.sendTyping(chatId);
  }

  async startAll(): Promise<void> {
    this.abortController = new AbortController();
    this.dispatchOutbound(this.abortController.signal).catch((err) => {
      console.error('[ChannelManager] Outbound loop stopped:', err);
    });

    await Promise.all(
      Array.from(this.channels.values()).map((ch) => ch.start()),
    );
  }

  async stopAll(): Promise<void> {
    this.abortController?.abort();
    this.abortController = null;

    await Promise.all(
      Array.from(this.channels.values()).map((ch) => ch.stop()),
    );
  }

  private async dispatchOutbound(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let reply: ChannelReply;
      try {
        reply = await this.bus.consumeOutbound(signal);
      } catch (err) {
        if (signal.aborted) return;
        throw err;
      }

      const channel = this.channels.get(reply.channel);
      if (channel) {
        try {
          await channel.send(reply);
        } catch (err) {
          console.error(`[ChannelManager] Error sending to ${reply.channel}:`, err);
        }
      } else {
        console.warn(`[ChannelManager] Unknown channel: ${reply.channel}`);
      }
    }
  }
}
