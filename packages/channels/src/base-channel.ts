import type { MessageBus } from './bus.ts';
import type { ChannelMessage, ChannelReply } from './messages.ts';

export interface ChannelConfig {
  enabled: boolean;
  allowFrom?: string[];
}

export abstract class BaseChannel {
  abstract readonly name: string;
  protected running = false;

  constructor(
    protected config: ChannelConfig,
    protected bus: MessageBus,
  ) {}

  abstract start(): Promise<void>;
  abstract stop(): Promise<void>;
  abstract send(reply: ChannelReply): Promise<void>;

  /** Show a "typing" indicator in the chat. Channels without one ignore it. */
  async sendTyping(_chatId: string): Promise<void> {}

  get isRunning(): boolean {
    return this.running;
  }

  protected isAllowed(senderId: string): boolean {
    const allowFrom = this.config.allowFrom;
    if (!allowFrom || allowFrom.length === 0) {
      return true;
    }
    const ids = senderId.split('|');
    return ids.some((id) => allowFrom.includes(id));
  }

  /** Publish an inbound message, unless the sender is filtered out. */
  protected handleMessage(params: {
    senderId: string;
    chatId: string;
    content: string;
    metadata?: Record<string, unknown>;
  }): boolean {
    if (!this.isAllowed(params.senderId)) {
      return false;
    }
    const msg: ChannelMessage = {
      channel: this.name,
      senderId: params.senderId,
      chatId: params.chatId,
      content: params.content,
      timestamp: new Date(),
      metadata: params.metadata ?? {},
    };
    this.bus.publishInbound(msg);
    return true;
  }
}
