import type { OutboundResponse, ResponseEmitter } from '@parley/core';
import type { MessageBus } from './bus.ts';
import type { ChannelManager } from './channel-manager.ts';
import type { ChannelMessage } from './messages.ts';

/** What the dispatcher needs to answer a channel message. */
export interface ChannelContext {
  channel: string;
  chatId: string;
  senderId: string;
  messageId?: string;
}

export function channelContext(msg: ChannelMessage): ChannelContext {
  const messageId = msg.metadata['messageId'];
  return {
    channel: msg.channel,
    chatId: msg.chatId,
    senderId: msg.senderId,
    ...(messageId !== undefined ? { messageId: String(messageId) } : {}),
  };
}

/**
 * Responses go out through the bus (delivered by the ChannelManager);
 * typing goes straight to the channel.
 */
export class ChannelEmitter implements ResponseEmitter<ChannelContext> {
  constructor(
    private bus: MessageBus,
    private channels: ChannelManager,
  ) {}

  async send(context: ChannelContext, response: OutboundResponse): Promise<void> {
    this.bus.publishOutbound({
      channel: context.channel,
      chatId: context.chatId,
      response,
      ...(context.messageId ? { replyTo: context.messageId } : {}),
      metadata: {},
    });
  }

  sendTyping(context: ChannelContext): Promise<void> {
    return this.channels.sendTyping(context.channel, context.chatId);
  }
}
