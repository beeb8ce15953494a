import type { OutboundResponse } from '@parley/core';

/** A message a channel received, as published on the bus. */
export interface ChannelMessage {
  channel: string;
  senderId: string;
  chatId: string;
  content: string;
  timestamp: Date;
  metadata: Record<string, unknown>;
}

/** A response on its way back to a channel. */
export interface ChannelReply {
  channel: string;
  chatId: string;
  response: OutboundResponse;
  /** Platform message id to thread the reply under, when the channel supports it. */
  replyTo?: string;
  metadata: Record<string, unknown>;
}
