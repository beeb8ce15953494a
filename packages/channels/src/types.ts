import type { OutboundResponse } from '@parley/core';

/** A request-style message, used by transports that answer inline (REST, one-shot CLI). */
export interface NormalizedMessage {
  channelId: string;
  userId: string;
  conversationId: string;
  text: string;
  metadata?: Record<string, unknown>;
}

export interface HandledMessage {
  /** Which routing path produced the response. */
  route: string;
  response: OutboundResponse;
}

export interface MessageHandler {
  handle(message: NormalizedMessage, signal?: AbortSignal): Promise<HandledMessage>;
}
