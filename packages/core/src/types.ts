/** One inbound chat event. `context` is whatever the transport needs to reply. */
export interface InboundMessage<TContext = unknown> {
  readonly text: string;
  readonly context: TContext;
}

export interface CardAction {
  title: string;
  url: string;
}

/** Structured response payload; layout is up to the channel that renders it. */
export interface RichCard {
  title: string;
  subtitle?: string;
  imageUrl?: string;
  text?: string;
  actions: CardAction[];
}

export type OutboundResponse =
  | { type: 'text'; text: string }
  | { type: 'card'; card: RichCard };

export interface ResponseEmitter<TContext = unknown> {
  send(context: TContext, response: OutboundResponse): Promise<void>;
  sendTyping(context: TContext): Promise<void>;
}

export interface SlashCommand {
  name: string;
  args: readonly string[];
}

export type RouteKind = 'pattern' | 'command' | 'completion';

export function textResponse(text: string): OutboundResponse {
  return { type: 'text', text };
}

export function cardResponse(card: RichCard): OutboundResponse {
  return { type: 'card', card };
}
