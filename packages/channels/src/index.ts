// @parley/channels barrel export
export type { NormalizedMessage, HandledMessage, MessageHandler } from './types.ts';
export { createRestRouter, type RestRouterOptions } from './rest.ts';

// Message Bus
export type { ChannelMessage, ChannelReply } from './messages.ts';
export { AsyncQueue, MessageBus } from './bus.ts';

// Channel abstractions
export { BaseChannel, type ChannelConfig } from './base-channel.ts';
export { ChannelManager } from './channel-manager.ts';
export { ChannelEmitter, channelContext, type ChannelContext } from './emitter.ts';

// Built-in channels
export { CLIChannel, formatCliReply, CLI_EXIT_WORDS, type CLIChannelConfig } from './cli-channel.ts';
export {
  TelegramChannel,
  stripBotMention,
  type TelegramChannelConfig,
  markdownToTelegramHtml,
  splitMessage,
  escapeHtml,
  renderCardHtml,
  cardKeyboard,
} from './telegram/index.ts';
