// @parley/core barrel export
export const VERSION = '0.1.0';

export type {
  InboundMessage,
  OutboundResponse,
  ResponseEmitter,
  RichCard,
  CardAction,
  SlashCommand,
  RouteKind,
} from './types.ts';
export { textResponse, cardResponse } from './types.ts';
export { CompletionError, errorMessage, type CompletionErrorKind } from './errors.ts';

// Routing
export {
  PatternMatcher,
  type RouteDefinition,
  type RouteMatch,
  type PatternHandler,
  type PatternContext,
} from './routing/pattern-matcher.ts';
export { createDefaultRoutes, GREETING_REPLY, GREETING_PATTERN, LINK_PATTERN, type DefaultRoutesOptions } from './routing/routes.ts';

// Commands
export { isCommand, parseCommand, COMMAND_PREFIX } from './commands/parser.ts';
export { CommandRegistry, type CommandHandler, type CommandContext } from './commands/registry.ts';
export {
  createDefaultCommands,
  createHelpCommand,
  createSearchCommand,
  createStatusCommand,
  createUnknownCommand,
  unknownCommandReply,
  buildSearchPrompt,
  SEARCH_USAGE,
  EMPTY_COMMAND_REPLY,
  type BotInfo,
} from './commands/builtin.ts';

// Completion
export {
  CompletionClient,
  apologyFor,
  DEFAULT_COMPLETION_TIMEOUT_MS,
  type CompletionProvider,
  type CompletionClientOptions,
} from './completion/client.ts';
export { createModelProvider, DEFAULT_SYSTEM_PROMPT, type ModelProviderOptions } from './completion/provider.ts';

// Cards
export { basicLinkPreview, renderCardText, type LinkPreviewProvider } from './cards/link-preview.ts';

// Dispatch
export { Dispatcher, PROCESSING_ERROR_REPLY, type DispatcherDeps, type DispatchOptions, type Resolution } from './dispatcher/dispatcher.ts';

// Events & logging
export { EventBus, type EventMap } from './events/event-bus.ts';
export { LogBuffer } from './events/log-buffer.ts';
