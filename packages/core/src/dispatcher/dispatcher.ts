import { EMPTY_COMMAND_REPLY } from '../commands/builtin.ts';
import { isCommand, parseCommand } from '../commands/parser.ts';
import type { CommandRegistry } from '../commands/registry.ts';
import { apologyFor, type CompletionClient } from '../completion/client.ts';
import { CompletionError, errorMessage } from '../errors.ts';
import type { EventBus } from '../events/event-bus.ts';
import type { PatternMatcher } from '../routing/pattern-matcher.ts';
import {
  textResponse,
  type InboundMessage,
  type OutboundResponse,
  type ResponseEmitter,
  type RouteKind,
} from '../types.ts';

/** Sent when a pattern route or command handler fails outright. */
export const PROCESSING_ERROR_REPLY = 'An error occurred while processing your message.';

export interface DispatcherDeps<TContext> {
  patterns: PatternMatcher<TContext>;
  commands: CommandRegistry<TContext>;
  completion: CompletionClient;
  emitter: ResponseEmitter<TContext>;
  eventBus?: EventBus;
}

export interface DispatchOptions {
  /** Aborting abandons any in-flight completion; no response is produced. */
  signal?: AbortSignal;
}

export interface Resolution {
  route: RouteKind;
  /** Route name, command name, or "completion". */
  name: string;
  response: OutboundResponse;
}

/**
 * Routes each message down exactly one path, in order:
 * pattern routes, then slash commands, then free-form completion.
 * Holds no per-message state, so concurrent dispatches are independent.
 */
export class Dispatcher<TContext = unknown> {
  constructor(private deps: DispatcherDeps<TContext>) {}

  async dispatch(message: InboundMessage<TContext>, options: DispatchOptions = {}): Promise<OutboundResponse> {
    const startedAt = Date.now();
    this.startTyping(message.context);

    const resolution = await this.resolve(message, options);
    await this.deps.emitter.send(message.context, resolution.response);

    this.deps.eventBus?.emit('dispatch-finished', {
      route: resolution.route,
      name: resolution.name,
      durationMs: Date.now() - startedAt,
      responseType: resolution.response.type,
    });
    return resolution.response;
  }

  /** Pick a route and produce its response without touching the transport. */
  async resolve(message: InboundMessage<TContext>, options: DispatchOptions = {}): Promise<Resolution> {
    const { patterns, commands, completion } = this.deps;
    const { signal } = options;
    this.deps.eventBus?.emit('message-received', { text: message.text });

    const matched = patterns.match(message.text);
    if (matched) {
      const { route, match } = matched;
      this.selected('pattern', route.name);
      return this.guarded('pattern', route.name, signal, () => route.handler({ message, match, signal }));
    }

    if (isCommand(message.text)) {
      const command = parseCommand(message.text);
      if (!command) {
        this.selected('command', '');
        return { route: 'command', name: '', response: textResponse(EMPTY_COMMAND_REPLY) };
      }
      this.selected('command', command.name);
      const handler = commands.resolve(command.name);
      return this.guarded('command', command.name, signal, () =>
        handler.handle({ message, completion, signal, commandName: command.name }, command.args),
      );
    }

    this.selected('completion', 'completion');
    try {
      const text = await completion.complete(message.text, { signal });
      return { route: 'completion', name: 'completion', response: textResponse(text) };
    } catch (err) {
      if (!(err instanceof CompletionError) || err.kind === 'cancelled') {
        throw err;
      }
      this.deps.eventBus?.emit('completion-error', { kind: err.kind, detail: err.detail, route: 'completion' });
      return { route: 'completion', name: 'completion', response: textResponse(apologyFor(err)) };
    }
  }

  // Handler failures still answer the message; cancellation does not.
  private async guarded(
    route: RouteKind,
    name: string,
    signal: AbortSignal | undefined,
    run: () => OutboundResponse | Promise<OutboundResponse>,
  ): Promise<Resolution> {
    try {
      return { route, name, response: await run() };
    } catch (err) {
      if (signal?.aborted || (err instanceof CompletionError && err.kind === 'cancelled')) {
        throw err;
      }
      this.deps.eventBus?.emit('handler-error', { route, name, message: errorMessage(err) });
      return { route, name, response: textResponse(PROCESSING_ERROR_REPLY) };
    }
  }

  private selected(route: RouteKind, name: string): void {
    this.deps.eventBus?.emit('route-selected', { route, name });
  }

  // Fire-and-forget: the indicator must never delay or fail a dispatch.
  private startTyping(context: TContext): void {
    const onError = (err: unknown) => {
      this.deps.eventBus?.emit('typing-failed', { message: errorMessage(err) });
    };
    try {
      this.deps.emitter.sendTyping(context).catch(onError);
    } catch (err) {
      onError(err);
    }
  }
}
