import type { CompletionClient } from '../completion/client.ts';
import type { InboundMessage, OutboundResponse } from '../types.ts';

export interface CommandContext<TContext = unknown> {
  message: InboundMessage<TContext>;
  completion: CompletionClient;
  signal?: AbortSignal;
  /** Name as typed by the user, lower-cased. */
  commandName: string;
}

export interface CommandHandler<TContext = unknown> {
  readonly name: string;
  readonly description: string;
  readonly usage?: string;
  handle(ctx: CommandContext<TContext>, args: readonly string[]): Promise<OutboundResponse>;
}

export class CommandRegistry<TContext = unknown> {
  private commands = new Map<string, CommandHandler<TContext>>();

  constructor(private fallback: CommandHandler<TContext>) {}

  register(handler: CommandHandler<TContext>): void {
    const key = handler.name.toLowerCase();
    if (this.commands.has(key)) {
      throw new Error(`Command already registered: /${key}`);
    }
    this.commands.set(key, handler);
  }

  /** Never fails: unknown names resolve to the fallback handler. */
  resolve(name: string): CommandHandler<TContext> {
    return this.commands.get(name.toLowerCase()) ?? this.fallback;
  }

  list(): Array<{ name: string; description: string; usage?: string }> {
    return [...this.commands.values()].map((c) => ({
      name: c.name,
      description: c.description,
      ...(c.usage ? { usage: c.usage } : {}),
    }));
  }
}
