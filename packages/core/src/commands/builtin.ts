import { CompletionError } from '../errors.ts';
import { apologyFor } from '../completion/client.ts';
import { textResponse } from '../types.ts';
import { CommandRegistry, type CommandHandler } from './registry.ts';

export interface BotInfo {
  name: string;
  version: string;
  /** Label of the completion model, shown by /status. */
  model?: string;
}

export const SEARCH_USAGE = 'Usage: /search <query>';
export const EMPTY_COMMAND_REPLY = 'No command given. Type /help to see available commands.';

export function unknownCommandReply(name: string): string {
  return `Unknown command: /${name}. Type /help to see available commands.`;
}

export function buildSearchPrompt(query: string): string {
  return [
    `Search request: ${query}`,
    '',
    'Answer with the most relevant facts you know about this query.',
    'Keep it short and list sources or follow-up keywords where useful.',
  ].join('\n');
}

export function createUnknownCommand<TContext>(): CommandHandler<TContext> {
  return {
    name: 'unknown',
    description: 'Fallback for unrecognized commands',
    async handle(ctx) {
      return textResponse(unknownCommandReply(ctx.commandName));
    },
  };
}

export function createSearchCommand<TContext>(): CommandHandler<TContext> {
  return {
    name: 'search',
    description: 'Ask the assistant to look something up',
    usage: '/search <query>',
    async handle(ctx, args) {
      if (args.length === 0) {
        return textResponse(SEARCH_USAGE);
      }
      try {
        const answer = await ctx.completion.complete(buildSearchPrompt(args.join(' ')), {
          signal: ctx.signal,
        });
        return textResponse(answer);
      } catch (err) {
        if (err instanceof CompletionError && err.kind !== 'cancelled') {
          return textResponse(apologyFor(err));
        }
        throw err;
      }
    },
  };
}

export function createStatusCommand<TContext>(info: BotInfo): CommandHandler<TContext> {
  const lines = [`${info.name} v${info.version}`, 'Status: online'];
  if (info.model) lines.push(`Model: ${info.model}`);
  const reply = textResponse(lines.join('\n'));
  return {
    name: 'status',
    description: 'Show bot status',
    async handle() {
      return reply;
    },
  };
}

export function createHelpCommand<TContext>(
  info: BotInfo,
  commands: Array<{ name: string; description: string; usage?: string }>,
): CommandHandler<TContext> {
  const lines = [
    `${info.name} can answer questions, preview links and run commands.`,
    '',
    'Send any message to chat with the assistant.',
    '',
    'Commands:',
    ...commands.map((c) => `${c.usage ?? `/${c.name}`} - ${c.description}`),
  ];
  const reply = textResponse(lines.join('\n'));
  return {
    name: 'help',
    description: 'Show this help message',
    async handle() {
      return reply;
    },
  };
}

/** Registry with exactly /help, /search and /status; everything else is unknown. */
export function createDefaultCommands<TContext = unknown>(info: BotInfo): CommandRegistry<TContext> {
  const registry = new CommandRegistry<TContext>(createUnknownCommand<TContext>());
  registry.register(createSearchCommand<TContext>());
  registry.register(createStatusCommand<TContext>(info));

  const help = { name: 'help', description: 'Show this help message' };
  registry.register(createHelpCommand<TContext>(info, [help, ...registry.list()]));
  return registry;
}
