import { describe, it, expect, vi } from 'vitest';
import { CommandRegistry, type CommandContext, type CommandHandler } from '../../src/commands/registry.ts';
import {
  createDefaultCommands,
  createUnknownCommand,
  EMPTY_COMMAND_REPLY,
  SEARCH_USAGE,
  buildSearchPrompt,
} from '../../src/commands/builtin.ts';
import { CompletionClient, type CompletionProvider } from '../../src/completion/client.ts';
import { CompletionError } from '../../src/errors.ts';
import { textResponse } from '../../src/types.ts';

const info = { name: 'TestBot', version: '1.2.3', model: 'groq/test-model' };

function makeContext(commandName: string, provider?: CompletionProvider): CommandContext {
  const invoke = provider?.invoke ?? vi.fn(async () => 'unused');
  return {
    message: { text: `/${commandName}`, context: null },
    completion: new CompletionClient({ invoke }),
    commandName,
  };
}

describe('CommandRegistry', () => {
  it('should resolve registered commands case-insensitively', () => {
    const registry = new CommandRegistry(createUnknownCommand());
    const ping: CommandHandler = {
      name: 'ping',
      description: 'pong',
      handle: async () => textResponse('pong'),
    };
    registry.register(ping);
    expect(registry.resolve('ping')).toBe(ping);
    expect(registry.resolve('PING')).toBe(ping);
  });

  it('should fall back for unknown names', () => {
    const fallback = createUnknownCommand();
    const registry = new CommandRegistry(fallback);
    expect(registry.resolve('nope')).toBe(fallback);
  });

  it('should refuse duplicate registrations', () => {
    const registry = new CommandRegistry(createUnknownCommand());
    const cmd: CommandHandler = { name: 'x', description: 'x', handle: async () => textResponse('x') };
    registry.register(cmd);
    expect(() => registry.register(cmd)).toThrow('Command already registered: /x');
  });
});

describe('default commands', () => {
  it('should know exactly help, search and status', () => {
    const registry = createDefaultCommands(info);
    expect(registry.list().map((c) => c.name)).toEqual(['search', 'status', 'help']);
  });

  it('should name the unknown command and point to /help', async () => {
    const registry = createDefaultCommands(info);
    const response = await registry.resolve('unknowncmd').handle(makeContext('unknowncmd'), []);
    expect(response).toEqual({
      type: 'text',
      text: 'Unknown command: /unknowncmd. Type /help to see available commands.',
    });
  });

  it('should answer /help with a static listing', async () => {
    const registry = createDefaultCommands(info);
    const help = registry.resolve('help');
    const first = await help.handle(makeContext('help'), []);
    const second = await help.handle(makeContext('help'), ['ignored', 'args']);
    expect(first).toEqual(second);
    expect(first).toEqual({
      type: 'text',
      text: [
        'TestBot can answer questions, preview links and run commands.',
        '',
        'Send any message to chat with the assistant.',
        '',
        'Commands:',
        '/help - Show this help message',
        '/search <query> - Ask the assistant to look something up',
        '/status - Show bot status',
      ].join('\n'),
    });
  });

  it('should answer /status with bot name, version and model', async () => {
    const registry = createDefaultCommands(info);
    const response = await registry.resolve('status').handle(makeContext('status'), ['x']);
    expect(response).toEqual({
      type: 'text',
      text: 'TestBot v1.2.3\nStatus: online\nModel: groq/test-model',
    });
  });

  it('should reply with usage and skip completion when /search has no args', async () => {
    const invoke = vi.fn(async () => 'should not be called');
    const registry = createDefaultCommands(info);
    const response = await registry.resolve('search').handle(makeContext('search', { invoke }), []);
    expect(response).toEqual({ type: 'text', text: SEARCH_USAGE });
    expect(invoke).not.toHaveBeenCalled();
  });

  it('should run a completion for /search with args', async () => {
    const invoke = vi.fn(async (_prompt: string) => 'TypeScript is a typed superset of JavaScript.');
    const registry = createDefaultCommands(info);
    const response = await registry
      .resolve('search')
      .handle(makeContext('search', { invoke }), ['typescript', 'basics']);

    expect(response).toEqual({ type: 'text', text: 'TypeScript is a typed superset of JavaScript.' });
    expect(invoke).toHaveBeenCalledTimes(1);
    expect(invoke.mock.calls[0][0]).toBe(buildSearchPrompt('typescript basics'));
  });

  it('should apologize when the search completion fails', async () => {
    const invoke = vi.fn(async (): Promise<string> => {
      throw new CompletionError('rate limited');
    });
    const registry = createDefaultCommands(info);
    const response = await registry.resolve('search').handle(makeContext('search', { invoke }), ['x']);
    expect(response).toEqual({
      type: 'text',
      text: 'I encountered an error: rate limited. Please try again.',
    });
  });

  it('should expose the empty-command reply', () => {
    expect(EMPTY_COMMAND_REPLY).toContain('/help');
  });
});
