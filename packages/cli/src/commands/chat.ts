import { renderCardText, type OutboundResponse } from '@parley/core';
import { CLIChannel } from '@parley/channels';
import { loadConfig, toServerConfig, createServer } from '@parley/server';
import { bold, green, dim } from '../utils/print.ts';
import { stopOnSignals } from './shutdown.ts';

export interface ChatArgs {
  /** Set for one-shot mode. */
  message: string | null;
}

export function parseChatArgs(args: string[]): ChatArgs {
  const index = args.findIndex((arg) => arg === '-m' || arg === '--message');
  if (index === -1) return { message: null };
  const message = args[index + 1];
  if (message === undefined || message.trim() === '') {
    throw new Error('Option -m needs a message, e.g. parley chat -m "hello"');
  }
  return { message };
}

export function responseText(response: OutboundResponse): string {
  return response.type === 'card' ? renderCardText(response.card) : response.text;
}

export async function runChat(args: string[]): Promise<void> {
  const { message } = parseChatArgs(args);
  const config = await loadConfig();
  const name = config.bot.name;

  if (message) {
    // One-shot mode: resolve, print result, exit
    console.log(dim(`[${name}] One-shot mode\n`));
    const server = createServer(toServerConfig(config));
    try {
      const { response } = await server.dispatcher.resolve({
        text: message,
        context: { channel: 'cli', chatId: 'cli-oneshot', senderId: 'cli-user' },
      });
      console.log(responseText(response));
    } finally {
      await server.stop();
    }
    return;
  }

  // Interactive mode: CLI channel only, no HTTP listener
  console.log(bold(name));
  console.log(dim('Type "exit" to quit. Try /help.\n'));

  const server = createServer({
    ...toServerConfig(config),
    channels: {
      cli: { enabled: true, prompt: `${green('You')}: `, label: name },
    },
  });

  const cli = server.channelManager.getChannel('cli');
  if (cli instanceof CLIChannel) {
    cli.onClose(() => {
      server.stop().then(
        () => process.exit(0),
        (err) => {
          console.error(`[${name}] Shutdown failed:`, err);
          process.exit(1);
        },
      );
    });
  }

  await server.startChannels();
  stopOnSignals(server, name);
}
