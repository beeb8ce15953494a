import * as readline from 'node:readline';
import { renderCardText } from '@parley/core';
import { BaseChannel, type ChannelConfig } from './base-channel.ts';
import type { MessageBus } from './bus.ts';
import type { ChannelReply } from './messages.ts';

export interface CLIChannelConfig extends ChannelConfig {
  prompt?: string;
  /** Prefix for bot output lines. */
  label?: string;
}

export const CLI_EXIT_WORDS = ['exit', 'quit'];

export function formatCliReply(reply: ChannelReply, label = 'Bot'): string {
  const body = reply.response.type === 'card' ? renderCardText(reply.response.card) : reply.response.text;
  return body
    .split('\n')
    .map((line) => `${label}: ${line}`)
    .join('\n');
}

export class CLIChannel extends BaseChannel {
  readonly name = 'cli';
  private rl: readline.Interface | null = null;
  private prompt: string;
  private label: string;
  private closeListeners: Array<() => void> = [];

  constructor(config: CLIChannelConfig, bus: MessageBus) {
    super(config, bus);
    this.prompt = config.prompt ?? 'You: ';
    this.label = config.label ?? 'Bot';
  }

  async start(): Promise<void> {
    this.running = true;
    this.rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });

    this.rl.on('close', () => {
      this.running = false;
      for (const listener of this.closeListeners) listener();
    });

    this.promptLine();
  }

  /** Called when the user ends the session (exit word or end of input). */
  onClose(listener: () => void): void {
    this.closeListeners.push(listener);
  }

  async stop(): Promise<void> {
    this.running = false;
    this.rl?.close();
    this.rl = null;
  }

  async send(reply: ChannelReply): Promise<void> {
    console.log(formatCliReply(reply, this.label));
    this.promptLine();
  }

  private promptLine(): void {
    if (!this.rl || !this.running) return;
    this.rl.question(this.prompt, (input) => {
      const trimmed = input.trim();
      if (CLI_EXIT_WORDS.includes(trimmed.toLowerCase())) {
        this.rl?.close();
        return;
      }
      if (!trimmed) {
        this.promptLine();
        return;
      }
      this.handleMessage({
        senderId: 'cli-user',
        chatId: 'cli',
        content: trimmed,
      });
    });
  }
}
