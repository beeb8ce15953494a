import { Bot, type Context } from 'grammy';
import type { RichCard } from '@parley/core';
import { BaseChannel, type ChannelConfig } from '../base-channel.ts';
import type { MessageBus } from '../bus.ts';
import type { ChannelReply } from '../messages.ts';
import {
  TELEGRAM_MAX_CAPTION,
  cardKeyboard,
  markdownToTelegramHtml,
  renderCardHtml,
  splitMessage,
} from './format.ts';

export interface TelegramChannelConfig extends ChannelConfig {
  token: string;
  /** Thread replies under the user's message. */
  replyToMessage?: boolean;
}

const TYPING_REFRESH_MS = 4000;

/** `/help@MyBot args` → `/help args` when addressed to this bot. */
export function stripBotMention(text: string, botUsername: string | null): string {
  if (!botUsername) return text;
  const mention = new RegExp(`^(\\s*/[^\\s@]+)@${botUsername}(?=\\s|$)`, 'i');
  return text.replace(mention, '$1');
}

export class TelegramChannel extends BaseChannel {
  readonly name = 'telegram';
  private bot: Bot | null = null;
  private botUsername: string | null = null;
  private typingIntervals = new Map<string, ReturnType<typeof setInterval>>();

  constructor(
    protected override config: TelegramChannelConfig,
    bus: MessageBus,
  ) {
    super(config, bus);
  }

  async start(): Promise<void> {
    const bot = new Bot(this.config.token);
    bot.on('message:text', (ctx) => this.onText(ctx));
    bot.catch((err) => {
      console.error(`[${this.name}] Update handling error:`, err.error);
    });

    const me = await bot.api.getMe();
    this.botUsername = me.username;
    this.bot = bot;

    bot.start({ allowed_updates: ['message'] }).catch((err) => {
      console.error(`[${this.name}] Polling stopped:`, err);
      this.running = false;
    });
    this.running = true;
  }

  async stop(): Promise<void> {
    this.running = false;
    for (const interval of this.typingIntervals.values()) {
      clearInterval(interval);
    }
    this.typingIntervals.clear();
    await this.bot?.stop();
    this.bot = null;
  }

  async sendTyping(chatId: string): Promise<void> {
    const bot = this.bot;
    if (!bot) return;
    this.stopTyping(chatId);

    // Registered before the first call so a reply sent meanwhile clears it.
    const interval = setInterval(() => {
      bot.api.sendChatAction(chatId, 'typing').catch((err) => {
        console.error(`[${this.name}] Typing refresh failed:`, err);
        this.stopTyping(chatId);
      });
    }, TYPING_REFRESH_MS);
    this.typingIntervals.set(chatId, interval);

    try {
      await bot.api.sendChatAction(chatId, 'typing');
    } catch (err) {
      if (this.typingIntervals.get(chatId) === interval) this.stopTyping(chatId);
      throw err;
    }
  }

  async send(reply: ChannelReply): Promise<void> {
    if (!this.bot) return;
    this.stopTyping(reply.chatId);

    const replyParameters =
      this.config.replyToMessage && reply.replyTo
        ? { reply_parameters: { message_id: Number(reply.replyTo) } }
        : {};

    if (reply.response.type === 'card') {
      await this.sendCard(this.bot, reply.chatId, reply.response.card, replyParameters);
      return;
    }

    const text = reply.response.text;
    for (const chunk of splitMessage(markdownToTelegramHtml(text))) {
      try {
        await this.bot.api.sendMessage(reply.chatId, chunk, { parse_mode: 'HTML', ...replyParameters });
      } catch (err) {
        console.warn(`[${this.name}] HTML send rejected, retrying as plain text:`, err);
        for (const plain of splitMessage(text)) {
          await this.bot.api.sendMessage(reply.chatId, plain, replyParameters);
        }
        return;
      }
    }
  }

  private async sendCard(
    bot: Bot,
    chatId: string,
    card: RichCard,
    replyParameters: { reply_parameters?: { message_id: number } },
  ): Promise<void> {
    const html = renderCardHtml(card);
    const keyboard = cardKeyboard(card);
    const markup = keyboard ? { reply_markup: keyboard } : {};

    if (card.imageUrl && html.length <= TELEGRAM_MAX_CAPTION) {
      await bot.api.sendPhoto(chatId, card.imageUrl, {
        caption: html,
        parse_mode: 'HTML',
        ...markup,
        ...replyParameters,
      });
      return;
    }
    await bot.api.sendMessage(chatId, html, { parse_mode: 'HTML', ...markup, ...replyParameters });
  }

  private async onText(ctx: Context): Promise<void> {
    const msg = ctx.message;
    if (!msg?.text || !ctx.chat) return;

    this.handleMessage({
      senderId: this.extractSenderId(ctx),
      chatId: String(ctx.chat.id),
      content: stripBotMention(msg.text, this.botUsername),
      metadata: { messageId: msg.message_id },
    });
  }

  private extractSenderId(ctx: Context): string {
    const user = ctx.from;
    if (!user) return 'unknown';
    return user.username ? `${user.id}|${user.username}` : String(user.id);
  }

  private stopTyping(chatId: string): void {
    const interval = this.typingIntervals.get(chatId);
    if (interval) {
      clearInterval(interval);
      this.typingIntervals.delete(chatId);
    }
  }
}
