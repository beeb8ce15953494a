export { TelegramChannel, stripBotMention, type TelegramChannelConfig } from './channel.ts';
export {
  markdownToTelegramHtml,
  splitMessage,
  escapeHtml,
  renderCardHtml,
  cardKeyboard,
  TELEGRAM_MAX_MESSAGE,
  TELEGRAM_MAX_CAPTION,
} from './format.ts';
