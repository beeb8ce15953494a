import { InlineKeyboard } from 'grammy';
import type { RichCard } from '@parley/core';

export const TELEGRAM_MAX_MESSAGE = 4000;
export const TELEGRAM_MAX_CAPTION = 1024;

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

// Applied in order to already-escaped text.
const INLINE_RULES: Array<[RegExp, string]> = [
  [/\[([^\]]+)\]\(([^)\s]+)\)/g, '<a href="$2">$1</a>'],
  [/\*\*(.+?)\*\*/g, '<b>$1</b>'],
  [/__(.+?)__/g, '<b>$1</b>'],
  [/(?<![\w*])\*(?![\s*])(.+?)(?<![\s*])\*(?![\w*])/g, '<i>$1</i>'],
  [/(?<!\w)_(?![\s_])(.+?)(?<![\s_])_(?!\w)/g, '<i>$1</i>'],
  [/~~(.+?)~~/g, '<s>$1</s>'],
];

function inline(text: string): string {
  return INLINE_RULES.reduce((acc, [pattern, replacement]) => acc.replace(pattern, replacement), escapeHtml(text));
}

function convertLine(line: string): string {
  const heading = /^#{1,6}\s+(.*)$/.exec(line);
  if (heading) return `<b>${inline(heading[1])}</b>`;

  const unquoted = line.replace(/^>\s?/, '');
  const bullet = /^\s*[-*+]\s+(.*)$/.exec(unquoted);
  if (bullet) return `• ${inline(bullet[1])}`;

  return inline(unquoted);
}

/**
 * Convert model Markdown into the HTML subset Telegram accepts.
 * Code spans and blocks are set aside first so nothing inside them is rewritten.
 */
export function markdownToTelegramHtml(markdown: string): string {
  const held: string[] = [];
  const hold = (html: string) => `\u0000${held.push(html) - 1}\u0000`;

  const withoutCode = markdown
    .replace(/```[\w+-]*\n?([\s\S]*?)```/g, (_m, code: string) =>
      hold(`<pre>${escapeHtml(code.replace(/\n$/, ''))}</pre>`),
    )
    .replace(/`([^`\n]+)`/g, (_m, code: string) => hold(`<code>${escapeHtml(code)}</code>`));

  return withoutCode
    .split('\n')
    .map(convertLine)
    .join('\n')
    .replace(/\u0000(\d+)\u0000/g, (_m, idx: string) => held[Number(idx)] ?? '')
    .trim();
}

/** Split at the last newline (else space) that fits; hard-cut when neither does. */
export function splitMessage(content: string, maxLen = TELEGRAM_MAX_MESSAGE): string[] {
  const chunks: string[] = [];
  let rest = content;

  while (rest.length > maxLen) {
    const window = rest.slice(0, maxLen + 1);
    let cut = window.lastIndexOf('\n');
    if (cut <= 0) cut = window.lastIndexOf(' ');
    if (cut <= 0) cut = maxLen;

    chunks.push(rest.slice(0, cut));
    rest = rest.slice(cut).replace(/^[\n ]/, '');
  }

  chunks.push(rest);
  return chunks;
}

export function renderCardHtml(card: RichCard): string {
  const lines = [`<b>${escapeHtml(card.title)}</b>`];
  if (card.subtitle) lines.push(`<i>${escapeHtml(card.subtitle)}</i>`);
  if (card.text) lines.push('', escapeHtml(card.text));
  return lines.join('\n');
}

/** One URL button per row; undefined when the card has no actions. */
export function cardKeyboard(card: RichCard): InlineKeyboard | undefined {
  if (card.actions.length === 0) return undefined;
  return InlineKeyboard.from(card.actions.map((action) => [InlineKeyboard.url(action.title, action.url)]));
}
