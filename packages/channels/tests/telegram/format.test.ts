import { describe, it, expect } from 'vitest';
import {
  cardKeyboard,
  escapeHtml,
  markdownToTelegramHtml,
  renderCardHtml,
  splitMessage,
} from '../../src/telegram/format.ts';

describe('markdownToTelegramHtml', () => {
  it('should escape HTML special characters', () => {
    expect(markdownToTelegramHtml('a < b & c > d')).toBe('a &lt; b &amp; c &gt; d');
  });

  it('should convert bold, italic and strikethrough', () => {
    expect(markdownToTelegramHtml('**bold** and *it* and ~~gone~~')).toBe(
      '<b>bold</b> and <i>it</i> and <s>gone</s>',
    );
  });

  it('should leave underscores inside words alone', () => {
    expect(markdownToTelegramHtml('use snake_case_names here')).toBe('use snake_case_names here');
  });

  it('should convert links', () => {
    expect(markdownToTelegramHtml('[docs](https://example.com)')).toBe('<a href="https://example.com">docs</a>');
  });

  it('should render headings as bold and bullets as dots', () => {
    expect(markdownToTelegramHtml('## Steps\n- one\n* two')).toBe('<b>Steps</b>\n• one\n• two');
  });

  it('should drop blockquote markers', () => {
    expect(markdownToTelegramHtml('> quoted text')).toBe('quoted text');
  });

  it('should not rewrite inside code', () => {
    expect(markdownToTelegramHtml('run `a**b**<c>` now')).toBe('run <code>a**b**&lt;c&gt;</code> now');
    expect(markdownToTelegramHtml('```ts\nconst x = 1 < 2;\n- not a bullet\n```')).toBe(
      '<pre>const x = 1 &lt; 2;\n- not a bullet</pre>',
    );
  });
});

describe('splitMessage', () => {
  it('should return short content as one chunk', () => {
    expect(splitMessage('short', 10)).toEqual(['short']);
  });

  it('should prefer newlines, then spaces', () => {
    expect(splitMessage('line one\nline two', 12)).toEqual(['line one', 'line two']);
    expect(splitMessage('aaaa bbbb', 5)).toEqual(['aaaa', 'bbbb']);
  });

  it('should hard-cut when there is nowhere to split', () => {
    expect(splitMessage('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
  });
});

describe('cards', () => {
  it('should render title, subtitle and body as escaped HTML', () => {
    expect(
      renderCardHtml({ title: 'R&D <news>', subtitle: 'weekly', text: 'a < b', actions: [] }),
    ).toBe('<b>R&amp;D &lt;news&gt;</b>\n<i>weekly</i>\n\na &lt; b');
  });

  it('should build one URL button per row', () => {
    const keyboard = cardKeyboard({
      title: 't',
      actions: [
        { title: 'Open', url: 'https://example.com' },
        { title: 'Docs', url: 'https://example.com/docs' },
      ],
    });
    expect(keyboard?.inline_keyboard).toEqual([
      [{ text: 'Open', url: 'https://example.com' }],
      [{ text: 'Docs', url: 'https://example.com/docs' }],
    ]);
  });

  it('should skip the keyboard when there are no actions', () => {
    expect(cardKeyboard({ title: 't', actions: [] })).toBeUndefined();
  });

  it('should escape ampersands first', () => {
    expect(escapeHtml('&lt;')).toBe('&amp;lt;');
  });
});
