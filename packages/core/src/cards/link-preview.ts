import type { RichCard } from '../types.ts';

/** Builds a card for a URL. Fetching and scraping the page is up to the implementation. */
export interface LinkPreviewProvider {
  preview(url: string, signal?: AbortSignal): Promise<RichCard>;
}

/** Card from the URL alone: host as title, full URL as body, one action. */
export const basicLinkPreview: LinkPreviewProvider = {
  async preview(url) {
    const host = URL.canParse(url) ? new URL(url).hostname : url;
    return {
      title: host,
      text: url,
      actions: [{ title: 'Open link', url }],
    };
  },
};

/** Plain-text rendering for transports without rich layout. */
export function renderCardText(card: RichCard): string {
  const lines = [card.title];
  if (card.subtitle) lines.push(card.subtitle);
  if (card.text) lines.push('', card.text);
  if (card.imageUrl) lines.push(`[image] ${card.imageUrl}`);
  if (card.actions.length > 0) {
    lines.push('');
    for (const action of card.actions) {
      lines.push(`- ${action.title}: ${action.url}`);
    }
  }
  return lines.join('\n');
}
