import { cardResponse, textResponse } from '../types.ts';
import { basicLinkPreview, type LinkPreviewProvider } from '../cards/link-preview.ts';
import type { RouteDefinition } from './pattern-matcher.ts';

export const GREETING_REPLY = 'Hello! How can I assist you today?';

/**
 * Whole words only, any case: "Hi there" and "HELLO" greet, while "this",
 * "sayhello" and "hellooo" fall through to the other routes.
 */
export const GREETING_PATTERN = /\b(?:hello|hi|greetings)\b/i;
export const LINK_PATTERN = /https?:\/\/[^\s<>"']+/;

export interface DefaultRoutesOptions {
  linkPreview?: LinkPreviewProvider;
}

/** Built-in route table, in precedence order: greeting, then link preview. */
export function createDefaultRoutes<TContext = unknown>(
  options: DefaultRoutesOptions = {},
): RouteDefinition<TContext>[] {
  const linkPreview = options.linkPreview ?? basicLinkPreview;
  return [
    {
      name: 'greeting',
      pattern: GREETING_PATTERN,
      handler: () => textResponse(GREETING_REPLY),
    },
    {
      name: 'link-preview',
      pattern: LINK_PATTERN,
      handler: async ({ match, signal }) => cardResponse(await linkPreview.preview(match[0], signal)),
    },
  ];
}
