import { generateText, type LanguageModel } from 'ai';
import type { CompletionProvider } from './client.ts';

export interface ModelProviderOptions {
  system?: string;
  temperature?: number;
  maxOutputTokens?: number;
}

export const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful assistant in a team chat. Answer clearly and concisely. Use Markdown sparingly.';

/** CompletionProvider backed by an AI SDK language model. */
export function createModelProvider(
  model: LanguageModel,
  options: ModelProviderOptions = {},
): CompletionProvider {
  return {
    async invoke(prompt, { signal }) {
      const result = await generateText({
        model,
        system: options.system ?? DEFAULT_SYSTEM_PROMPT,
        prompt,
        temperature: options.temperature ?? 0.7,
        maxOutputTokens: options.maxOutputTokens ?? 1024,
        maxRetries: 0,
        abortSignal: signal,
      });
      return result.text;
    },
  };
}
