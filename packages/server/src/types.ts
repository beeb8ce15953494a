import type { LanguageModel } from 'ai';
import type { CompletionProvider, LinkPreviewProvider, ModelProviderOptions } from '@parley/core';
import type { CLIChannelConfig, TelegramChannelConfig } from '@parley/channels';

export interface ChannelsConfig {
  cli?: CLIChannelConfig;
  telegram?: TelegramChannelConfig;
}

export interface CompletionSettings extends ModelProviderOptions {
  timeoutMs?: number;
}

export interface ServerConfig {
  name?: string;        // default: 'Parley'
  version?: string;     // default: '0.1.0'
  port?: number;        // default: 4000
  host?: string;        // default: 'localhost'
  adminApiKey?: string;
  model: LanguageModel;
  /** Shown by /status; defaults to the model id when the model is a string. */
  modelLabel?: string;
  completion?: CompletionSettings;
  /** Replaces the AI SDK provider built from `model`. */
  completionProvider?: CompletionProvider;
  linkPreview?: LinkPreviewProvider;
  channels?: ChannelsConfig;
}
