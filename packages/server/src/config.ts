import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import type { LanguageModel } from 'ai';
import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createGroq } from '@ai-sdk/groq';
import { createOpenAI } from '@ai-sdk/openai';
import { DEFAULT_COMPLETION_TIMEOUT_MS, VERSION } from '@parley/core';
import type { ServerConfig } from './types.ts';

export const CONFIG_DIR = join(homedir(), '.parley');
export const DEFAULT_CONFIG_PATH = join(CONFIG_DIR, 'config.json');
export const DEFAULT_MODEL = 'groq/llama-3.1-8b-instant';

const providerKey = z.object({ apiKey: z.string() });

const allowFrom = z.array(z.string()).optional();

export const configSchema = z.object({
  bot: z
    .object({
      name: z.string().min(1).default('Parley'),
    })
    .default({}),
  model: z
    .object({
      id: z.string().min(1).default(DEFAULT_MODEL),
      temperature: z.number().min(0).max(2).default(0.7),
      maxOutputTokens: z.number().int().positive().default(1024),
      timeoutMs: z.number().int().positive().default(DEFAULT_COMPLETION_TIMEOUT_MS),
      systemPrompt: z.string().optional(),
    })
    .default({}),
  providers: z
    .object({
      groq: providerKey.optional(),
      openai: providerKey.optional(),
      anthropic: providerKey.optional(),
      google: providerKey.optional(),
      gemini: providerKey.optional(),
    })
    .default({}),
  server: z
    .object({
      port: z.number().int().min(0).max(65535).default(4000),
      host: z.string().default('localhost'),
      adminApiKey: z.string().optional(),
    })
    .default({}),
  channels: z
    .object({
      cli: z
        .object({
          enabled: z.boolean(),
          prompt: z.string().optional(),
          allowFrom,
        })
        .optional(),
      telegram: z
        .object({
          enabled: z.boolean(),
          token: z.string(),
          allowFrom,
          replyToMessage: z.boolean().optional(),
        })
        .optional(),
    })
    .default({}),
});

export type ParleyConfig = z.infer<typeof configSchema>;
export type ParleyConfigInput = z.input<typeof configSchema>;

/** Replace `${VAR_NAME}` placeholders with `process.env.VAR_NAME` */
export function interpolateEnv(raw: string, env: NodeJS.ProcessEnv = process.env): string {
  return raw.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
    return env[varName] ?? '';
  });
}

export function configPath(env: NodeJS.ProcessEnv = process.env): string {
  return env['PARLEY_CONFIG'] ?? DEFAULT_CONFIG_PATH;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function parseConfig(data: unknown, source = 'config'): ParleyConfig {
  const result = configSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid config at ${source}: ${issues}`);
  }
  return result.data;
}

export async function loadConfig(path?: string): Promise<ParleyConfig> {
  const target = path ?? configPath();
  let raw: string;
  try {
    raw = await readFile(target, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      throw new Error(
        `Config not found at ${target}\n` +
          `Create it with your API keys. See config.example.json for reference.`,
      );
    }
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(interpolateEnv(raw));
  } catch (error) {
    throw new Error(`Invalid config at ${target}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseConfig(data, target);
}

export const SUPPORTED_PROVIDERS = ['groq', 'openai', 'anthropic', 'google', 'gemini'] as const;

/** Providers with an API key set; `google` and `gemini` share one entry. */
export function configuredProviders(config: ParleyConfig): Record<string, boolean> {
  const { providers } = config;
  return {
    groq: Boolean(providers.groq?.apiKey),
    openai: Boolean(providers.openai?.apiKey),
    anthropic: Boolean(providers.anthropic?.apiKey),
    gemini: Boolean(providers.gemini?.apiKey || providers.google?.apiKey),
  };
}

export function resolveModel(config: ParleyConfig): Exclude<LanguageModel, string> {
  const modelString = config.model.id;
  const slashIndex = modelString.indexOf('/');
  if (slashIndex === -1) {
    throw new Error(
      `Invalid model format: "${modelString}". Expected "provider/model-id" (e.g. "${DEFAULT_MODEL}").`,
    );
  }

  const provider = modelString.slice(0, slashIndex);
  const modelId = modelString.slice(slashIndex + 1);

  switch (provider) {
    case 'groq': {
      const apiKey = config.providers.groq?.apiKey;
      if (!apiKey) throw new Error('Missing providers.groq.apiKey in config.');
      return createGroq({ apiKey })(modelId);
    }
    case 'anthropic': {
      const apiKey = config.providers.anthropic?.apiKey;
      if (!apiKey) throw new Error('Missing providers.anthropic.apiKey in config.');
      return createAnthropic({ apiKey })(modelId);
    }
    case 'gemini':
    case 'google': {
      const apiKey = config.providers.gemini?.apiKey || config.providers.google?.apiKey;
      if (!apiKey) throw new Error('Missing providers.gemini.apiKey (or providers.google.apiKey) in config.');
      return createGoogleGenerativeAI({ apiKey })(modelId);
    }
    case 'openai': {
      const apiKey = config.providers.openai?.apiKey;
      if (!apiKey) throw new Error('Missing providers.openai.apiKey in config.');
      return createOpenAI({ apiKey })(modelId);
    }
    default:
      throw new Error(
        `Unknown provider: "${provider}". Supported: ${SUPPORTED_PROVIDERS.join(', ')}.`,
      );
  }
}

/** Map a loaded config onto `createServer` options. */
export function toServerConfig(config: ParleyConfig, model: LanguageModel = resolveModel(config)): ServerConfig {
  return {
    name: config.bot.name,
    version: VERSION,
    port: config.server.port,
    host: config.server.host,
    adminApiKey: config.server.adminApiKey,
    model,
    modelLabel: config.model.id,
    completion: {
      temperature: config.model.temperature,
      maxOutputTokens: config.model.maxOutputTokens,
      timeoutMs: config.model.timeoutMs,
      system: config.model.systemPrompt,
    },
    channels: config.channels,
  };
}
