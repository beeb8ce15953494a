import { access } from 'node:fs/promises';
import { configPath, configuredProviders, loadConfig } from '@parley/server';
import { bold, green, red, dim, banner } from '../utils/print.ts';

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export interface StatusResult {
  configPath: string;
  configExists: boolean;
  /** Set when the file exists but does not load. */
  configError: string | null;
  botName: string | null;
  model: string | null;
  providers: Record<string, boolean>;
  channels: Record<string, boolean>;
  port: number;
}

export async function getStatus(path: string = configPath()): Promise<StatusResult> {
  const result: StatusResult = {
    configPath: path,
    configExists: false,
    configError: null,
    botName: null,
    model: null,
    providers: { groq: false, openai: false, anthropic: false, gemini: false },
    channels: { cli: false, telegram: false },
    port: 4000,
  };

  if (!(await fileExists(path))) return result;
  result.configExists = true;

  try {
    const config = await loadConfig(path);
    result.botName = config.bot.name;
    result.model = config.model.id;
    result.port = config.server.port;
    result.providers = configuredProviders(config);
    result.channels = {
      cli: config.channels.cli?.enabled ?? false,
      telegram: config.channels.telegram?.enabled ?? false,
    };
  } catch (err) {
    result.configError = err instanceof Error ? err.message : String(err);
  }

  return result;
}

export async function runStatus(): Promise<void> {
  banner('Parley Status');

  const status = await getStatus();

  if (!status.configExists) {
    console.log(`Config:    ${status.configPath} ${red('✗ not found')}`);
    console.log(`\nCopy ${bold('config.example.json')} there (or set PARLEY_CONFIG) to set up.`);
    return;
  }

  if (status.configError) {
    console.log(`Config:    ${status.configPath} ${red('✗ invalid')}`);
    console.log(dim(status.configError));
    return;
  }

  console.log(`Config:    ${status.configPath} ${green('✓')}`);
  console.log(`Bot:       ${status.botName ?? dim('not set')}`);
  console.log(`Model:     ${status.model ?? dim('not set')}`);
  console.log('Providers:');
  for (const [name, configured] of Object.entries(status.providers)) {
    const mark = configured ? `${green('✓')} configured` : `${dim('-')} not set`;
    console.log(`  ${name.padEnd(12)} ${mark}`);
  }
  console.log('Channels:');
  for (const [name, enabled] of Object.entries(status.channels)) {
    const mark = enabled ? `${green('✓')} enabled` : `${dim('-')} disabled`;
    console.log(`  ${name.padEnd(12)} ${mark}`);
  }
  console.log(`Server:    port ${status.port}`);
}
