import { describe, it, expect } from 'vitest';
import { mkdtemp, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { getStatus } from '../src/commands/status.ts';

async function tempPath(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'parley-status-'));
  return join(dir, 'config.json');
}

describe('Status', () => {
  it('should report a missing config', async () => {
    const path = await tempPath();

    const status = await getStatus(path);
    expect(status).toEqual({
      configPath: path,
      configExists: false,
      configError: null,
      botName: null,
      model: null,
      providers: { groq: false, openai: false, anthropic: false, gemini: false },
      channels: { cli: false, telegram: false },
      port: 4000,
    });
  });

  it('should summarize a valid config', async () => {
    const path = await tempPath();
    await writeFile(
      path,
      JSON.stringify({
        bot: { name: 'Helper' },
        model: { id: 'gemini/gemini-2.0-flash' },
        providers: { gemini: { apiKey: 'test-key' } },
        server: { port: 8080 },
        channels: { telegram: { enabled: true, token: 'test-token' } },
      }),
      'utf-8',
    );

    const status = await getStatus(path);
    expect(status.configExists).toBe(true);
    expect(status.configError).toBeNull();
    expect(status.botName).toBe('Helper');
    expect(status.model).toBe('gemini/gemini-2.0-flash');
    expect(status.port).toBe(8080);
    expect(status.providers).toEqual({ groq: false, openai: false, anthropic: false, gemini: true });
    expect(status.channels).toEqual({ cli: false, telegram: true });
  });

  it('should keep the load error for an invalid config', async () => {
    const path = await tempPath();
    await writeFile(path, '{"server":{"port":-1}}', 'utf-8');

    const status = await getStatus(path);
    expect(status.configExists).toBe(true);
    expect(status.configError).toContain(`Invalid config at ${path}: server.port`);
    expect(status.model).toBeNull();
  });
});
