import { loadConfig, toServerConfig, createServer } from '@parley/server';
import { stopOnSignals } from './shutdown.ts';

export async function runGateway(): Promise<void> {
  const config = await loadConfig();
  const server = createServer({
    ...toServerConfig(config),
    port: Number(process.env.PORT) || config.server.port,
  });

  await server.start();
  stopOnSignals(server, config.bot.name);
}
