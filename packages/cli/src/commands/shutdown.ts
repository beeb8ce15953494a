import type { ParleyServer } from '@parley/server';
import { dim } from '../utils/print.ts';

export function stopOnSignals(server: ParleyServer, name: string): void {
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, async () => {
      console.log(dim(`\n[${name}] Shutting down...`));
      await server.stop();
      process.exit(0);
    });
  }
}
