#!/usr/bin/env tsx
import { printUsage } from './utils/print.ts';

const [command, ...rest] = process.argv.slice(2);

switch (command) {
  case 'status': {
    const { runStatus } = await import('./commands/status.ts');
    await runStatus();
    break;
  }
  case 'chat': {
    const { runChat } = await import('./commands/chat.ts');
    await runChat(rest);
    break;
  }
  case 'gateway': {
    const { runGateway } = await import('./commands/gateway.ts');
    await runGateway();
    break;
  }
  default:
    printUsage();
    break;
}
