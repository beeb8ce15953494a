import { VERSION } from '@parley/core';

const ESC = '\x1b[';

export const bold = (s: string) => `${ESC}1m${s}${ESC}0m`;
export const dim = (s: string) => `${ESC}2m${s}${ESC}0m`;
export const green = (s: string) => `${ESC}32m${s}${ESC}0m`;
export const red = (s: string) => `${ESC}31m${s}${ESC}0m`;
export const cyan = (s: string) => `${ESC}36m${s}${ESC}0m`;

export function banner(title: string): void {
  const line = '─'.repeat(title.length + 4);
  console.log(bold(title));
  console.log(dim(line));
}

export function printUsage(): void {
  console.log(`
${bold('Parley CLI')} v${VERSION}

${bold('Usage:')} parley <command> [options]

${bold('Commands:')}
  chat        Chat with the bot in this terminal (-m "msg" for one-shot)
  gateway     Start the HTTP server and configured channels
  status      Show configuration status

${bold('Examples:')}
  parley chat -m "/help"
  parley chat
  parley gateway
`);
}
