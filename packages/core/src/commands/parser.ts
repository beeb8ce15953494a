import type { SlashCommand } from '../types.ts';

export const COMMAND_PREFIX = '/';

export function isCommand(text: string): boolean {
  return text.trim().startsWith(COMMAND_PREFIX);
}

/**
 * Split a slash command into a lower-cased name and its whitespace-separated
 * arguments. Returns null for non-command text and for a bare `/`.
 */
export function parseCommand(text: string): SlashCommand | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith(COMMAND_PREFIX)) return null;

  const tokens = trimmed.slice(COMMAND_PREFIX.length).trim().split(/\s+/).filter(Boolean);
  const [name, ...args] = tokens;
  if (!name) return null;

  return { name: name.toLowerCase(), args };
}
