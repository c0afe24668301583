import { MessageMentions } from 'discord.js';
import type { MessageRoute } from './types.js';

const USER_MENTION = new RegExp(MessageMentions.UsersPattern.source, 'g');

/**
 * User ids mentioned in raw message content, in order of appearance
 */
export function extractRawMentions(content: string): string[] {
  return Array.from(content.matchAll(USER_MENTION), (m) => m[1]).filter((id): id is string => id !== undefined);
}

/**
 * Decide how to handle a message.
 * Only a message whose first mention is the bot gets an inference reply;
 * being mentioned later on gets an acknowledgement.
 */
export function routeMessage(input: { authorId: string; botId: string; rawMentions: readonly string[] }): MessageRoute {
  if (input.authorId === input.botId) return 'ignore';
  if (input.rawMentions.length === 0) return 'ignore';
  if (input.rawMentions[0] === input.botId) return 'infer';
  if (input.rawMentions.includes(input.botId)) return 'acknowledge';
  return 'ignore';
}

/**
 * Non-empty names, longest first so a name is never cut by one it contains
 */
export function uniqueNames(names: ReadonlyArray<string | null | undefined>): string[] {
  const present = names.filter((n): n is string => typeof n === 'string' && n.length > 0);
  return Array.from(new Set(present)).sort((a, b) => b.length - a.length);
}
