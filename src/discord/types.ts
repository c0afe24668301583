import type { MessageReplyOptions } from 'discord.js';

/**
 * The parts of a discord.js Message the bot reads
 */
export interface InboundMessage {
  id: string;
  channelId: string;
  /** Raw content, mention markup intact */
  content: string;
  /** Content with mentions rendered as names */
  cleanContent: string;
  author: { id: string };
  guild: { members: { me: { nickname: string | null } | null } } | null;
  reply(options: string | MessageReplyOptions): Promise<unknown>;
}

/**
 * Discord bot settings
 */
export interface BotConfig {
  /** Bot token */
  token: string;
  /** Longest reply sent as message text */
  messageLimit: number;
}

/**
 * What to do with an inbound message
 */
export type MessageRoute = 'ignore' | 'infer' | 'acknowledge';

/**
 * Shape of the reply to a generated output
 */
export type ReplyPlan =
  | { kind: 'none' }
  | { kind: 'text'; content: string }
  | { kind: 'attachment'; notice: string; fileName: string; data: Buffer };

/**
 * Bot state
 */
export interface BotState {
  /** Logged in and ready */
  isRunning: boolean;
  /** Last client error */
  lastError?: Error;
  /** Messages accepted but not yet answered */
  pendingRequests: number;
}
