// Types
export type {
  BotConfig,
  BotState,
  InboundMessage,
  MessageRoute,
  ReplyPlan,
} from './types.js';

// Classes
export { MimeBot } from './bot.js';

export { extractRawMentions, routeMessage, uniqueNames } from './mentions.js';
export { ACKNOWLEDGEMENT, planReply } from './reply.js';
