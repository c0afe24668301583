import {
  AttachmentBuilder,
  Client,
  Events,
  GatewayIntentBits,
  Options,
} from 'discord.js';
import type { MessageBridge } from '../bridge/index.js';
import type { Logger } from '../logger.js';
import { describeError } from '../errors.js';
import { extractRawMentions, routeMessage, uniqueNames } from './mentions.js';
import { ACKNOWLEDGEMENT, planReply } from './reply.js';
import type { BotConfig, BotState, InboundMessage } from './types.js';

const MESSAGE_CACHE_SIZE = 50;

/**
 * Discord client that answers mentions with generated text
 */
export class MimeBot {
  private client: Client;
  private config: BotConfig;
  private bridge: MessageBridge;
  private logger: Logger;
  private state: BotState;
  private botNames: string[] = [];

  constructor(config: BotConfig, bridge: MessageBridge, logger: Logger) {
    this.config = config;
    this.bridge = bridge;
    this.logger = logger;
    this.state = {
      isRunning: false,
      pendingRequests: 0,
    };

    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.MessageContent,
      ],
      makeCache: Options.cacheWithLimits({
        ...Options.DefaultMakeCacheSettings,
        MessageManager: MESSAGE_CACHE_SIZE,
      }),
    });

    this.setupEventHandlers();
  }

  /**
   * Wire client events
   */
  private setupEventHandlers(): void {
    this.client.once(Events.ClientReady, async (client) => {
      this.state.isRunning = true;
      try {
        const application = await client.application.fetch();
        this.botNames = uniqueNames([application.name, client.user.username, client.user.globalName]);
      } catch (error) {
        this.logger.warn({ error: describeError(error) }, 'Could not fetch application; using the bot username');
        this.botNames = uniqueNames([client.user.username, client.user.globalName]);
      }
      this.logger.info({ applicationId: client.application.id, user: client.user.tag }, 'Logged on');
    });

    this.client.on(Events.MessageCreate, (message) => {
      void this.handleMessage(message);
    });

    this.client.on(Events.Error, (error) => {
      this.logger.error({ error: describeError(error) }, 'Discord client error');
      this.state.lastError = error;
    });
  }

  /**
   * Handle one inbound message
   */
  async handleMessage(message: InboundMessage): Promise<void> {
    const botUser = this.client.user;
    if (!botUser) return;

    this.logger.info({ messageId: message.id, channelId: message.channelId, content: message.cleanContent }, 'Processing message');

    const route = routeMessage({
      authorId: message.author.id,
      botId: botUser.id,
      rawMentions: extractRawMentions(message.content),
    });

    try {
      if (route === 'infer') {
        await this.replyWithInference(message);
      } else if (route === 'acknowledge') {
        await message.reply(ACKNOWLEDGEMENT);
      }
    } catch (error) {
      this.logger.error(
        { error: describeError(error), messageId: message.id, channelId: message.channelId, route },
        'Message handling failed',
      );
    }
  }

  private async replyWithInference(message: InboundMessage): Promise<void> {
    const startedAt = Date.now();
    const names = this.namesFor(message);

    this.state.pendingRequests++;
    try {
      const result = await this.bridge.process(message.cleanContent, names);
      const plan = planReply(result.output, this.config.messageLimit, result.outputPath);

      switch (plan.kind) {
        case 'none':
          this.logger.warn({ messageId: message.id }, 'Model returned an empty response; not replying');
          return;
        case 'text':
          await message.reply(plan.content);
          break;
        case 'attachment':
          await message.reply({
            content: plan.notice,
            files: [new AttachmentBuilder(plan.data, { name: plan.fileName })],
          });
          break;
      }

      this.logger.info(
        { messageId: message.id, replyKind: plan.kind, durationMs: Date.now() - startedAt },
        'Replied',
      );
    } finally {
      this.state.pendingRequests--;
    }
  }

  /**
   * Bot names plus the nickname it carries in this guild
   */
  private namesFor(message: InboundMessage): string[] {
    const nickname = message.guild?.members.me?.nickname;
    return nickname ? uniqueNames([...this.botNames, nickname]) : this.botNames;
  }

  /**
   * Log in
   */
  async start(): Promise<void> {
    this.logger.info('Starting mime...');
    await this.client.login(this.config.token);
  }

  /**
   * Disconnect
   */
  async stop(): Promise<void> {
    this.logger.info('Stopping mime...');
    this.state.isRunning = false;
    await this.client.destroy();
  }

  getState(): BotState {
    return { ...this.state };
  }
}
