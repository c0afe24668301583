import { loadConfig, validateConfig } from './config.js';
import { makeLogger } from './logger.js';
import { InferenceClient } from './inference/index.js';
import { MessageBridge } from './bridge/index.js';
import { MimeBot } from './discord/index.js';

async function main(): Promise<void> {
  const config = loadConfig();

  const logger = makeLogger(config.log);
  for (const warning of validateConfig(config)) {
    logger.warn(warning);
  }

  logger.info(
    { baseUrl: config.inference.baseUrl, model: config.inference.model, generation: config.inference.generation },
    'Initializing components',
  );

  // Local model behind an OpenAI-compatible endpoint
  const inferenceClient = new InferenceClient(config.inference);

  const bridge = new MessageBridge({
    engine: inferenceClient,
    outputPath: config.output.inferencePath,
    logger,
  });

  const bot = new MimeBot(
    {
      token: config.discord.token,
      messageLimit: config.discord.messageLimit,
    },
    bridge,
    logger,
  );

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutting down');
    await bot.stop();
    logger.flush();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await bot.start();

  console.log(`mime is running. Logging to ${config.log.file}. Press Ctrl+C to stop.`);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
