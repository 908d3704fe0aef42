import { BotConfigSchema, createLogger, errMessage, loadConfig, startHealthBeat } from '@relaycord/shared';
import { createBot } from './bot';
import { defaultCommands } from './commands';

const logger = createLogger({ name: 'bot' });

async function main() {
  const config = loadConfig(BotConfigSchema);
  const { client } = createBot(config);
  const { session } = client;

  const healthBeat = startHealthBeat({
    intervalMs: config.HEALTHCHECK_INTERVAL_MS,
    path: config.HEALTHCHECK_PATH,
    isHealthy: () => session.state === 'ready',
  });

  session.connect();
  logger.info({ commands: defaultCommands.map((c) => c.name) }, 'Bot started');

  const shutdown = () => {
    logger.info({}, 'Shutting down bot');
    healthBeat.stop();
    session.close();
    process.exit(0);
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  logger.fatal({ err: errMessage(err) }, 'Failed to start bot');
  process.exit(1);
});
