/**
 * Chat Dispatch Bot
 * Main entry point
 */

import { loadConfigFromEnv } from './core/config.js';
import { createLogger } from './core/logger.js';
import { createRobot } from './bot/index.js';
import { SHELL_USER } from './chat/shell.js';
import { createExampleModule } from './modules/index.js';

async function main(): Promise<void> {
  let logger = createLogger('info');

  try {
    const config = loadConfigFromEnv();
    logger = createLogger(config.logging.level);
    logger.info('Chat Dispatch Bot - Starting...', { adapter: config.chat.adapter, name: config.bot.name });

    const robot = createRobot({ config, logger });

    await robot.registerModule(createExampleModule({
      admins: config.chat.adapter === 'shell' ? [SHELL_USER.name] : [],
    }));
    if (config.bot.enableHelp) {
      await robot.enableHelp();
    }

    const shutdown = async (): Promise<void> => {
      logger.info('Shutting down...');
      try {
        await robot.stop();
        process.exit(0);
      } catch (error) {
        logger.error('Failed to stop cleanly', error instanceof Error ? error : new Error(String(error)));
        process.exit(1);
      }
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());

    await robot.run();
  } catch (error) {
    logger.error('Failed to start bot', error instanceof Error ? error : new Error(String(error)));
    process.exit(1);
  }
}

void main();
