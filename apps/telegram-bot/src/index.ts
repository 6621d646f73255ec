/**
 * Telegram Bot Entry Point
 *
 * Answers a single owner account. Command messages are handed to the
 * dispatcher and handled in the background; everything else is ignored.
 */

import { Bot, GrammyError, HttpError } from 'grammy';
import { createLogger, logger as rootLogger, setLogLevel } from '@tunegrab/utils';
import { buildCommands } from './commands/index.js';
import { loadConfig, loadEnvFile } from './config.js';
import { Dispatcher } from './dispatcher.js';
import { createServices } from './services.js';

async function main(): Promise<void> {
  loadEnvFile();
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const logger = createLogger({ component: 'telegram-bot' });

  logger.info('Starting Telegram bot...');

  const bot = new Bot(config.botToken);
  const services = await createServices(config, bot.api, logger);
  const dispatcher = new Dispatcher(services, buildCommands());

  // Owner-only access
  bot.use(async (ctx, next) => {
    if (ctx.from?.id === config.ownerId) {
      await next();
      return;
    }
    if (ctx.message?.text?.startsWith('/')) {
      logger.warn({ userId: ctx.from?.id, chatId: ctx.chat?.id }, 'Ignoring command from unauthorised account');
    }
  });

  bot.on('message:text', (ctx) => {
    dispatcher.submit({
      conversation: ctx.chat.id,
      messageId: ctx.message.message_id,
      text: ctx.message.text,
    });
  });

  // Error handling
  bot.catch((err) => {
    const e = err.error;
    if (e instanceof GrammyError) {
      logger.error({ err: e, updateId: err.ctx.update.update_id }, 'Error in request');
    } else if (e instanceof HttpError) {
      logger.error({ err: e, updateId: err.ctx.update.update_id }, 'Could not contact Telegram');
    } else {
      logger.error({ err: e, updateId: err.ctx.update.update_id }, 'Unknown error');
    }
  });

  // Graceful shutdown
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    logger.info({ signal, pending: dispatcher.pending }, 'Shutting down bot...');
    await bot.stop();
    await dispatcher.drain();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }

  await bot.start({
    onStart: (botInfo) => {
      logger.info({
        username: botInfo.username,
        ownerId: config.ownerId,
        catalog: services.catalog.state,
        autoClear: config.features.autoClear,
      }, 'Bot started');
    },
  });
}

main().catch((err: unknown) => {
  rootLogger.fatal({ err }, 'Fatal error');
  process.exit(1);
});
