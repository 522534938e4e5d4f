import e from 'express';
import helmet from 'helmet';

import BotClient from './services/Client';
import { PORT, WEBHOOK_DOMAIN, WEBHOOK_PATH, validateConfig } from './config';
import logger from './utils/logger';

process.on('uncaughtException', (err) => {
  logger.error('Uncaught Exception:', err);
  process.exit(1);
});
process.on('unhandledRejection', (reason, promise) => {
  logger.error('🔥 Unhandled Rejection at:', promise);
  logger.error('📄 Reason:', reason);
});

validateConfig();

const app = e();
const startTime = Date.now();

app.use(helmet());
app.set('trust proxy', 1);

app.use((req, res, next) => {
  const start = process.hrtime.bigint();
  res.on('finish', () => {
    const durMs = Number(process.hrtime.bigint() - start) / 1e6;
    logger.debug(`HTTP [${req.method}] ${req.originalUrl} ${res.statusCode} ${durMs.toFixed(1)}ms`);
  });
  next();
});

app.get('/health', (req, res) => {
  res.status(200).json({
    status: 'ok',
    uptime: Math.round((Date.now() - startTime) / 1000),
    timestamp: new Date().toISOString(),
  });
});

const bot = new BotClient();

async function start() {
  await bot.init();

  if (WEBHOOK_DOMAIN) {
    app.use(await bot.createWebhook({ domain: WEBHOOK_DOMAIN, path: WEBHOOK_PATH }));
    logger.info(`Receiving updates by webhook at ${WEBHOOK_DOMAIN}${WEBHOOK_PATH}`);
  } else {
    bot
      .launch(() => logger.info('Receiving updates by long polling'))
      .catch((error) => {
        logger.error('Polling stopped with an error:', error);
        process.exit(1);
      });
  }

  app.use((req, res) => {
    res.status(404).json({ status: 404, message: 'Not Found' });
  });

  const server = app.listen(PORT, () => {
    logger.debug('Bot is live on', `http://localhost:${PORT}`);
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`${signal} received. Shutting down gracefully...`);
    server.close(() => logger.info('Server closed'));
    bot
      .shutdown(signal)
      .catch((error) => logger.error('Error during graceful shutdown:', error))
      .finally(() => process.exit(0));
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

start().catch((error) => {
  logger.error('Failed to start bot:', error);
  process.exit(1);
});
