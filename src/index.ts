import { MODEL_EXTRACTION, MODEL_MAIN, MODEL_SUMMARY } from './config.js';
import { runConsoleChannel } from './console-channel.js';
import {
  startConsolidationScheduler,
  stopConsolidationScheduler,
} from './consolidation-scheduler.js';
import { closeDatabase, initDatabase } from './db.js';
import { logger } from './logger.js';
import { closeMemoryDatabase, getMemoryStats, initMemoryDatabase } from './memory/db.js';
import {
  createClaudeTextCompletion,
  createClaudeToolCompletion,
} from './memory/inference.js';

async function main(): Promise<void> {
  initDatabase();
  logger.info('Conversation database initialized');
  initMemoryDatabase();
  logger.info(getMemoryStats(), 'Memory database initialized');

  startConsolidationScheduler({
    textCompletion: createClaudeTextCompletion(MODEL_SUMMARY),
  });

  logger.info('Memory service ready.');
  await runConsoleChannel({
    conversationId: process.env.CONVERSATION_ID || 'console',
    toolCompletion: createClaudeToolCompletion(MODEL_MAIN),
    textCompletion: createClaudeTextCompletion(MODEL_EXTRACTION),
  });
  await gracefulShutdown('EOF');
}

// Graceful shutdown
async function gracefulShutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Received shutdown signal, stopping...');
  try {
    // A running pass still writes to both databases
    await stopConsolidationScheduler();
    closeMemoryDatabase();
    closeDatabase();
    logger.info('All services stopped');
  } catch (err) {
    logger.error({ err }, 'Error during shutdown');
  }
  process.exit(0);
}

process.on('SIGINT', () => {
  gracefulShutdown('SIGINT').catch((err) => logger.error({ err }, 'Shutdown failed'));
});
process.on('SIGTERM', () => {
  gracefulShutdown('SIGTERM').catch((err) => logger.error({ err }, 'Shutdown failed'));
});

main().catch((err) => {
  logger.error({ err }, 'Failed to start');
  process.exit(1);
});
