import { env } from './config/env';
import { RECEIPT_CLEANUP_INTERVAL_MS } from './config/constants';
import { initializeDatabase, closeDatabase } from './services/database';
import { initializeGemini } from './services/ai';
import { startApiServer } from './services/api';
import { cleanupOldReceipts } from './services/receipt';
import { initializeBot, startBot, stopBot } from './services/telegram';
import { getErrorMessage } from './utils/errors';

function runReceiptCleanup(): void {
  try {
    const removed = cleanupOldReceipts();
    if (removed > 0) {
      console.log(`[Cleanup] Removed ${removed} old receipt file(s)`);
    }
  } catch (error) {
    console.error('[Cleanup] Failed:', getErrorMessage(error));
  }
}

async function main(): Promise<void> {
  console.log('Starting SpendChat...');

  initializeDatabase();
  console.log('Database initialized');

  initializeGemini();

  const server = startApiServer();

  runReceiptCleanup();
  const cleanupTimer = setInterval(runReceiptCleanup, RECEIPT_CLEANUP_INTERVAL_MS);

  if (env.TELEGRAM_BOT_TOKEN) {
    initializeBot(env.TELEGRAM_BOT_TOKEN);
    console.log('Bot initialized');
    startBot().catch((error: unknown) => {
      console.error('[Bot] Stopped with error:', getErrorMessage(error));
    });
  } else {
    console.log('TELEGRAM_BOT_TOKEN not set, running API only');
  }

  const shutdown = async (): Promise<void> => {
    console.log('\nShutting down...');
    clearInterval(cleanupTimer);
    await stopBot();
    server.close();
    closeDatabase();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown().catch((error: unknown) => {
        console.error('Shutdown failed:', getErrorMessage(error));
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
