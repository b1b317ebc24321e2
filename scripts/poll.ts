/**
 * Long-polling runner for local development or hosts without a public URL.
 * Removes any registered webhook first; Telegram refuses getUpdates while one is set.
 */

import { getTelegramClient, getUpdateRouter } from '@/lib/app/context';
import { loggers, toError } from '@/lib/logging/logger';

const log = loggers.bot;
const POLL_TIMEOUT_SECONDS = 30;
const ERROR_BACKOFF_MS = 5000;

let running = true;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function poll() {
  const telegram = getTelegramClient();
  const router = getUpdateRouter();

  await telegram.deleteWebhook();
  log.info('Polling for updates', { timeout: POLL_TIMEOUT_SECONDS });

  let offset: number | undefined;
  while (running) {
    try {
      const updates = await telegram.getUpdates({ offset, timeout: POLL_TIMEOUT_SECONDS });
      for (const update of updates) {
        offset = update.update_id + 1;
        try {
          await router.handleUpdate(update);
        } catch (error) {
          log.error('Update handling failed', toError(error), { updateId: update.update_id });
        }
      }
    } catch (error) {
      log.error('getUpdates failed', toError(error));
      await sleep(ERROR_BACKOFF_MS);
    }
  }

  log.info('Polling stopped');
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    running = false;
  });
}

poll().catch((error: unknown) => {
  log.fatal('Poller crashed', toError(error));
  process.exit(1);
});
