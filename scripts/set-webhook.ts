/**
 * Registers WEBHOOK_URL (plus /api/telegram/webhook) with Telegram
 */

import { getTelegramClient } from '@/lib/app/context';
import { getConfig } from '@/lib/config';
import { ConfigurationError } from '@/lib/errors';
import { log, toError } from '@/lib/logging/logger';

const WEBHOOK_PATH = '/api/telegram/webhook';

async function main() {
  const { telegram } = getConfig();
  if (!telegram.webhookUrl) {
    throw new ConfigurationError('WEBHOOK_URL');
  }

  const target = new URL(WEBHOOK_PATH, telegram.webhookUrl).href;
  const registered = await getTelegramClient().setWebhook(target, telegram.webhookSecret);

  log.info('Webhook registration finished', { target, registered, secret: Boolean(telegram.webhookSecret) });
}

main().catch((error: unknown) => {
  log.fatal('Webhook registration failed', toError(error));
  process.exit(1);
});
