/**
 * Telegram Webhook
 * Receives bot updates pushed by Telegram and routes them to the command handlers
 */

import crypto from 'crypto';
import { NextRequest, NextResponse } from 'next/server';
import { BadRequestError, UnauthorizedError, errorToResponse } from '@/lib/api/errors';
import { updateSchema, validateBody, type TelegramUpdate } from '@/lib/api/schemas';
import { getUpdateRouter } from '@/lib/app/context';
import { getConfig } from '@/lib/config';
import { loggers, toError } from '@/lib/logging/logger';

const log = loggers.api;

export const dynamic = 'force-dynamic';

const SECRET_HEADER = 'x-telegram-bot-api-secret-token';

function secretMatches(provided: string | null, expected: string): boolean {
  if (!provided) return false;
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

export async function POST(request: NextRequest) {
  const secret = getConfig().telegram.webhookSecret;
  if (secret && !secretMatches(request.headers.get(SECRET_HEADER), secret)) {
    log.warn('Webhook secret mismatch');
    return errorToResponse(new UnauthorizedError('Invalid webhook secret'));
  }

  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return errorToResponse(new BadRequestError('Malformed JSON body'));
  }

  let update: TelegramUpdate;
  try {
    update = validateBody(updateSchema, body);
  } catch (error) {
    return errorToResponse(error);
  }

  try {
    await getUpdateRouter().handleUpdate(update);
  } catch (error) {
    // Acknowledge anyway: a non-2xx makes Telegram redeliver the same update
    log.error('Update handling failed', toError(error), { updateId: update.update_id });
    return NextResponse.json({ ok: false });
  }

  return NextResponse.json({ ok: true });
}
