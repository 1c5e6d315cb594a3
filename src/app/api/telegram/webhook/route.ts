// src/app/api/telegram/webhook/route.ts
import { NextResponse } from 'next/server';
import type { NextRequest } from 'next/server';
import { getConfig, type AppConfig } from '@/lib/config';
import {
  TelegramUpdateSchema,
  getDialogueEngine,
  processTelegramUpdate,
  telegramOutbox,
} from '@/flows/process-telegram-update-flow';

/**
 * Handles POST requests with Telegram updates.
 * Well-formed updates are always acknowledged with 200 so Telegram does not
 * redeliver them; per-user failures are reported to the user in the chat.
 * @param request The incoming NextRequest.
 * @returns A NextResponse indicating success or failure.
 */
export async function POST(request: NextRequest) {
  let config: AppConfig;
  try {
    config = getConfig();
  } catch (error) {
    console.error('[Telegram Webhook] Configuration error:', error);
    return NextResponse.json({ error: 'Webhook internal configuration error' }, { status: 500 });
  }

  if (config.TELEGRAM_WEBHOOK_SECRET) {
    const secret = request.headers.get('x-telegram-bot-api-secret-token');
    if (secret !== config.TELEGRAM_WEBHOOK_SECRET) {
      console.warn('[Telegram Webhook] Rejected update with a missing or wrong secret token.');
      return NextResponse.json({ error: 'Unauthorized' }, { status: 401 });
    }
  }

  let body: unknown;
  try {
    body = await request.json();
  } catch (error) {
    console.warn('[Telegram Webhook] Body is not JSON:', error);
    return NextResponse.json({ error: 'Invalid JSON body' }, { status: 400 });
  }

  const parsed = TelegramUpdateSchema.safeParse(body);
  if (!parsed.success) {
    console.warn('[Telegram Webhook] Body is not a Telegram update:', parsed.error.issues);
    return NextResponse.json({ error: 'Not a Telegram update' }, { status: 400 });
  }

  try {
    const result = await processTelegramUpdate(
      parsed.data,
      getDialogueEngine(),
      telegramOutbox(config.TELEGRAM_BOT_TOKEN)
    );
    console.log(
      `[Telegram Webhook] Update ${parsed.data.update_id}: handled=${result.handled}, replies=${result.repliesSent}`
    );
    return NextResponse.json({ status: 'success' }, { status: 200 });
  } catch (error) {
    console.error(`[Telegram Webhook] Error processing update ${parsed.data.update_id}:`, error);
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    return NextResponse.json({ error: 'Internal server error', details: errorMessage }, { status: 500 });
  }
}
