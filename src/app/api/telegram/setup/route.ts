// src/app/api/telegram/setup/route.ts
import { NextResponse } from 'next/server';
import type { NextRequest } from 'next/server';
import { getConfig, type AppConfig } from '@/lib/config';
import { setTelegramWebhook } from '@/services/telegram-service';

/**
 * Registers this deployment's webhook URL with Telegram, dropping pending updates.
 */
export async function GET(request: NextRequest) {
  let config: AppConfig;
  try {
    config = getConfig();
  } catch (error) {
    console.error('[Telegram Setup] Configuration error:', error);
    return NextResponse.json({ error: 'Configuration error' }, { status: 500 });
  }

  if (config.SETUP_SECRET) {
    const authHeader = request.headers.get('authorization');
    if (authHeader !== `Bearer ${config.SETUP_SECRET}`) {
      console.warn('[Telegram Setup] Unauthorized access attempt.');
      return NextResponse.json({ error: 'Unauthorized' }, { status: 401 });
    }
  }

  if (!config.PUBLIC_BASE_URL) {
    console.error('[Telegram Setup] PUBLIC_BASE_URL is not set in environment variables.');
    return NextResponse.json({ error: 'PUBLIC_BASE_URL not configured' }, { status: 500 });
  }

  const webhookUrl = `${config.PUBLIC_BASE_URL.replace(/\/+$/, '')}/api/telegram/webhook`;
  const result = await setTelegramWebhook(config.TELEGRAM_BOT_TOKEN, webhookUrl, config.TELEGRAM_WEBHOOK_SECRET);
  if (!result.success) {
    console.error('[Telegram Setup] setWebhook failed:', result.error);
    return NextResponse.json({ error: 'Failed to register webhook', details: result.error }, { status: 502 });
  }

  console.log(`[Telegram Setup] Webhook registered at ${webhookUrl}`);
  return NextResponse.json({ message: 'Webhook registered', url: webhookUrl });
}
