// src/services/telegram-service.ts
import type { InlineKeyboard } from '@/types/conversation';
import type { InlineKeyboardMarkup } from '@/types/telegram';

export interface TelegramResponse {
  success: boolean;
  error?: string;
}

interface BotApiResult {
  ok: boolean;
  description?: string;
}

export interface SendOptions {
  keyboard?: InlineKeyboard;
  markdown?: boolean;
}

function toReplyMarkup(keyboard: InlineKeyboard): InlineKeyboardMarkup {
  return {
    inline_keyboard: keyboard.map(row =>
      row.map(button => ({ text: button.text, callback_data: button.callbackData }))
    ),
  };
}

function isBotApiResult(value: unknown): value is BotApiResult {
  return typeof value === 'object' && value !== null && 'ok' in value && typeof value.ok === 'boolean';
}

/**
 * Calls one Bot API method. Never throws: transport and API errors come back
 * as `{ success: false, error }`.
 */
async function callBotApi(token: string, method: string, payload: object): Promise<TelegramResponse> {
  if (!token) {
    const errorMsg = 'Telegram bot token not configured. Cannot call the Bot API.';
    console.error(`[Telegram Service] ${errorMsg}`);
    return { success: false, error: errorMsg };
  }

  try {
    const response = await fetch(`https://api.telegram.org/bot${token}/${method}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    });

    const responseData: unknown = await response.json();
    if (!response.ok || !isBotApiResult(responseData) || !responseData.ok) {
      const errorDetail =
        (isBotApiResult(responseData) && responseData.description) ||
        `Bot API ${method} failed, status: ${response.status}`;
      console.error(`[Telegram Service] Error calling ${method}:`, response.status, errorDetail);
      return { success: false, error: errorDetail };
    }

    return { success: true };
  } catch (error) {
    console.error(`[Telegram Service] Exception calling ${method}:`, error);
    const errorMessage = error instanceof Error ? error.message : 'Unknown exception';
    return { success: false, error: errorMessage };
  }
}

function messageOptions(options: SendOptions): Record<string, unknown> {
  return {
    ...(options.keyboard ? { reply_markup: toReplyMarkup(options.keyboard) } : {}),
    ...(options.markdown ? { parse_mode: 'Markdown' } : {}),
  };
}

/**
 * Sends a new text message to a chat.
 * @param chatId The chat to post into; for private chats this is the user id.
 */
export async function sendTelegramMessage(
  token: string,
  chatId: number,
  text: string,
  options: SendOptions = {}
): Promise<TelegramResponse> {
  return callBotApi(token, 'sendMessage', { chat_id: chatId, text, ...messageOptions(options) });
}

/**
 * Replaces the text (and buttons) of a message the bot sent earlier.
 */
export async function editTelegramMessage(
  token: string,
  chatId: number,
  messageId: number,
  text: string,
  options: SendOptions = {}
): Promise<TelegramResponse> {
  return callBotApi(token, 'editMessageText', {
    chat_id: chatId,
    message_id: messageId,
    text,
    ...messageOptions(options),
  });
}

/** Stops the loading indicator on the pressed button. */
export async function answerCallbackQuery(token: string, callbackQueryId: string): Promise<TelegramResponse> {
  return callBotApi(token, 'answerCallbackQuery', { callback_query_id: callbackQueryId });
}

export async function setTelegramWebhook(
  token: string,
  url: string,
  secretToken?: string
): Promise<TelegramResponse> {
  return callBotApi(token, 'setWebhook', {
    url,
    drop_pending_updates: true,
    allowed_updates: ['message', 'callback_query'],
    ...(secretToken ? { secret_token: secretToken } : {}),
  });
}
