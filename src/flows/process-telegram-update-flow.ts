// src/flows/process-telegram-update-flow.ts
/**
 * @fileOverview Transport shell between Telegram updates and the dialogue engine.
 *
 * - TelegramUpdateSchema - validates the parts of an update the bot reads.
 * - toInboundEvent - turns an update into a dialogue event plus its addressing.
 * - processTelegramUpdate - runs the engine for one update and renders its replies.
 * - getDialogueEngine - lazily wires the engine to the configured stores.
 */
import { z } from 'zod';
import { parseCallbackData } from '@/lib/callback-data';
import { getConfig } from '@/lib/config';
import { createSessionStore } from '@/lib/conversation-state';
import {
  answerCallbackQuery,
  editTelegramMessage,
  sendTelegramMessage,
  type SendOptions,
  type TelegramResponse,
} from '@/services/telegram-service';
import { createGoogleSheetsAdapters } from '@/services/google-sheets-service';
import type { DialogueEvent, Reply, SenderInfo } from '@/types/conversation';
import type { TelegramUpdate } from '@/types/telegram';
import { DialogueEngine } from './dialogue-engine';

const UserSchema = z.object({
  id: z.number().int(),
  is_bot: z.boolean().optional(),
  first_name: z.string().optional(),
  username: z.string().optional(),
});

const MessageSchema = z.object({
  message_id: z.number().int(),
  chat: z.object({ id: z.number().int() }),
  from: UserSchema.optional(),
  text: z.string().optional(),
});

export const TelegramUpdateSchema = z.object({
  update_id: z.number().int(),
  message: MessageSchema.optional(),
  callback_query: z
    .object({
      id: z.string(),
      from: UserSchema,
      data: z.string().optional(),
      message: MessageSchema.optional(),
    })
    .optional(),
}) satisfies z.ZodType<TelegramUpdate>;

export interface InboundEvent {
  sender: SenderInfo;
  chatId: number;
  event: DialogueEvent;
  /** Message carrying the pressed button, when the event came from one. */
  messageId?: number;
  callbackQueryId?: string;
}

// "/start", "/start@SomeBot" and "/start payload" are all the start command.
function commandName(text: string): string | null {
  const match = /^\/([a-z_]+)(?:@\w+)?(?:\s|$)/i.exec(text.trim());
  return match ? match[1].toLowerCase() : null;
}

/**
 * Maps an update to the engine's event vocabulary. Updates the bot does not
 * react to (non-text messages, unknown commands, other update kinds) yield null.
 */
export function toInboundEvent(update: TelegramUpdate): InboundEvent | null {
  const query = update.callback_query;
  if (query) {
    const chatId = query.message?.chat.id ?? query.from.id;
    return {
      sender: { id: String(query.from.id), username: query.from.username },
      chatId,
      messageId: query.message?.message_id,
      callbackQueryId: query.id,
      event: parseCallbackData(query.data ?? ''),
    };
  }

  const message = update.message;
  if (!message || !message.from || message.text === undefined) {
    return null;
  }

  const base = {
    sender: { id: String(message.from.id), username: message.from.username },
    chatId: message.chat.id,
  };
  const command = commandName(message.text);
  if (command === null) {
    return { ...base, event: { type: 'text', text: message.text } };
  }
  switch (command) {
    case 'start':
    case 'menu':
      return { ...base, event: { type: 'start' } };
    case 'cancelar':
    case 'cancel':
      return { ...base, event: { type: 'cancel' } };
    default:
      console.log(`[Telegram Flow - ${base.sender.id}] Ignoring unknown command "/${command}"`);
      return null;
  }
}

export interface TelegramOutbox {
  send(chatId: number, text: string, options: SendOptions): Promise<TelegramResponse>;
  edit(chatId: number, messageId: number, text: string, options: SendOptions): Promise<TelegramResponse>;
  answerCallback(callbackQueryId: string): Promise<TelegramResponse>;
}

export function telegramOutbox(token: string): TelegramOutbox {
  return {
    send: (chatId, text, options) => sendTelegramMessage(token, chatId, text, options),
    edit: (chatId, messageId, text, options) => editTelegramMessage(token, chatId, messageId, text, options),
    answerCallback: callbackQueryId => answerCallbackQuery(token, callbackQueryId),
  };
}

async function renderReply(outbox: TelegramOutbox, inbound: InboundEvent, reply: Reply): Promise<boolean> {
  const options: SendOptions = { keyboard: reply.keyboard, markdown: reply.markdown };
  if (reply.mode === 'edit' && inbound.messageId !== undefined) {
    const edited = await outbox.edit(inbound.chatId, inbound.messageId, reply.text, options);
    if (edited.success) return true;
    console.warn(`[Telegram Flow - ${inbound.sender.id}] Edit failed (${edited.error}); sending a new message instead.`);
  }
  const sent = await outbox.send(inbound.chatId, reply.text, options);
  return sent.success;
}

export interface ProcessTelegramUpdateOutput {
  handled: boolean;
  repliesSent: number;
  replies: Reply[];
}

export async function processTelegramUpdate(
  update: TelegramUpdate,
  engine: DialogueEngine,
  outbox: TelegramOutbox
): Promise<ProcessTelegramUpdateOutput> {
  const inbound = toInboundEvent(update);
  if (!inbound) {
    return { handled: false, repliesSent: 0, replies: [] };
  }

  if (inbound.callbackQueryId) {
    await outbox.answerCallback(inbound.callbackQueryId);
  }

  const replies = await engine.handleEvent(inbound.sender, inbound.event);
  let repliesSent = 0;
  // Replies go out in order; a later reply may refer to the one before it.
  for (const reply of replies) {
    if (await renderReply(outbox, inbound, reply)) {
      repliesSent++;
    }
  }
  if (repliesSent < replies.length) {
    console.error(
      `[Telegram Flow - ${inbound.sender.id}] Only ${repliesSent} of ${replies.length} replies were delivered.`
    );
  }
  return { handled: true, repliesSent, replies };
}

let engine: DialogueEngine | null = null;

export function getDialogueEngine(): DialogueEngine {
  if (engine) {
    return engine;
  }
  const config = getConfig();
  const { slotStore, auditLog } = createGoogleSheetsAdapters(config);
  engine = new DialogueEngine({
    sessions: createSessionStore(config.KV_REST_API_URL, config.KV_REST_API_TOKEN),
    slotStore,
    auditLog,
    maxSlotsListed: config.MAX_SLOTS_LISTED,
    timeZone: config.APP_TIME_ZONE,
  });
  return engine;
}
