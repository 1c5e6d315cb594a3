import { beforeEach, describe, expect, it } from 'vitest';
import { InMemorySessionStore } from '@/lib/conversation-state';
import { SCHEDULING_FIELDS } from '@/lib/flow-definitions';
import type { SendOptions, TelegramResponse } from '@/services/telegram-service';
import { InMemoryAuditLog, InMemorySlotGrid } from '@/test/in-memory-sheet';
import type { TelegramUpdate } from '@/types/telegram';
import { DialogueEngine } from './dialogue-engine';
import * as messages from './messages';
import { processTelegramUpdate, toInboundEvent, type TelegramOutbox } from './process-telegram-update-flow';

function textUpdate(text: string, userId = 42): TelegramUpdate {
  return {
    update_id: 1,
    message: { message_id: 5, chat: { id: userId }, from: { id: userId, username: 'dr_test' }, text },
  };
}

function buttonUpdate(data: string, messageId = 10): TelegramUpdate {
  return {
    update_id: 2,
    callback_query: {
      id: 'cb-1',
      from: { id: 42, username: 'dr_test' },
      data,
      message: { message_id: messageId, chat: { id: 42 } },
    },
  };
}

type OutboxCall =
  | { kind: 'send'; chatId: number; text: string; options: SendOptions }
  | { kind: 'edit'; chatId: number; messageId: number; text: string; options: SendOptions }
  | { kind: 'answer'; callbackQueryId: string };

class RecordingOutbox implements TelegramOutbox {
  readonly calls: OutboxCall[] = [];
  editResult: TelegramResponse = { success: true };
  sendResult: TelegramResponse = { success: true };

  async send(chatId: number, text: string, options: SendOptions): Promise<TelegramResponse> {
    this.calls.push({ kind: 'send', chatId, text, options });
    return this.sendResult;
  }

  async edit(chatId: number, messageId: number, text: string, options: SendOptions): Promise<TelegramResponse> {
    this.calls.push({ kind: 'edit', chatId, messageId, text, options });
    return this.editResult;
  }

  async answerCallback(callbackQueryId: string): Promise<TelegramResponse> {
    this.calls.push({ kind: 'answer', callbackQueryId });
    return { success: true };
  }
}

describe('toInboundEvent', () => {
  it('maps start and cancel commands, with or without the bot suffix', () => {
    expect(toInboundEvent(textUpdate('/start'))?.event).toEqual({ type: 'start' });
    expect(toInboundEvent(textUpdate('/start@GeriatriaBot'))?.event).toEqual({ type: 'start' });
    expect(toInboundEvent(textUpdate('/menu'))?.event).toEqual({ type: 'start' });
    expect(toInboundEvent(textUpdate('/Cancelar'))?.event).toEqual({ type: 'cancel' });
    expect(toInboundEvent(textUpdate('/cancel'))?.event).toEqual({ type: 'cancel' });
  });

  it('ignores unknown commands and messages without text', () => {
    expect(toInboundEvent(textUpdate('/help'))).toBeNull();
    expect(toInboundEvent({ update_id: 3, message: { message_id: 1, chat: { id: 42 }, from: { id: 42 } } })).toBeNull();
    expect(toInboundEvent({ update_id: 4 })).toBeNull();
  });

  it('passes plain text through with the sender and chat', () => {
    expect(toInboundEvent(textUpdate('Maria'))).toEqual({
      sender: { id: '42', username: 'dr_test' },
      chatId: 42,
      event: { type: 'text', text: 'Maria' },
    });
  });

  it('decodes button payloads and keeps the pressed message', () => {
    expect(toInboundEvent(buttonUpdate('SLOT:2:3'))).toEqual({
      sender: { id: '42', username: 'dr_test' },
      chatId: 42,
      messageId: 10,
      callbackQueryId: 'cb-1',
      event: { type: 'slotChoice', row: 2, col: 3 },
    });
  });

  it('falls back to the user id when the button message is gone', () => {
    const inbound = toInboundEvent({
      update_id: 5,
      callback_query: { id: 'cb-2', from: { id: 99 }, data: 'MENU:ELIG' },
    });
    expect(inbound?.chatId).toBe(99);
    expect(inbound?.messageId).toBeUndefined();
  });
});

describe('processTelegramUpdate', () => {
  let engine: DialogueEngine;
  let outbox: RecordingOutbox;

  beforeEach(() => {
    engine = new DialogueEngine({
      sessions: new InMemorySessionStore(),
      slotStore: new InMemorySlotGrid([['Data', '08:00']]),
      auditLog: new InMemoryAuditLog(),
      maxSlotsListed: 8,
      timeZone: 'America/Sao_Paulo',
    });
    outbox = new RecordingOutbox();
  });

  it('sends the greeting menu for /start', async () => {
    const result = await processTelegramUpdate(textUpdate('/start'), engine, outbox);

    expect(result.handled).toBe(true);
    expect(result.repliesSent).toBe(1);
    expect(outbox.calls).toEqual([
      {
        kind: 'send',
        chatId: 42,
        text: messages.GREETING,
        options: { keyboard: messages.mainMenuKeyboard(), markdown: undefined },
      },
    ]);
  });

  it('answers the button press before editing its message', async () => {
    await processTelegramUpdate(buttonUpdate('MENU:SCHED'), engine, outbox);

    expect(outbox.calls).toEqual([
      { kind: 'answer', callbackQueryId: 'cb-1' },
      {
        kind: 'edit',
        chatId: 42,
        messageId: 10,
        text: messages.firstFieldText(SCHEDULING_FIELDS[0]),
        options: { keyboard: undefined, markdown: undefined },
      },
    ]);
  });

  it('sends a new message when the edit is refused', async () => {
    outbox.editResult = { success: false, error: 'message is not modified' };
    const result = await processTelegramUpdate(buttonUpdate('MENU:SCHED'), engine, outbox);

    expect(result.repliesSent).toBe(1);
    expect(outbox.calls.map(call => call.kind)).toEqual(['answer', 'edit', 'send']);
  });

  it('counts replies that could not be delivered', async () => {
    outbox.sendResult = { success: false, error: 'Forbidden' };
    const result = await processTelegramUpdate(textUpdate('/start'), engine, outbox);

    expect(result.handled).toBe(true);
    expect(result.replies).toHaveLength(1);
    expect(result.repliesSent).toBe(0);
  });

  it('leaves updates it does not react to untouched', async () => {
    const result = await processTelegramUpdate({ update_id: 9 }, engine, outbox);
    expect(result).toEqual({ handled: false, repliesSent: 0, replies: [] });
    expect(outbox.calls).toEqual([]);
  });
});
