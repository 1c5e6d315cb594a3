import type { EligibilityQuestionKey, SchedulingFieldKey } from '@/lib/flow-definitions';
import type { Slot } from '@/types/booking';

export type YesNo = 'SIM' | 'NAO';

export const DIRECT_SCHEDULING_CRITERION = 'agendamento_direto';
export const NO_CRITERION = 'nenhum';

export type PositiveCriterion =
  | EligibilityQuestionKey
  | typeof DIRECT_SCHEDULING_CRITERION
  | typeof NO_CRITERION;

export type DialogueState =
  | { kind: 'idle' }
  | { kind: 'eligibility'; step: number }
  | { kind: 'scheduling'; step: number }
  | { kind: 'awaitingConfirmation' }
  | {
      kind: 'awaitingSlotChoice';
      bookingText: string; // frozen at confirmation time
      openSlots: Slot[];
    };

export interface Session {
  userId: string;
  state: DialogueState;
  eligible: YesNo | null;
  positiveCriterion: PositiveCriterion | null;
  formAnswers: Partial<Record<SchedulingFieldKey, string>>;
  lastActive: string; // ISO 8601 string of last interaction
}

export interface SenderInfo {
  id: string;
  username?: string;
}

export type DialogueEvent =
  | { type: 'start' }
  | { type: 'cancel' }
  | { type: 'menu'; choice: 'eligibility' | 'scheduling' }
  | { type: 'eligibilityAnswer'; questionKey: string; answer: YesNo }
  | { type: 'confirmation'; answer: YesNo }
  | { type: 'slotChoice'; row: number; col: number }
  | { type: 'slotCancel' }
  | { type: 'text'; text: string }
  | { type: 'malformed'; raw: string };

export interface InlineButton {
  text: string;
  callbackData: string;
}

/** Rows of buttons, rendered top to bottom. */
export type InlineKeyboard = InlineButton[][];

export interface Reply {
  /** `edit` replaces the prompt that carried the pressed button; `send` posts a new message. */
  mode: 'edit' | 'send';
  text: string;
  keyboard?: InlineKeyboard;
  markdown?: boolean;
}
