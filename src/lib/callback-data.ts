import type { DialogueEvent, YesNo } from '@/types/conversation';

// Payload strings are shared with buttons already rendered in users' chats;
// they must not change.
export const MENU_ELIGIBILITY = 'MENU:ELIG';
export const MENU_SCHEDULING = 'MENU:SCHED';
export const CONFIRM_YES = 'CONFIRM:SIM';
export const CONFIRM_NO = 'CONFIRM:NAO';
export const SLOT_CANCEL = 'SLOT:CANCEL';

// Earlier deployments rendered the menu with underscores.
const LEGACY_MENU = new Map<string, 'eligibility' | 'scheduling'>([
  ['MENU_ELIG', 'eligibility'],
  ['MENU_SCHED', 'scheduling'],
]);

export function eligibilityAnswerData(questionKey: string, answer: YesNo): string {
  return `ELIG:${questionKey}:${answer}`;
}

export function slotChoiceData(row: number, col: number): string {
  return `SLOT:${row}:${col}`;
}

function isYesNo(value: string | undefined): value is YesNo {
  return value === 'SIM' || value === 'NAO';
}

function parseGridIndex(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value)) return null;
  const index = Number(value);
  return Number.isSafeInteger(index) ? index : null;
}

/**
 * Turns a button payload into a dialogue event. Unknown or malformed payloads
 * become a `malformed` event instead of throwing.
 */
export function parseCallbackData(raw: string): DialogueEvent {
  const malformed: DialogueEvent = { type: 'malformed', raw };
  const legacy = LEGACY_MENU.get(raw);
  if (legacy) return { type: 'menu', choice: legacy };

  const parts = raw.split(':');
  switch (parts[0]) {
    case 'MENU':
      if (raw === MENU_ELIGIBILITY) return { type: 'menu', choice: 'eligibility' };
      if (raw === MENU_SCHEDULING) return { type: 'menu', choice: 'scheduling' };
      return malformed;

    case 'ELIG': {
      const [, questionKey, answer] = parts;
      if (parts.length !== 3 || !questionKey || !isYesNo(answer)) return malformed;
      return { type: 'eligibilityAnswer', questionKey, answer };
    }

    case 'CONFIRM': {
      const answer = parts[1];
      if (parts.length !== 2 || !isYesNo(answer)) return malformed;
      return { type: 'confirmation', answer };
    }

    case 'SLOT': {
      if (raw === SLOT_CANCEL) return { type: 'slotCancel' };
      if (parts.length !== 3) return malformed;
      const row = parseGridIndex(parts[1]);
      const col = parseGridIndex(parts[2]);
      if (row === null || col === null) return malformed;
      return { type: 'slotChoice', row, col };
    }

    default:
      return malformed;
  }
}
