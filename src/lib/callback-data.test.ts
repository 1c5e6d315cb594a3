import { describe, expect, it } from 'vitest';
import { eligibilityAnswerData, parseCallbackData, slotChoiceData } from './callback-data';

describe('parseCallbackData', () => {
  it('reads menu selections, including the legacy underscore form', () => {
    expect(parseCallbackData('MENU:ELIG')).toEqual({ type: 'menu', choice: 'eligibility' });
    expect(parseCallbackData('MENU:SCHED')).toEqual({ type: 'menu', choice: 'scheduling' });
    expect(parseCallbackData('MENU_ELIG')).toEqual({ type: 'menu', choice: 'eligibility' });
    expect(parseCallbackData('MENU_SCHED')).toEqual({ type: 'menu', choice: 'scheduling' });
  });

  it('reads eligibility answers', () => {
    expect(parseCallbackData('ELIG:idade80:SIM')).toEqual({
      type: 'eligibilityAnswer',
      questionKey: 'idade80',
      answer: 'SIM',
    });
    expect(parseCallbackData('ELIG:humor:NAO')).toEqual({
      type: 'eligibilityAnswer',
      questionKey: 'humor',
      answer: 'NAO',
    });
  });

  it('reads confirmation and slot choices', () => {
    expect(parseCallbackData('CONFIRM:SIM')).toEqual({ type: 'confirmation', answer: 'SIM' });
    expect(parseCallbackData('CONFIRM:NAO')).toEqual({ type: 'confirmation', answer: 'NAO' });
    expect(parseCallbackData('SLOT:12:3')).toEqual({ type: 'slotChoice', row: 12, col: 3 });
    expect(parseCallbackData('SLOT:CANCEL')).toEqual({ type: 'slotCancel' });
  });

  it.each([
    '',
    'MENU:',
    'MENU:OTHER',
    'ELIG:idade80',
    'ELIG::SIM',
    'ELIG:idade80:TALVEZ',
    'ELIG:idade80:SIM:extra',
    'CONFIRM:YES',
    'SLOT:1',
    'SLOT:a:2',
    'SLOT:-1:2',
    'SLOT:1.5:2',
    'PRIO:ALTA',
    'toString',
  ])('turns %j into a malformed event', raw => {
    expect(parseCallbackData(raw)).toEqual({ type: 'malformed', raw });
  });

  it('encodes payloads that parse back to the same choice', () => {
    expect(eligibilityAnswerData('memoria', 'SIM')).toBe('ELIG:memoria:SIM');
    expect(slotChoiceData(4, 2)).toBe('SLOT:4:2');
    expect(parseCallbackData(slotChoiceData(4, 2))).toEqual({ type: 'slotChoice', row: 4, col: 2 });
  });
});
