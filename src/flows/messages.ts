/**
 * @fileOverview User-facing texts and keyboards of the bot.
 */
import {
  CONFIRM_NO,
  CONFIRM_YES,
  MENU_ELIGIBILITY,
  MENU_SCHEDULING,
  SLOT_CANCEL,
  eligibilityAnswerData,
  slotChoiceData,
} from '@/lib/callback-data';
import { SCHEDULING_FIELDS, type EligibilityQuestion, type SchedulingField } from '@/lib/flow-definitions';
import type { Slot } from '@/types/booking';
import type { InlineKeyboard, Session } from '@/types/conversation';

export const GREETING = 'Olá! Escolha uma opção:';
export const MENU_PROMPT = 'Menu:';
export const RESTART_HINT = 'Digite /start para abrir o menu.';
export const STALE_ACTION = 'Esta opção não está mais disponível. Digite /start para recomeçar.';
export const CANCELLED = 'Solicitação cancelada.';
export const NOT_ELIGIBLE =
  '❌ PACIENTE NÃO ELEGÍVEL pelos critérios do bot.\n\n' +
  'Se ainda houver dúvida clínica, considere discutir o caso com a equipe de geriatria.';
export const EMPTY_ANSWER = 'Não entendi. Tente novamente.';
export const PAST_DATE = 'A data informada já passou. Informe uma data a partir de hoje ou uma expectativa aproximada.';
export const USE_CONFIRM_BUTTONS = 'Você já chegou na confirmação. Use os botões abaixo para confirmar ou cancelar.';
export const USE_ELIGIBILITY_BUTTONS = 'Responda pelos botões Sim / Não.';
export const USE_SLOT_BUTTONS = 'Escolha uma das vagas pelos botões abaixo ou cancele.';
export const CHOOSE_SLOT = 'Escolha uma vaga disponível:';
export const INVALID_SLOT = 'Opção inválida. Escolha uma das vagas listadas.';
export const NO_SLOTS = 'Não há vagas disponíveis no momento. Tente novamente mais tarde.';
export const SLOT_TAKEN =
  '⚠️ Esta vaga acabou de ser ocupada por outra solicitação.\n\n' +
  'Escolha outra vaga da lista ou cancele e confirme novamente para ver a agenda atualizada.';

export const ELIGIBILITY_TITLE = 'AVALIAR ELEGIBILIDADE';
export const SCHEDULING_TITLE = 'FAZER AGENDAMENTO';

export function mainMenuKeyboard(): InlineKeyboard {
  return [
    [
      { text: ELIGIBILITY_TITLE, callbackData: MENU_ELIGIBILITY },
      { text: SCHEDULING_TITLE, callbackData: MENU_SCHEDULING },
    ],
  ];
}

export function yesNoKeyboard(questionKey: string): InlineKeyboard {
  return [
    [
      { text: 'Sim', callbackData: eligibilityAnswerData(questionKey, 'SIM') },
      { text: 'Não', callbackData: eligibilityAnswerData(questionKey, 'NAO') },
    ],
  ];
}

export function confirmKeyboard(): InlineKeyboard {
  return [
    [
      { text: 'CONFIRMAR', callbackData: CONFIRM_YES },
      { text: 'CANCELAR', callbackData: CONFIRM_NO },
    ],
  ];
}

export function slotKeyboard(slots: Slot[]): InlineKeyboard {
  return [
    ...slots.map(slot => [{ text: slot.label, callbackData: slotChoiceData(slot.row, slot.col) }]),
    [{ text: 'CANCELAR', callbackData: SLOT_CANCEL }],
  ];
}

export function eligibilityQuestionText(question: EligibilityQuestion): string {
  return `${ELIGIBILITY_TITLE}\n\n${question.prompt}`;
}

export function firstFieldText(field: SchedulingField): string {
  return `${SCHEDULING_TITLE}\n\n${field.prompt}`;
}

export function eligibleText(criterion: string, firstField: SchedulingField): string {
  return (
    '✅ Paciente ELEGÍVEL para avaliação geriátrica perioperatória.\n\n' +
    `Critério positivo: ${criterion}\n\n` +
    firstFieldText(firstField)
  );
}

// Legacy Markdown only treats these four characters as markup.
function escapeMarkdown(value: string): string {
  return value.replace(/([_*`[])/g, '\\$1');
}

export function confirmationSummary(answers: Session['formAnswers']): string {
  const lines = SCHEDULING_FIELDS.map(
    field => `*${field.label}:* ${escapeMarkdown(answers[field.key] ?? '')}`
  );
  return (
    '📝 *CONFIRMAR SOLICITAÇÃO*\n\n' +
    `${lines.join('\n')}\n\n` +
    'Deseja confirmar o envio para o ambulatório de Geriatria Perioperatória?'
  );
}

/** Plain-text summary written into the booked cell. */
export function bookingText(answers: Session['formAnswers']): string {
  return SCHEDULING_FIELDS.map(field => `${field.label}: ${answers[field.key] ?? ''}`).join('\n');
}

export function bookedText(slotLabel: string): string {
  return `✅ Agendamento confirmado: ${slotLabel}.\n\nOrientar o paciente a procurar o setor de marcação.`;
}

export function auditFailedText(errorName: string): string {
  return (
    '⚠️ A vaga foi reservada, mas a solicitação NÃO foi registrada na planilha de controle.\n' +
    'Avise a equipe de geriatria.\n\n' +
    `Detalhe: ${errorName}`
  );
}

export function storeFailedText(errorName: string): string {
  return (
    '⚠️ Erro ao acessar o Google Sheets. Seus dados NÃO foram registrados.\n' +
    'Verifique as credenciais e o compartilhamento da planilha.\n\n' +
    `Detalhe: ${errorName}`
  );
}
