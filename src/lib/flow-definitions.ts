/**
 * @fileOverview Ordered question and field lists for the two flows.
 * Order is the interaction order; keys are written into callback payloads
 * and into the audit log, so they must stay stable.
 */

export const ELIGIBILITY_QUESTIONS = Object.freeze([
  { key: 'idade80', prompt: 'Paciente ≥ 80 anos?' },
  {
    key: 'memoria',
    prompt:
      'Paciente tem problemas de memória?\n' +
      '- incapacidade para atividades do dia a dia por questões de memória\n' +
      '- não reconhece familiares\n' +
      '- não sabe dizer qual dia/mês/ano está',
  },
  {
    key: 'humor',
    prompt:
      'Paciente tem transtornos de humor?\n' +
      '- uso de antidepressivos\n' +
      '- labilidade emocional importante\n' +
      '- insônia ou alterações de comportamento',
  },
  {
    key: 'multimorbidade',
    prompt:
      'Paciente possui 5 ou mais doenças sistêmicas?\n' +
      'Ex: HAS, DM, insuficiência cardíaca, DAC, DRC, doença hepática crônica, AVE',
  },
  { key: 'polifarmacia', prompt: 'Paciente faz uso de 5 ou mais medicamentos regularmente?' },
  {
    key: 'fragilidade',
    prompt:
      'Paciente com fragilidade (CFS ≥ 4) OU baixa tolerância a esforço?\n' +
      'Ex: cansa ao andar 1 quadra ou subir 1 lance de escadas (10 degraus), mobilidade reduzida/lentificada',
  },
] as const);

export const SCHEDULING_FIELDS = Object.freeze([
  { key: 'nome_paciente', label: 'Paciente', prompt: 'Nome do paciente:' },
  { key: 'prontuario', label: 'Prontuário', prompt: 'Prontuário:' },
  { key: 'nome_cirurgiao', label: 'Cirurgião', prompt: 'Nome do cirurgião:' },
  { key: 'cirurgia_proposta', label: 'Cirurgia proposta', prompt: 'Cirurgia proposta:' },
  {
    key: 'data_cirurgia_prevista',
    label: 'Data prevista',
    prompt: 'Qual a data da cirurgia (ou expectativa aproximada)?',
  },
  {
    key: 'observacoes',
    label: 'Observações',
    prompt: 'Observações / Recomendações (se não houver, digite: - )',
  },
] as const);

export type EligibilityQuestion = (typeof ELIGIBILITY_QUESTIONS)[number];
export type EligibilityQuestionKey = EligibilityQuestion['key'];
export type SchedulingField = (typeof SCHEDULING_FIELDS)[number];
export type SchedulingFieldKey = SchedulingField['key'];

export const SURGERY_DATE_FIELD: SchedulingFieldKey = 'data_cirurgia_prevista';

export function isEligibilityQuestionKey(key: string): key is EligibilityQuestionKey {
  return ELIGIBILITY_QUESTIONS.some(question => question.key === key);
}
