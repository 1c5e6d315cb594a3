/**
 * @fileOverview Per-user state machine for the eligibility questionnaire and
 * the scheduling form, ending in a slot booking.
 *
 * - DialogueEngine - advances one session per inbound event and returns the replies to render.
 * - DialogueEngineOptions - collaborators and settings the engine runs against.
 */
import { formatInTimeZone } from 'date-fns-tz';
import { createInitialSession, type SessionStore } from '@/lib/conversation-state';
import { isBeforeToday, parseSurgeryDate } from '@/lib/date-parsing';
import { ELIGIBILITY_QUESTIONS, SCHEDULING_FIELDS, SURGERY_DATE_FIELD } from '@/lib/flow-definitions';
import { retryOperation } from '@/lib/retry';
import { KeyedQueue } from '@/lib/user-queue';
import type { AuditLog, AuditRecord, Slot, SlotStore } from '@/types/booking';
import {
  DIRECT_SCHEDULING_CRITERION,
  NO_CRITERION,
  type DialogueEvent,
  type Reply,
  type SenderInfo,
  type Session,
} from '@/types/conversation';
import * as messages from './messages';

export interface DialogueEngineOptions {
  sessions: SessionStore;
  slotStore: SlotStore;
  auditLog: AuditLog;
  maxSlotsListed: number;
  timeZone: string;
  now?: () => Date;
  /** Attempts for the read-only slot listing. Booking and logging are never retried. */
  listAttempts?: number;
  listRetryDelayMs?: number;
}

interface Transition {
  session: Session;
  replies: Reply[];
}

function errorName(error: unknown): string {
  return error instanceof Error ? error.name : typeof error;
}

function menuReply(text: string = messages.MENU_PROMPT): Reply {
  return { mode: 'send', text, keyboard: messages.mainMenuKeyboard() };
}

export class DialogueEngine {
  private readonly queue = new KeyedQueue();
  private readonly now: () => Date;

  constructor(private readonly options: DialogueEngineOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Processes one inbound event. Events of the same user run strictly in
   * arrival order; different users proceed independently.
   */
  handleEvent(sender: SenderInfo, event: DialogueEvent): Promise<Reply[]> {
    return this.queue.run(sender.id, () => this.process(sender, event));
  }

  private async process(sender: SenderInfo, event: DialogueEvent): Promise<Reply[]> {
    const logPrefix = `[Dialogue Engine - ${sender.id}]`;
    const current = (await this.options.sessions.load(sender.id)) ?? createInitialSession(sender.id);
    console.log(`${logPrefix} Event "${event.type}" in state "${current.state.kind}"`);

    const { session, replies } = await this.transition(current, event, sender);
    session.lastActive = this.now().toISOString();

    const saved = await this.options.sessions.save(session);
    if (!saved) {
      console.error(`${logPrefix} Session could not be saved; state "${session.state.kind}" may be lost.`);
    }
    return replies;
  }

  private fresh(userId: string): Session {
    return createInitialSession(userId);
  }

  private async transition(session: Session, event: DialogueEvent, sender: SenderInfo): Promise<Transition> {
    switch (event.type) {
      case 'start':
        return { session: this.fresh(session.userId), replies: [menuReply(messages.GREETING)] };

      case 'cancel':
        return {
          session: this.fresh(session.userId),
          replies: [{ mode: 'send', text: messages.CANCELLED }, menuReply()],
        };

      case 'menu':
        return event.choice === 'eligibility'
          ? this.startEligibility(session)
          : this.startDirectScheduling(session);

      case 'eligibilityAnswer':
        return this.answerEligibility(session, event.questionKey, event.answer);

      case 'text':
        return this.answerText(session, event.text);

      case 'confirmation':
        if (session.state.kind !== 'awaitingConfirmation') return this.stale(session);
        return event.answer === 'SIM' ? this.confirm(session) : this.cancel(session);

      case 'slotCancel':
        if (session.state.kind !== 'awaitingSlotChoice') return this.stale(session);
        return this.cancel(session);

      case 'slotChoice':
        return this.chooseSlot(session, event.row, event.col, sender);

      case 'malformed':
        console.warn(`[Dialogue Engine - ${session.userId}] Ignoring malformed payload "${event.raw}"`);
        return this.stale(session);
    }
  }

  private stale(session: Session): Transition {
    return { session, replies: [{ mode: 'send', text: messages.STALE_ACTION }] };
  }

  private cancel(session: Session): Transition {
    return {
      session: this.fresh(session.userId),
      replies: [{ mode: 'edit', text: messages.CANCELLED }, menuReply()],
    };
  }

  private startEligibility(session: Session): Transition {
    const next = this.fresh(session.userId);
    next.state = { kind: 'eligibility', step: 0 };
    const question = ELIGIBILITY_QUESTIONS[0];
    return {
      session: next,
      replies: [
        {
          mode: 'edit',
          text: messages.eligibilityQuestionText(question),
          keyboard: messages.yesNoKeyboard(question.key),
        },
      ],
    };
  }

  private startDirectScheduling(session: Session): Transition {
    const next = this.fresh(session.userId);
    next.state = { kind: 'scheduling', step: 0 };
    next.eligible = 'SIM';
    next.positiveCriterion = DIRECT_SCHEDULING_CRITERION;
    return {
      session: next,
      replies: [{ mode: 'edit', text: messages.firstFieldText(SCHEDULING_FIELDS[0]) }],
    };
  }

  private answerEligibility(session: Session, questionKey: string, answer: 'SIM' | 'NAO'): Transition {
    const { state } = session;
    if (state.kind !== 'eligibility') return this.stale(session);

    const question = ELIGIBILITY_QUESTIONS[state.step];
    if (!question) return this.stale(session);

    // A button from an earlier question: ask the current one again.
    if (question.key !== questionKey) {
      return {
        session,
        replies: [
          {
            mode: 'send',
            text: messages.eligibilityQuestionText(question),
            keyboard: messages.yesNoKeyboard(question.key),
          },
        ],
      };
    }

    if (answer === 'SIM') {
      session.eligible = 'SIM';
      session.positiveCriterion = question.key;
      session.formAnswers = {};
      session.state = { kind: 'scheduling', step: 0 };
      return {
        session,
        replies: [{ mode: 'edit', text: messages.eligibleText(question.key, SCHEDULING_FIELDS[0]) }],
      };
    }

    const nextStep = state.step + 1;
    const nextQuestion = ELIGIBILITY_QUESTIONS[nextStep];
    if (!nextQuestion) {
      console.log(`[Dialogue Engine - ${session.userId}] Eligibility questions exhausted: not eligible.`);
      const next = this.fresh(session.userId);
      next.eligible = 'NAO';
      next.positiveCriterion = NO_CRITERION;
      return { session: next, replies: [{ mode: 'edit', text: messages.NOT_ELIGIBLE }, menuReply()] };
    }

    session.state = { kind: 'eligibility', step: nextStep };
    return {
      session,
      replies: [
        {
          mode: 'edit',
          text: messages.eligibilityQuestionText(nextQuestion),
          keyboard: messages.yesNoKeyboard(nextQuestion.key),
        },
      ],
    };
  }

  private answerText(session: Session, rawText: string): Transition {
    const { state } = session;
    switch (state.kind) {
      case 'idle':
        return { session, replies: [{ mode: 'send', text: messages.RESTART_HINT }] };

      case 'eligibility': {
        const question = ELIGIBILITY_QUESTIONS[state.step];
        if (!question) return this.stale(session);
        return {
          session,
          replies: [
            {
              mode: 'send',
              text: `${messages.USE_ELIGIBILITY_BUTTONS}\n\n${messages.eligibilityQuestionText(question)}`,
              keyboard: messages.yesNoKeyboard(question.key),
            },
          ],
        };
      }

      case 'awaitingConfirmation':
        return {
          session,
          replies: [{ mode: 'send', text: messages.USE_CONFIRM_BUTTONS, keyboard: messages.confirmKeyboard() }],
        };

      case 'awaitingSlotChoice':
        return {
          session,
          replies: [
            { mode: 'send', text: messages.USE_SLOT_BUTTONS, keyboard: messages.slotKeyboard(state.openSlots) },
          ],
        };

      case 'scheduling':
        return this.answerField(session, state.step, rawText);
    }
  }

  private answerField(session: Session, step: number, rawText: string): Transition {
    const field = SCHEDULING_FIELDS[step];
    if (!field) {
      // Cursor ran past the form; the confirmation prompt is what remains.
      session.state = { kind: 'awaitingConfirmation' };
      return {
        session,
        replies: [{ mode: 'send', text: messages.USE_CONFIRM_BUTTONS, keyboard: messages.confirmKeyboard() }],
      };
    }

    const value = rawText.trim();
    if (!value) {
      return { session, replies: [{ mode: 'send', text: `${messages.EMPTY_ANSWER}\n\n${field.prompt}` }] };
    }

    if (field.key === SURGERY_DATE_FIELD) {
      const parsed = parseSurgeryDate(value);
      if (parsed.kind === 'date' && isBeforeToday(parsed.date, this.now(), this.options.timeZone)) {
        console.log(`[Dialogue Engine - ${session.userId}] Rejected past surgery date ${parsed.date}`);
        return { session, replies: [{ mode: 'send', text: `${messages.PAST_DATE}\n\n${field.prompt}` }] };
      }
    }

    session.formAnswers = { ...session.formAnswers, [field.key]: value };
    const nextField = SCHEDULING_FIELDS[step + 1];
    if (nextField) {
      session.state = { kind: 'scheduling', step: step + 1 };
      return { session, replies: [{ mode: 'send', text: nextField.prompt }] };
    }

    session.state = { kind: 'awaitingConfirmation' };
    return {
      session,
      replies: [
        {
          mode: 'send',
          text: messages.confirmationSummary(session.formAnswers),
          keyboard: messages.confirmKeyboard(),
          markdown: true,
        },
      ],
    };
  }

  private async confirm(session: Session): Promise<Transition> {
    const logPrefix = `[Dialogue Engine - ${session.userId}]`;
    const frozenText = messages.bookingText(session.formAnswers);

    let openSlots: Slot[];
    try {
      openSlots = await retryOperation(
        () => this.options.slotStore.listOpenSlots(this.options.maxSlotsListed),
        this.options.listAttempts ?? 3,
        this.options.listRetryDelayMs ?? 1000,
        'listOpenSlots'
      );
    } catch (error) {
      console.error(`${logPrefix} Could not list open slots:`, error);
      return {
        session: this.fresh(session.userId),
        replies: [{ mode: 'edit', text: messages.storeFailedText(errorName(error)) }, menuReply()],
      };
    }

    if (openSlots.length === 0) {
      console.log(`${logPrefix} No open slots available.`);
      return {
        session: this.fresh(session.userId),
        replies: [{ mode: 'edit', text: messages.NO_SLOTS }, menuReply()],
      };
    }

    session.state = { kind: 'awaitingSlotChoice', bookingText: frozenText, openSlots };
    return {
      session,
      replies: [{ mode: 'edit', text: messages.CHOOSE_SLOT, keyboard: messages.slotKeyboard(openSlots) }],
    };
  }

  private async chooseSlot(session: Session, row: number, col: number, sender: SenderInfo): Promise<Transition> {
    const logPrefix = `[Dialogue Engine - ${session.userId}]`;
    const { state } = session;
    if (state.kind !== 'awaitingSlotChoice') return this.stale(session);

    const slot = state.openSlots.find(candidate => candidate.row === row && candidate.col === col);
    if (!slot) {
      return {
        session,
        replies: [{ mode: 'send', text: messages.INVALID_SLOT, keyboard: messages.slotKeyboard(state.openSlots) }],
      };
    }

    let booked: boolean;
    try {
      booked = await this.options.slotStore.tryBook(slot.row, slot.col, state.bookingText);
    } catch (error) {
      console.error(`${logPrefix} Booking call failed for slot (${row}, ${col}):`, error);
      return {
        session: this.fresh(session.userId),
        replies: [{ mode: 'edit', text: messages.storeFailedText(errorName(error)) }, menuReply()],
      };
    }

    if (!booked) {
      console.warn(`${logPrefix} Slot (${row}, ${col}) was taken before it could be booked.`);
      return { session, replies: [{ mode: 'send', text: messages.SLOT_TAKEN }] };
    }

    console.log(`${logPrefix} Booked slot (${row}, ${col}) "${slot.label}".`);
    const replies: Reply[] = [{ mode: 'edit', text: messages.bookedText(slot.label) }];
    try {
      await this.options.auditLog.appendRecord(this.auditRecord(session, slot, sender));
    } catch (error) {
      // The booking stands; the log is best effort.
      console.error(`${logPrefix} Audit record could not be appended:`, error);
      replies.push({ mode: 'send', text: messages.auditFailedText(errorName(error)) });
    }
    replies.push(menuReply());
    return { session: this.fresh(session.userId), replies };
  }

  private auditRecord(session: Session, slot: Slot, sender: SenderInfo): AuditRecord {
    const criterion = session.positiveCriterion ?? NO_CRITERION;
    const answers = session.formAnswers;
    return {
      timestamp: formatInTimeZone(this.now(), this.options.timeZone, "yyyy-MM-dd'T'HH:mm:ssXXX"),
      caminho: criterion === DIRECT_SCHEDULING_CRITERION ? 'agendamento_direto' : 'avaliacao_eligibilidade',
      elegivel: session.eligible ?? 'SIM',
      criterioPositivo: criterion,
      nomePaciente: answers.nome_paciente ?? '',
      prontuario: answers.prontuario ?? '',
      nomeCirurgiao: answers.nome_cirurgiao ?? '',
      cirurgiaProposta: answers.cirurgia_proposta ?? '',
      dataCirurgiaPrevista: answers.data_cirurgia_prevista ?? '',
      observacoes: answers.observacoes ?? '',
      vaga: slot.label,
      telegramUserId: sender.id,
      telegramUsername: sender.username ?? '',
    };
  }
}
