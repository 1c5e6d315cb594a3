import { z } from 'zod';
import { isEligibilityQuestionKey } from '@/lib/flow-definitions';
import { getKvClient } from '@/lib/kv';
import {
  DIRECT_SCHEDULING_CRITERION,
  NO_CRITERION,
  type PositiveCriterion,
  type Session,
} from '@/types/conversation';

const SESSION_TTL_SECONDS = 60 * 60 * 24 * 10;

// Helper to generate the KV key for a user's session
function getSessionKey(userId: string): string {
  return `session:${userId}`;
}

export function createInitialSession(userId: string): Session {
  return {
    userId,
    state: { kind: 'idle' },
    eligible: null,
    positiveCriterion: null,
    formAnswers: {},
    lastActive: new Date().toISOString(),
  };
}

const SlotSchema = z.object({ row: z.number().int(), col: z.number().int(), label: z.string() });

// Stored sessions come back as plain JSON; anything that no longer matches is discarded.
const StoredSessionSchema = z.object({
  userId: z.string(),
  state: z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('idle') }),
    z.object({ kind: z.literal('eligibility'), step: z.number().int().nonnegative() }),
    z.object({ kind: z.literal('scheduling'), step: z.number().int().nonnegative() }),
    z.object({ kind: z.literal('awaitingConfirmation') }),
    z.object({
      kind: z.literal('awaitingSlotChoice'),
      bookingText: z.string(),
      openSlots: z.array(SlotSchema),
    }),
  ]),
  eligible: z.enum(['SIM', 'NAO']).nullable(),
  positiveCriterion: z.string().nullable(),
  formAnswers: z.record(z.string()),
  lastActive: z.string(),
});

export interface SessionStore {
  /** Resolves null when the user has no session or it could not be read. */
  load(userId: string): Promise<Session | null>;
  save(session: Session): Promise<boolean>;
}

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, Session>();

  async load(userId: string): Promise<Session | null> {
    const session = this.sessions.get(userId);
    return session ? structuredClone(session) : null;
  }

  async save(session: Session): Promise<boolean> {
    this.sessions.set(session.userId, structuredClone(session));
    return true;
  }
}

/** The slice of the KV client the session store uses; `VercelKV` satisfies it. */
export interface SessionKv {
  get(key: string): Promise<unknown>;
  set(key: string, value: Session, options: { ex: number }): Promise<unknown>;
}

export class KvSessionStore implements SessionStore {
  constructor(private readonly kv: SessionKv) {}

  async load(userId: string): Promise<Session | null> {
    try {
      const stored = await this.kv.get(getSessionKey(userId));
      if (stored === null || stored === undefined) return null;
      const parsed = StoredSessionSchema.safeParse(stored);
      if (!parsed.success) {
        console.warn(`[Conversation State] Discarding malformed session for user ${userId}:`, parsed.error.issues);
        return null;
      }
      const session = restoreSession(parsed.data);
      if (!session) {
        console.warn(`[Conversation State] Discarding session for user ${userId} with unknown criterion.`);
      }
      return session;
    } catch (error) {
      console.error(`[Conversation State] Error loading session for user ${userId}:`, error);
      return null;
    }
  }

  async save(session: Session): Promise<boolean> {
    try {
      await this.kv.set(getSessionKey(session.userId), session, { ex: SESSION_TTL_SECONDS });
      return true;
    } catch (error) {
      console.error(`[Conversation State] Error saving session for user ${session.userId}:`, error);
      return false;
    }
  }
}

function isPositiveCriterion(value: string): value is PositiveCriterion {
  return value === DIRECT_SCHEDULING_CRITERION || value === NO_CRITERION || isEligibilityQuestionKey(value);
}

function restoreSession(stored: z.infer<typeof StoredSessionSchema>): Session | null {
  const { positiveCriterion } = stored;
  const session: Session = {
    ...createInitialSession(stored.userId),
    state: stored.state,
    eligible: stored.eligible,
    formAnswers: stored.formAnswers,
    lastActive: stored.lastActive,
  };
  if (positiveCriterion !== null) {
    if (!isPositiveCriterion(positiveCriterion)) return null;
    session.positiveCriterion = positiveCriterion;
  }
  return session;
}

/** KV-backed store when credentials are present, process memory otherwise. */
export function createSessionStore(kvUrl?: string, kvToken?: string): SessionStore {
  const kv = getKvClient(kvUrl, kvToken);
  if (!kv) {
    console.warn('[Conversation State] KV store not configured; sessions are kept in process memory.');
    return new InMemorySessionStore();
  }
  return new KvSessionStore(kv);
}
