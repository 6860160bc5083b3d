import type { Message } from "../utils/apiSchema";
import { PerKeyLock } from "../utils/perKeyLock";
import { emptyIntelligence, mergeIntelligence, type ExtractedIntelligence } from "./extractor";
import type { DetectionVerdict } from "./verdict";

export type ReportState =
  | { state: "not_sent" }
  | { state: "sent"; sentAt: string; status: number };

export type Session = {
  readonly sessionId: string;
  readonly createdAt: string;
  history: Message[];
  intelligence: ExtractedIntelligence;
  messagesExchanged: number;
  scamDetected: boolean;
  verdict: DetectionVerdict | null;
  notes: string[];
  ended: boolean;
  report: ReportState;
  lastActivityAt: number;
};

function createSession(sessionId: string, now: number): Session {
  return {
    sessionId,
    createdAt: new Date(now).toISOString(),
    history: [],
    intelligence: emptyIntelligence(),
    messagesExchanged: 0,
    scamDetected: false,
    verdict: null,
    notes: [],
    ended: false,
    report: { state: "not_sent" },
    lastActivityAt: now
  };
}

/**
 * In-memory sessions keyed by external id. All reads and writes of one session go through
 * `withSession`, which holds that id's lock for the whole callback.
 */
export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly locks = new PerKeyLock<string>();

  constructor(private readonly clock: () => number = Date.now) {}

  withSession<T>(sessionId: string, fn: (session: Session) => Promise<T> | T): Promise<T> {
    return this.locks.runExclusive(sessionId, () => {
      let session = this.sessions.get(sessionId);
      if (!session) {
        session = createSession(sessionId, this.clock());
        this.sessions.set(sessionId, session);
      }
      session.lastActivityAt = this.clock();
      return fn(session);
    });
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Drops sessions idle for longer than `maxIdleMs`; sessions in use are left alone. */
  reap(maxIdleMs: number): string[] {
    const now = this.clock();
    const removed: string[] = [];
    for (const [id, session] of this.sessions) {
      if (this.locks.isLocked(id)) continue;
      if (now - session.lastActivityAt > maxIdleMs) {
        this.sessions.delete(id);
        removed.push(id);
      }
    }
    return removed;
  }

  startReaper(intervalMs: number, maxIdleMs: number, onReap?: (ids: string[]) => void): () => void {
    const timer = setInterval(() => {
      const ids = this.reap(maxIdleMs);
      if (ids.length > 0 && onReap) onReap(ids);
    }, intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }
}

// Mutators below must only be called from inside `SessionStore.withSession`.

/** Fills an empty history from the caller-supplied transcript; never rewrites existing turns. */
export function seedHistory(session: Session, transcript: readonly Message[]): void {
  if (session.history.length > 0 || transcript.length === 0) return;
  session.history = transcript.map((m) => ({ ...m }));
}

export function recordInbound(session: Session, message: Message, verdict: DetectionVerdict): void {
  session.history = [...session.history, { ...message }];
  session.messagesExchanged += 1;
  session.verdict = verdict;
  session.scamDetected = session.scamDetected || verdict.isMalicious;
}

export function appendAgentReply(session: Session, message: Message): void {
  session.history = [...session.history, { ...message }];
}

/** Swaps in a merged copy in one assignment so readers never see a half-merged value. */
export function mergeSessionIntelligence(session: Session, incoming: ExtractedIntelligence): void {
  session.intelligence = mergeIntelligence(session.intelligence, incoming);
}

export function annotate(session: Session, note: string): void {
  session.notes = [...session.notes, note];
}

export function markEnded(session: Session): void {
  session.ended = true;
}

export function markReportSent(session: Session, status: number, sentAt: string): void {
  if (session.report.state === "sent") return;
  session.report = { state: "sent", sentAt, status };
}
