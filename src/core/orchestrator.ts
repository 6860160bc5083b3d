import { successReply, type InboundRequest, type ReplyEnvelope } from "../utils/apiSchema";
import type { AppConfig } from "../utils/config";
import { safeLog, safeWarn } from "../utils/logging";
import { maskDigits } from "../utils/mask";
import { ReportDispatcher, type DispatchOutcome } from "./callback";
import { createDetectionEngine, type DetectionEngine } from "./detector";
import { createEndDetector } from "./endDetector";
import { extractIntelligence, hasIntelligence, type ExtractedIntelligence } from "./extractor";
import { StrategyPlanner, type StrategyDecision } from "./planner";
import { createLlmClient } from "./providers/factory";
import {
  annotate,
  appendAgentReply,
  markEnded,
  mergeSessionIntelligence,
  recordInbound,
  seedHistory,
  SessionStore,
  type Session
} from "./sessionStore";
import { createAuditSink, type AuditSink } from "./supabase";
import { createSummarizer } from "./summarizer";
import { SAFE_FALLBACK_REPLY, validateReply } from "./validator";
import { createReplyWriter, type ReplyWriter } from "./writer";

export type OrchestratorDeps = {
  store: SessionStore;
  detector: DetectionEngine;
  planner: StrategyPlanner;
  writer: ReplyWriter;
  dispatcher: ReportDispatcher;
  audit: AuditSink;
  now?: () => Date;
};

const NOTE_LABELS: ReadonlyArray<[keyof ExtractedIntelligence, string]> = [
  ["phishingLinks", "phishing link"],
  ["upiIds", "UPI ID"],
  ["phoneNumbers", "phone number"],
  ["bankAccounts", "bank account"]
];

/** One note per artifact the session had not seen before. */
function noteNewArtifacts(session: Session, incoming: ExtractedIntelligence): void {
  for (const [field, label] of NOTE_LABELS) {
    for (const value of incoming[field]) {
      if (!session.intelligence[field].has(value)) annotate(session, `Extracted ${label}: ${value}`);
    }
  }
}

/**
 * Runs one inbound message through detection, extraction, planning, reply generation,
 * the response gate and report dispatch. The whole turn holds the session's lock.
 */
export class Orchestrator {
  private readonly now: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  get sessionCount(): number {
    return this.deps.store.size;
  }

  handle(request: InboundRequest): Promise<ReplyEnvelope> {
    return this.deps.store.withSession(request.sessionId, (session) => this.runTurn(session, request));
  }

  private async runTurn(session: Session, request: InboundRequest): Promise<ReplyEnvelope> {
    const { detector, planner, writer } = this.deps;
    const message = request.message;
    safeLog(`[INBOUND] ${session.sessionId} ${message.sender}: ${maskDigits(message.text)}`);

    seedHistory(session, request.conversationHistory);
    const priorHistory = session.history;

    const verdict = await detector.classify({ message, history: priorHistory });
    recordInbound(session, message, verdict);

    if (!session.scamDetected) {
      await this.audit(session, null, null);
      return successReply(null);
    }

    const incoming = extractIntelligence(message.text, priorHistory);
    noteNewArtifacts(session, incoming);
    mergeSessionIntelligence(session, incoming);

    const decision = await planner.decide({
      sessionId: session.sessionId,
      text: message.text,
      messagesExchanged: session.messagesExchanged,
      scamDetected: session.scamDetected,
      hasIntelligence: hasIntelligence(session.intelligence),
      upiCount: session.intelligence.upiIds.size,
      linkCount: session.intelligence.phishingLinks.size
    });
    safeLog(`[STRATEGY] ${session.sessionId} goal=${decision.goal} engage=${decision.shouldEngage}`);

    if (!decision.shouldEngage) {
      markEnded(session);
      await this.dispatch(session);
      await this.audit(session, decision, null);
      return successReply(null);
    }

    const draft = await writer({
      sessionId: session.sessionId,
      goal: decision.goal,
      message,
      history: session.history
    });
    const reply = this.gate(session, draft);
    appendAgentReply(session, { sender: "agent", text: reply, timestamp: this.now().toISOString() });
    safeLog(`[REPLY] ${session.sessionId} ${maskDigits(reply)}`);

    if (decision.goal === "WRAP_UP") markEnded(session);
    await this.dispatch(session);
    await this.audit(session, decision, reply);
    return successReply(reply);
  }

  private gate(session: Session, draft: string): string {
    const check = validateReply(draft);
    if (check.ok) return draft;
    safeWarn(`[SAFETY] ${session.sessionId} reply blocked: ${check.reason}`);
    annotate(session, `Safety guard triggered: ${check.reason}`);
    return SAFE_FALLBACK_REPLY;
  }

  private async dispatch(session: Session): Promise<DispatchOutcome> {
    const result = await this.deps.dispatcher.maybeSend(session);
    if (result.outcome === "ineligible") {
      safeLog(`[REPORT] ${session.sessionId} not sent: ${result.reason}`);
    }
    return result;
  }

  private audit(session: Session, decision: StrategyDecision | null, reply: string | null): Promise<void> {
    const verdict = session.verdict;
    return this.deps.audit.recordTurn({
      sessionId: session.sessionId,
      turnIndex: session.messagesExchanged,
      method: verdict ? verdict.method : "none",
      confidence: verdict ? verdict.confidence : 0,
      scamDetected: session.scamDetected,
      goal: decision ? decision.goal : null,
      reply,
      timestamp: this.now().toISOString()
    });
  }
}

export function createOrchestrator(config: AppConfig, store = new SessionStore()): Orchestrator {
  const llm = createLlmClient(config.llm);
  const detectEnd = createEndDetector(llm, {
    endKeywords: config.strategy.endKeywords,
    useLlm: config.strategy.useLlmForEnd,
    timeoutMs: config.llm.timeoutMs
  });
  return new Orchestrator({
    store,
    detector: createDetectionEngine(config, llm),
    planner: new StrategyPlanner(config.strategy, detectEnd),
    writer: createReplyWriter(llm, config.llm.timeoutMs),
    dispatcher: new ReportDispatcher(
      { url: config.report.url, timeoutMs: config.report.timeoutMs, minMessages: config.report.minMessages },
      createSummarizer(llm, config.llm.timeoutMs)
    ),
    audit: createAuditSink(config.supabase)
  });
}
