import axios from "axios";
import { describeError, safeError, safeLog, safeWarn, toLogText } from "../utils/logging";
import { hasIntelligence, toLists, type IntelligenceLists } from "./extractor";
import { annotate, markReportSent, type Session } from "./sessionStore";
import type { Summarizer } from "./summarizer";

export type ReportPayload = {
  sessionId: string;
  scamDetected: boolean;
  totalMessagesExchanged: number;
  extractedIntelligence: IntelligenceLists;
  agentNotes: string;
};

export type ReportTransport = (url: string, payload: ReportPayload, timeoutMs: number) => Promise<number>;

export type DispatchOutcome =
  | { outcome: "sent"; status: number }
  | { outcome: "already_sent" }
  | { outcome: "ineligible"; reason: string }
  | { outcome: "failed"; error: string };

export type DispatcherOptions = {
  url: string;
  timeoutMs: number;
  minMessages: number;
  now?: () => Date;
};

/** Single POST; resolves with the HTTP status, rejects only on transport errors. */
export const axiosTransport: ReportTransport = async (url, payload, timeoutMs) => {
  const response = await axios.post(url, payload, {
    headers: { "Content-Type": "application/json" },
    timeout: timeoutMs,
    validateStatus: () => true
  });
  return response.status;
};

export function checkEligibility(session: Session, minMessages: number): string | null {
  if (!session.ended) return "conversation has not ended";
  if (!session.scamDetected) return "no scam detected";
  if (session.messagesExchanged < minMessages) return `fewer than ${minMessages} messages`;
  if (!hasIntelligence(session.intelligence)) return "no intelligence extracted";
  return null;
}

/**
 * Best-effort delivery of the final report. Call from inside the session's lock; the
 * session's report state is what makes a second call a no-op.
 */
export class ReportDispatcher {
  private readonly now: () => Date;

  constructor(
    private readonly options: DispatcherOptions,
    private readonly summarize: Summarizer,
    private readonly transport: ReportTransport = axiosTransport
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async maybeSend(session: Session): Promise<DispatchOutcome> {
    if (session.report.state === "sent") return { outcome: "already_sent" };

    const reason = checkEligibility(session, this.options.minMessages);
    if (reason) return { outcome: "ineligible", reason };

    if (!this.options.url) {
      safeWarn(`[REPORT] ${session.sessionId} eligible but no collector configured`);
      return { outcome: "failed", error: "no collector configured" };
    }

    try {
      const payload: ReportPayload = {
        sessionId: session.sessionId,
        scamDetected: session.scamDetected,
        totalMessagesExchanged: session.messagesExchanged,
        extractedIntelligence: toLists(session.intelligence),
        agentNotes: await this.summarize(session)
      };
      safeLog(`[REPORT] ${session.sessionId} sending ${toLogText(payload, 800)}`);
      const status = await this.transport(this.options.url, payload, this.options.timeoutMs);
      if (status === 200 || status === 201) {
        markReportSent(session, status, this.now().toISOString());
        safeLog(`[REPORT] ${session.sessionId} delivered status=${status}`);
        return { outcome: "sent", status };
      }
      const error = `collector responded with status ${status}`;
      annotate(session, `Report delivery failed: ${error}`);
      safeWarn(`[REPORT] ${session.sessionId} ${error}`);
      return { outcome: "failed", error };
    } catch (err) {
      const error = describeError(err);
      annotate(session, `Report delivery failed: ${error}`);
      safeError(`[REPORT] ${session.sessionId} delivery error`, err);
      return { outcome: "failed", error };
    }
  }
}
