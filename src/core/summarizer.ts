import { describeError, safeWarn } from "../utils/logging";
import { toLists } from "./extractor";
import type { LlmClient } from "./providers/types";
import type { Session } from "./sessionStore";

export type Summarizer = (session: Session) => Promise<string>;

const MAX_SUMMARY_LENGTH = 1000;

/** Deterministic agent notes: verdict, artifact counts and session annotations. */
export function structuredSummary(session: Session): string {
  const lists = toLists(session.intelligence);
  const verdict = session.verdict
    ? `Detection: ${session.verdict.method} (confidence=${session.verdict.confidence.toFixed(2)})`
    : "Detection: none";
  const counts =
    `Artifacts: bankAccounts=${lists.bankAccounts.length}, upiIds=${lists.upiIds.length}, ` +
    `phishingLinks=${lists.phishingLinks.length}, phoneNumbers=${lists.phoneNumbers.length}, ` +
    `suspiciousKeywords=${lists.suspiciousKeywords.length}`;
  const notes = session.notes.length > 0 ? session.notes.join("; ") : "No specific notes";
  return `${verdict}. ${counts}. Notes: ${notes}`;
}

function buildPrompt(session: Session): string {
  const transcript = session.history
    .map((m) => `${m.sender === "agent" ? "Agent" : "Counterpart"}: ${m.text}`)
    .join("\n");
  return [
    "Summarize this fraud conversation in 2-3 sentences for an investigator.",
    "Mention the tactic used and the payment details or links the counterpart shared.",
    `Transcript:\n${transcript}`,
    `Collected details: ${JSON.stringify(toLists(session.intelligence))}`
  ].join("\n\n");
}

export function createSummarizer(llm: LlmClient | null, timeoutMs: number): Summarizer {
  return async (session) => {
    const fallback = structuredSummary(session);
    if (!llm) return fallback;
    try {
      const narrative = (
        await llm.complete({
          system: "You write short, factual case notes. Plain text only.",
          user: buildPrompt(session),
          maxOutputTokens: 250,
          temperature: 0.2,
          timeoutMs
        })
      ).trim();
      if (!narrative) return fallback;
      return narrative.slice(0, MAX_SUMMARY_LENGTH);
    } catch (err) {
      safeWarn(`[SUMMARY] ${session.sessionId} ${llm.name} failed (${describeError(err)}), using structured notes`);
      return fallback;
    }
  };
}
