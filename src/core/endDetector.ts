import { describeError, safeLog, safeWarn } from "../utils/logging";
import { ACTIVE_ASK_TERMS, containsAnyTerm } from "./patterns";
import type { LlmClient } from "./providers/types";

export type EndCheckInput = {
  sessionId: string;
  text: string;
  messagesExchanged: number;
  upiCount: number;
  linkCount: number;
};

export type EndDetector = (input: EndCheckInput) => Promise<boolean>;

export type EndDetectorOptions = {
  endKeywords: readonly string[];
  useLlm: boolean;
  timeoutMs: number;
};

/** Substring match, so inflections ("sending", "accounts") still count as asking. */
export function isActiveAsk(text: string): boolean {
  const lower = text.toLowerCase();
  return ACTIVE_ASK_TERMS.some((term) => lower.includes(term));
}

export function matchesEndKeyword(text: string, endKeywords: readonly string[]): boolean {
  return containsAnyTerm(text, endKeywords);
}

function buildPrompt(input: EndCheckInput): string {
  return [
    "You are analyzing a conversation with a suspected scammer.",
    `Latest message from them: "${input.text}"`,
    `Messages exchanged so far: ${input.messagesExchanged}.`,
    `Payment handles collected: ${input.upiCount}. Links collected: ${input.linkCount}.`,
    "Has the other side explicitly ended the conversation (said goodbye, stopped responding, gave up)?",
    "Answer with exactly one word: YES or NO."
  ].join("\n");
}

/**
 * Decides whether the counterpart has closed the conversation. A message that still asks
 * for something never counts as an ending, whatever the model says.
 */
export function createEndDetector(llm: LlmClient | null, options: EndDetectorOptions): EndDetector {
  return async (input) => {
    if (isActiveAsk(input.text)) {
      safeLog(`[STRATEGY] ${input.sessionId} active ask present, conversation continues`);
      return false;
    }
    if (!options.useLlm || !llm) {
      return matchesEndKeyword(input.text, options.endKeywords);
    }
    try {
      const answer = await llm.complete({
        system: "Reply with YES or NO only.",
        user: buildPrompt(input),
        maxOutputTokens: 10,
        temperature: 0.1,
        timeoutMs: options.timeoutMs
      });
      const decision = answer.trim().toUpperCase();
      if (decision.startsWith("YES")) return true;
      if (decision.startsWith("NO")) return false;
      safeWarn(`[STRATEGY] ${input.sessionId} unreadable end answer "${decision.slice(0, 20)}", using keywords`);
    } catch (err) {
      safeWarn(`[STRATEGY] ${input.sessionId} end detection failed (${describeError(err)}), using keywords`);
    }
    return matchesEndKeyword(input.text, options.endKeywords);
  };
}
