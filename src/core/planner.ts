import { describeError, safeWarn } from "../utils/logging";
import type { EndDetector } from "./endDetector";

export type Goal = "CLARIFY" | "DELAY" | "ESCALATE" | "CONTINUE" | "WRAP_UP";

export type StrategyDecision =
  | { shouldEngage: true; goal: Goal; reasoning: string }
  | { shouldEngage: false; goal: "WRAP_UP"; reasoning: string };

export type PlannerInput = {
  sessionId: string;
  text: string;
  messagesExchanged: number;
  scamDetected: boolean;
  hasIntelligence: boolean;
  upiCount: number;
  linkCount: number;
};

export type PlannerLimits = {
  maxMessagesPerSession: number;
  minMessagesForReport: number;
};

function mentions(text: string, ...terms: string[]): boolean {
  return terms.some((term) => text.includes(term));
}

/** Goal selection for a session that passed the engagement gates. */
export function selectGoal(input: PlannerInput, limits: PlannerLimits): Goal {
  const text = input.text.toLowerCase();
  const count = input.messagesExchanged;

  if (!input.hasIntelligence || count < limits.minMessagesForReport) {
    if (mentions(text, "upi")) return "CLARIFY";
    if (mentions(text, "link", "click", "verify")) return "CLARIFY";
    if (mentions(text, "urgent", "immediately")) return "DELAY";
    return "CONTINUE";
  }

  if (count >= 2 && mentions(text, "upi", "send")) return "ESCALATE";

  if (count < limits.minMessagesForReport) {
    return mentions(text, "upi", "account") ? "ESCALATE" : "CONTINUE";
  }

  return "WRAP_UP";
}

export function explainGoal(goal: Goal, text: string): string {
  const lower = text.toLowerCase();
  switch (goal) {
    case "CLARIFY":
      if (lower.includes("upi")) return "Need to extract UPI ID - asking clarifying questions to delay";
      if (lower.includes("link")) return "Phishing link detected - asking for more information";
      return "Need more intelligence - asking clarifying questions";
    case "DELAY":
      return "Creating delay to extract more intelligence while maintaining engagement";
    case "ESCALATE":
      return "Showing increased concern to maintain engagement and extract more intelligence";
    case "CONTINUE":
      return "Continuing normal engagement to extract intelligence";
    case "WRAP_UP":
      return "Sufficient intelligence gathered, wrapping up";
  }
}

export class StrategyPlanner {
  constructor(
    private readonly limits: PlannerLimits,
    private readonly detectEnd: EndDetector
  ) {}

  async decide(input: PlannerInput): Promise<StrategyDecision> {
    if (input.messagesExchanged >= this.limits.maxMessagesPerSession) {
      return { shouldEngage: false, goal: "WRAP_UP", reasoning: "Maximum messages per session reached" };
    }
    if (!input.scamDetected) {
      return { shouldEngage: false, goal: "WRAP_UP", reasoning: "No scam detected" };
    }

    const goal = selectGoal(input, this.limits);

    if (goal === "WRAP_UP" && input.messagesExchanged > 1) {
      const ended = await this.detectEnd({
        sessionId: input.sessionId,
        text: input.text,
        messagesExchanged: input.messagesExchanged,
        upiCount: input.upiCount,
        linkCount: input.linkCount
      }).catch((err: unknown) => {
        safeWarn(`[STRATEGY] ${input.sessionId} end check failed: ${describeError(err)}`);
        return false;
      });
      if (ended) {
        return { shouldEngage: false, goal: "WRAP_UP", reasoning: "Counterpart ended the conversation" };
      }
    }

    return { shouldEngage: true, goal, reasoning: explainGoal(goal, input.text) };
  }
}
