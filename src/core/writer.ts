import type { Message } from "../utils/apiSchema";
import { describeError, safeWarn } from "../utils/logging";
import type { Goal } from "./planner";
import type { LlmClient } from "./providers/types";

export type ReplyInput = {
  sessionId: string;
  goal: Goal;
  message: Message;
  history: readonly Message[];
};

export type ReplyWriter = (input: ReplyInput) => Promise<string>;

const GOAL_HINTS: Record<Goal, string> = {
  CLARIFY: "Ask a clarifying question about what they want and how it works.",
  DELAY: "Stall politely: you are busy or confused and need a moment, but keep them talking.",
  ESCALATE: "Sound more worried and ask what exactly you should do next.",
  CONTINUE: "Respond naturally and ask for a little more detail.",
  WRAP_UP: "Politely say you will check with your bank directly."
};

/** Deterministic reply per goal, keyed on what the counterpart just asked for. */
export function fallbackReplyForGoal(goal: Goal, text: string): string {
  const lower = text.toLowerCase();
  switch (goal) {
    case "CLARIFY":
      if (lower.includes("upi")) return "I'm not comfortable sharing my UPI ID. Is there another way to verify?";
      if (lower.includes("link") || lower.includes("click")) {
        return "I'm not sure about clicking links. Can you tell me more about this?";
      }
      if (lower.includes("verify")) return "How do I verify? Can you explain the process step by step?";
      return "I see. Can you provide more details about this?";
    case "DELAY":
      if (lower.includes("urgent") || lower.includes("immediately")) {
        return "I'm at work right now. Can you explain what I need to do? I need a few minutes to understand this.";
      }
      return "I need to check something first. Can you give me more information about this?";
    case "ESCALATE":
      if (lower.includes("blocked") || lower.includes("suspended")) {
        return "This is really worrying. What exactly do I need to do to prevent this? I want to fix this immediately.";
      }
      return "I'm concerned about this. What should I do next?";
    case "CONTINUE":
      if (lower.includes("blocked") || lower.includes("suspended")) {
        return "Why is my account being blocked? What did I do wrong?";
      }
      if (lower.includes("verify")) return "How do I verify? Can you explain the process?";
      return "I see. Can you provide more details about this?";
    case "WRAP_UP":
      return "I'll check with my bank directly. Thanks for letting me know.";
  }
}

export function cleanReply(text: string): string {
  return text
    .trim()
    .replace(/^["'“”]+|["'“”]+$/g, "")
    .replace(/^(reply|response|me)\s*:\s*/i, "")
    .replace(/^["'“”]+|["'“”]+$/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

function buildSystemPrompt(): string {
  return [
    "You are an ordinary, slightly anxious Indian bank customer replying to a message.",
    "Reply in 1-2 short lines of natural Indian English.",
    "Never share OTP, PIN, passwords or real account details.",
    "Never mention scams, fraud, AI, bots or any system.",
    "Output ONLY the reply text. No quotes, no JSON, no explanations."
  ].join(" ");
}

function buildUserPrompt(input: ReplyInput): string {
  const recent = input.history
    .slice(-4)
    .map((m) => `${m.sender === "agent" ? "You" : "Them"}: ${m.text}`)
    .join("\n");
  return [
    `Goal for this reply: ${GOAL_HINTS[input.goal]}`,
    recent ? `Recent turns:\n${recent}` : "",
    `Their latest message: ${input.message.text}`
  ]
    .filter(Boolean)
    .join("\n\n");
}

export function createReplyWriter(llm: LlmClient | null, timeoutMs: number): ReplyWriter {
  return async (input) => {
    const fallback = fallbackReplyForGoal(input.goal, input.message.text);
    if (!llm) return fallback;
    try {
      const raw = await llm.complete({
        system: buildSystemPrompt(),
        user: buildUserPrompt(input),
        maxOutputTokens: 120,
        temperature: 0.7,
        timeoutMs
      });
      const reply = cleanReply(raw);
      return reply || fallback;
    } catch (err) {
      safeWarn(`[WRITER] ${input.sessionId} ${llm.name} failed (${describeError(err)}), using template`);
      return fallback;
    }
  };
}
