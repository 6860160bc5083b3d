// Phrases that would give the agent away or push it into unsafe territory.
const FORBIDDEN_PHRASES = [
  "I am an AI",
  "I'm a bot",
  "I'm an AI",
  "detection system",
  "honeypot",
  "I'm detecting",
  "I'm analyzing",
  "intelligence",
  "gathered intelligence",
  "extracted",
  "confidence score",
  "rule-based",
  "scam detection",
  "I'm a system",
  "automated",
  "algorithm"
];

const META_PHRASES = [
  "we've already",
  "we have gathered",
  "we extracted",
  "our system",
  "the system",
  "detection",
  "analysis"
];

const PROHIBITED_ACTIONS = ["impersonate", "pretend to be", "act as", "illegal", "harass", "threaten"];

export const MIN_REPLY_LENGTH = 5;
export const MAX_REPLY_LENGTH = 500;

export const SAFE_FALLBACK_REPLY = "I'm not sure how to respond to that. Can you clarify?";

export type ValidationResult = { ok: true } | { ok: false; reason: string };

function findPhrase(lower: string, phrases: readonly string[]): string | undefined {
  return phrases.find((phrase) => lower.includes(phrase.toLowerCase()));
}

export function validateReply(reply: string): ValidationResult {
  const lower = reply.toLowerCase();

  const forbidden = findPhrase(lower, FORBIDDEN_PHRASES);
  if (forbidden) return { ok: false, reason: `Response contains forbidden phrase: ${forbidden}` };

  const meta = findPhrase(lower, META_PHRASES);
  if (meta) return { ok: false, reason: `Response contains meta phrase: ${meta}` };

  const action = findPhrase(lower, PROHIBITED_ACTIONS);
  if (action) return { ok: false, reason: `Response contains prohibited action: ${action}` };

  if (reply.length < MIN_REPLY_LENGTH) {
    return { ok: false, reason: `Response too short (min ${MIN_REPLY_LENGTH} characters)` };
  }
  if (reply.length > MAX_REPLY_LENGTH) {
    return { ok: false, reason: `Response too long (max ${MAX_REPLY_LENGTH} characters)` };
  }
  return { ok: true };
}
