// Artifact matchers. All are global so callers must use matchAll / match, never test().
export const BANK_ACCOUNT = /\b\d{4}[-.\s]?\d{4}[-.\s]?\d{4}[-.\s]?\d{4}\b/g;
export const UPI_ID =
  /\b[\w.-]+@(?:paytm|gpay|phonepe|ybl|axl|okicici|okaxis|okhdfcbank|oksbi|payzapp|upi)\b/gi;
export const PHONE_CANDIDATE = /(?:\+91[\s-]?|\b91(?=[6-9]\d{9}\b)|\b0|\b)[6-9](?:[\s-]?\d){9}\b/g;
export const URL = /https?:\/\/[^\s/$.?#][^\s]*/gi;

export const URGENCY_PATTERNS: RegExp[] = [
  /\b(urgent|immediately|asap|right now|hurry|quickly)\b/i,
  /\b(blocked|suspended|frozen|locked|closed)\b/i,
  /\b(within|today|hours left|final notice)\b/i,
  /\b(will be|going to|about to)\b/i
];

export const CONTEXTUAL_BANKING_PATTERNS: RegExp[] = [
  /\b(verify|confirm|validate|authenticate)\b/i,
  /\b(account|bank|upi|payment|transaction)\b/i
];

export const PHISHING_PATTERNS: RegExp[] = [
  /https?:\/\/[a-z0-9$\-_@.&+]+/i,
  /bit\.ly|tinyurl|short\.link/i,
  /verify.*link|click.*here|visit.*url/i
];

export const SENSITIVE_REQUEST_PATTERNS: RegExp[] = [
  /\b(upi id|upi|account number|bank account|card number|pin|otp|cvv)\b/i,
  /\b(share|send|provide|give|tell).*(upi|account|otp|pin)\b/i
];

export const SCAM_PHRASES = [
  "verify immediately",
  "account blocked",
  "suspended",
  "click here",
  "verify now",
  "urgent action required",
  "your account",
  "will be blocked",
  "avoid suspension",
  "share your",
  "send otp",
  "verify your identity",
  "winning prize",
  "congratulations",
  "claim now",
  "free money",
  "lottery winner",
  "inheritance",
  "tax refund",
  "government benefit"
];

export const REWARD_PHRASES = [
  "won a prize",
  "won cash",
  "cash prize",
  "you have won",
  "you won",
  "lottery",
  "congratulations",
  "claim your prize",
  "free money",
  "cash reward",
  "reward amount"
];

export const SUSPICIOUS_KEYWORDS = [
  "urgent",
  "verify",
  "blocked",
  "suspended",
  "immediately",
  "click here",
  "verify now",
  "account",
  "upi",
  "otp",
  "share",
  "send",
  "provide",
  "winning",
  "prize",
  "free"
];

// Terms that make an earlier message count as reinforcing context.
export const CONTEXT_REINFORCEMENT_TERMS = ["verify", "blocked", "urgent", "suspended", "upi"];

// While the counterpart is still asking for something, the conversation is not over.
export const ACTIVE_ASK_TERMS = [
  "verify",
  "verify immediately",
  "blocked",
  "suspended",
  "share",
  "send",
  "provide",
  "click",
  "link",
  "upi",
  "account",
  "urgent",
  "immediately",
  "now",
  "asap",
  "required",
  "must",
  "need to"
];

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Whole-word (or whole-phrase) containment, case-insensitive. */
export function containsTerm(text: string, term: string): boolean {
  return new RegExp(`\\b${escapeRegex(term)}\\b`, "i").test(text);
}

export function containsAnyTerm(text: string, terms: readonly string[]): boolean {
  return terms.some((term) => containsTerm(text, term));
}
