import { clamp01 } from "../utils/mask";
import {
  CONTEXT_REINFORCEMENT_TERMS,
  CONTEXTUAL_BANKING_PATTERNS,
  PHISHING_PATTERNS,
  PHONE_CANDIDATE,
  REWARD_PHRASES,
  SCAM_PHRASES,
  SENSITIVE_REQUEST_PATTERNS,
  UPI_ID,
  URGENCY_PATTERNS
} from "./patterns";
import {
  freezeVerdict,
  type ClassificationInput,
  type Classifier,
  type ClassifierResult,
  type DetectionMethod,
  type DetectionVerdict
} from "./verdict";

const URGENCY_WEIGHT = 0.15;
const URGENCY_CAP = 0.4;
const SCAM_PHRASE_WEIGHT = 0.2;
const SCAM_PHRASE_CAP = 0.4;
const REWARD_WEIGHT = 0.4;
const REWARD_WITH_CONTACT_BONUS = 0.3;
const CONTEXTUAL_BANKING_WEIGHT = 0.1;
const PHISHING_WEIGHT = 0.3;
const SENSITIVE_REQUEST_WEIGHT = 0.2;
const CONTEXT_WEIGHT = 0.1;
const CONTEXT_WINDOW = 3;
const REASON_EVIDENCE_LIMIT = 3;

export type RuleScore = {
  score: number;
  evidence: string[];
};

function reinforcesContext(text: string): boolean {
  const lower = text.toLowerCase();
  return CONTEXT_REINFORCEMENT_TERMS.some((term) => lower.includes(term));
}

/** Additive rule score over the message text and the last few history messages, clamped to [0, 1]. */
export function computeRuleScore(text: string, historyTexts: readonly string[] = []): RuleScore {
  const lower = text.toLowerCase();
  const evidence: string[] = [];
  let score = 0;

  const urgencyHits = URGENCY_PATTERNS.filter((pattern) => pattern.test(lower)).length;
  if (urgencyHits > 0) {
    score += Math.min(urgencyHits * URGENCY_WEIGHT, URGENCY_CAP);
    evidence.push("Urgency patterns detected");
  }

  const phraseHits = SCAM_PHRASES.filter((phrase) => lower.includes(phrase));
  if (phraseHits.length > 0) {
    score += Math.min(phraseHits.length * SCAM_PHRASE_WEIGHT, SCAM_PHRASE_CAP);
    evidence.push(`Scam keywords: ${phraseHits.slice(0, 3).join(", ")}`);
  }

  const reward = REWARD_PHRASES.find((phrase) => lower.includes(phrase));
  if (reward) {
    score += REWARD_WEIGHT;
    evidence.push(`Reward scam keyword: '${reward}'`);
    const upi = text.match(UPI_ID);
    const phone = text.match(PHONE_CANDIDATE);
    if (upi || phone) {
      score += REWARD_WITH_CONTACT_BONUS;
      if (upi) evidence.push(`Reward scam with UPI ID: ${upi[0]}`);
      if (phone) evidence.push(`Reward scam with phone number: ${phone[0].trim()}`);
    }
  }

  if (CONTEXTUAL_BANKING_PATTERNS.some((pattern) => pattern.test(lower))) {
    score += CONTEXTUAL_BANKING_WEIGHT;
    evidence.push("Contextual banking terms");
  }

  if (PHISHING_PATTERNS.some((pattern) => pattern.test(lower))) {
    score += PHISHING_WEIGHT;
    evidence.push("Phishing indicator: URL/link detected");
  }

  if (SENSITIVE_REQUEST_PATTERNS.some((pattern) => pattern.test(lower))) {
    score += SENSITIVE_REQUEST_WEIGHT;
    evidence.push("Sensitive info request detected");
  }

  const reinforcing = historyTexts.slice(-CONTEXT_WINDOW).filter(reinforcesContext).length;
  if (reinforcing > 0) {
    score += CONTEXT_WEIGHT * reinforcing;
    evidence.push(`Context: ${reinforcing} previous messages had scam indicators`);
  }

  return { score: clamp01(score), evidence };
}

export class RuleClassifier implements Classifier {
  readonly method: DetectionMethod = "rule_fallback";

  constructor(private readonly threshold: number) {}

  evaluate(input: ClassificationInput): DetectionVerdict {
    const { score, evidence } = computeRuleScore(
      input.message.text,
      input.history.map((m) => m.text)
    );
    const summary = evidence.length > 0 ? evidence.slice(0, REASON_EVIDENCE_LIMIT).join(", ") : "No indicators";
    return freezeVerdict({
      isMalicious: score >= this.threshold,
      confidence: score,
      method: this.method,
      evidence,
      reason: `Rule-based fallback (score=${score.toFixed(2)}): ${summary}`
    });
  }

  async classify(input: ClassificationInput): Promise<ClassifierResult> {
    return { ok: true, verdict: this.evaluate(input) };
  }
}
