import { z } from "zod";
import type { Message } from "../utils/apiSchema";
import { describeError, safeWarn } from "../utils/logging";
import { clamp01 } from "../utils/mask";
import { extractIntelligence } from "./extractor";
import { extractJson, type LlmClient } from "./providers/types";
import {
  freezeVerdict,
  type ClassificationInput,
  type Classifier,
  type ClassifierResult,
  type DetectionMethod
} from "./verdict";

const REASON_MAX = 200;
const HISTORY_TURNS = 3;

const LlmVerdictSchema = z.object({
  isMalicious: z.boolean(),
  confidence: z.number().finite(),
  reason: z.string().optional()
});

export type LlmVerdict = {
  isMalicious: boolean;
  confidence: number;
  reason: string;
};

function buildSystemPrompt(): string {
  return [
    "You are a security analyst evaluating a suspicious message for scam intent.",
    "Scam indicators: urgency or threats, requests for UPI IDs, account numbers, OTP or PIN,",
    "phishing links, reward or lottery claims, payment requests, impersonation of banks or officials.",
    "Return STRICT JSON only:",
    "{\"isMalicious\": true|false, \"confidence\": 0.0-1.0, \"reason\": \"short explanation\"}"
  ].join(" ");
}

function buildUserPrompt(message: Message, history: readonly Message[]): string {
  const artifacts = extractIntelligence(message.text);
  const recent = history
    .slice(-HISTORY_TURNS)
    .map((m) => `- ${m.sender}: ${m.text}`)
    .join("\n");
  const lines = [`Message to analyze: "${message.text}"`];
  if (recent) lines.push(`Recent conversation history:\n${recent}`);
  const found = [
    artifacts.phishingLinks.size > 0 ? `URLs: ${Array.from(artifacts.phishingLinks).join(", ")}` : "",
    artifacts.upiIds.size > 0 ? `UPI IDs: ${Array.from(artifacts.upiIds).join(", ")}` : "",
    artifacts.phoneNumbers.size > 0 ? `Phone numbers: ${Array.from(artifacts.phoneNumbers).join(", ")}` : ""
  ].filter(Boolean);
  if (found.length > 0) lines.push(`Extracted artifacts from message:\n- ${found.join("\n- ")}`);
  return lines.join("\n\n");
}

function truncateReason(reason: string): string {
  if (reason.length <= REASON_MAX) return reason;
  return `${reason.slice(0, REASON_MAX - 3)}...`;
}

/** Validates raw model output. Returns null when the shape is wrong. */
export function parseLlmVerdict(raw: string): LlmVerdict | null {
  const parsed = LlmVerdictSchema.safeParse(extractJson(raw));
  if (!parsed.success) return null;
  return {
    isMalicious: parsed.data.isMalicious,
    confidence: clamp01(parsed.data.confidence),
    reason: truncateReason(parsed.data.reason?.trim() || "LLM analysis")
  };
}

export class LlmClassifier implements Classifier {
  readonly method: DetectionMethod = "llm";

  constructor(
    private readonly llm: LlmClient,
    private readonly threshold: number,
    private readonly timeoutMs: number
  ) {}

  async classify(input: ClassificationInput): Promise<ClassifierResult> {
    let raw: string;
    try {
      raw = await this.llm.complete({
        system: buildSystemPrompt(),
        user: buildUserPrompt(input.message, input.history),
        maxOutputTokens: 200,
        temperature: 0.2,
        timeoutMs: this.timeoutMs
      });
    } catch (err) {
      return { ok: false, error: `${this.llm.name} call failed: ${describeError(err)}` };
    }

    const result = parseLlmVerdict(raw);
    if (!result) {
      safeWarn(`[DETECT] ${this.llm.name} returned malformed verdict`);
      return { ok: false, error: "malformed LLM verdict" };
    }

    const reason = result.reason;
    return {
      ok: true,
      verdict: freezeVerdict({
        isMalicious: result.confidence >= this.threshold,
        confidence: result.confidence,
        method: this.method,
        evidence: [reason],
        reason: `LLM detection (confidence=${result.confidence.toFixed(2)}): ${reason}`
      })
    };
  }
}
