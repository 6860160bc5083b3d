import type { Message } from "../utils/apiSchema";

export type DetectionMethod = "llm" | "rule_fallback";

export type DetectionVerdict = Readonly<{
  isMalicious: boolean;
  confidence: number;
  method: DetectionMethod;
  evidence: readonly string[];
  reason: string;
}>;

export type ClassificationInput = {
  message: Message;
  history: readonly Message[];
};

export type ClassifierResult =
  | { ok: true; verdict: DetectionVerdict }
  | { ok: false; error: string };

export interface Classifier {
  readonly method: DetectionMethod;
  classify(input: ClassificationInput): Promise<ClassifierResult>;
}

export function freezeVerdict(verdict: DetectionVerdict): DetectionVerdict {
  return Object.freeze({ ...verdict, evidence: Object.freeze([...verdict.evidence]) });
}
