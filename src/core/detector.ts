import type { AppConfig } from "../utils/config";
import { describeError, safeLog, safeWarn } from "../utils/logging";
import { LlmClassifier } from "./analyst";
import type { LlmClient } from "./providers/types";
import { RuleClassifier } from "./scoring";
import type { ClassificationInput, Classifier, ClassifierResult, DetectionVerdict } from "./verdict";

export interface DetectionEngine {
  classify(input: ClassificationInput): Promise<DetectionVerdict>;
}

/**
 * Runs the primary classifier when there is one and falls back to the rule scorer on any
 * error result. Always resolves with a verdict.
 */
export class FallbackClassifier implements DetectionEngine {
  constructor(
    private readonly primary: Classifier | null,
    private readonly fallback: RuleClassifier
  ) {}

  async classify(input: ClassificationInput): Promise<DetectionVerdict> {
    if (this.primary) {
      const result = await this.primary
        .classify(input)
        .catch((err: unknown): ClassifierResult => ({ ok: false, error: describeError(err) }));
      if (result.ok) {
        this.logVerdict(result.verdict);
        return result.verdict;
      }
      safeWarn(`[DETECT] ${this.primary.method} classifier unavailable (${result.error}), using rules`);
    }

    const verdict = this.fallback.evaluate(input);
    this.logVerdict(verdict);
    return verdict;
  }

  private logVerdict(verdict: DetectionVerdict): void {
    safeLog(
      `[DETECT] method=${verdict.method} malicious=${verdict.isMalicious} confidence=${verdict.confidence.toFixed(2)}`
    );
  }
}

export function createDetectionEngine(config: AppConfig, llm: LlmClient | null): DetectionEngine {
  const threshold = config.detection.threshold;
  const primary = llm ? new LlmClassifier(llm, threshold, config.llm.timeoutMs) : null;
  return new FallbackClassifier(primary, new RuleClassifier(threshold));
}
