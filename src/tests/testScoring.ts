import assert from "assert";
import { describe, it } from "node:test";
import { computeRuleScore, RuleClassifier } from "../core/scoring";
import { approx, counterpart } from "./helpers";

describe("computeRuleScore", () => {
  it("scores a blocked-account threat at the maximum", () => {
    const result = computeRuleScore("Your bank account will be blocked today. Verify immediately.");
    assert.strictEqual(result.score, 1);
    assert.deepStrictEqual(result.evidence, [
      "Urgency patterns detected",
      "Scam keywords: verify immediately, will be blocked",
      "Contextual banking terms",
      "Sensitive info request detected"
    ]);
  });

  it("gives a plain message a zero score", () => {
    assert.deepStrictEqual(computeRuleScore("Hi, are we still meeting for lunch?"), { score: 0, evidence: [] });
  });

  it("adds the contact bonus to a reward claim that carries a phone number", () => {
    const result = computeRuleScore("Congratulations! You have won a cash prize. Call 9876543210 to claim.");
    approx(result.score, 0.9);
    assert.deepStrictEqual(result.evidence, [
      "Scam keywords: congratulations",
      "Reward scam keyword: 'cash prize'",
      "Reward scam with phone number: 9876543210"
    ]);
  });

  it("only increases when reinforcing history is added", () => {
    const alone = computeRuleScore("Please verify");
    const withHistory = computeRuleScore("Please verify", ["your upi is blocked", "urgent", "hello"]);
    approx(alone.score, 0.1);
    approx(withHistory.score, 0.3);
    assert.strictEqual(withHistory.evidence[withHistory.evidence.length - 1], "Context: 2 previous messages had scam indicators");
  });

  it("stays within [0, 1]", () => {
    const noisy = "URGENT verify immediately account blocked click here https://bit.ly/x send otp share your upi id";
    const history = ["verify", "blocked", "urgent"];
    const { score } = computeRuleScore(noisy, history);
    assert.ok(score >= 0 && score <= 1);
  });
});

describe("RuleClassifier", () => {
  it("decides with the threshold and summarizes the first three indicators", async () => {
    const classifier = new RuleClassifier(0.7);
    const result = await classifier.classify({
      message: counterpart("Your bank account will be blocked today. Verify immediately."),
      history: []
    });
    assert.ok(result.ok);
    if (!result.ok) return;
    assert.strictEqual(result.verdict.isMalicious, true);
    assert.strictEqual(result.verdict.method, "rule_fallback");
    assert.strictEqual(result.verdict.evidence.length, 4);
    assert.strictEqual(
      result.verdict.reason,
      "Rule-based fallback (score=1.00): Urgency patterns detected, Scam keywords: verify immediately, will be blocked, Contextual banking terms"
    );
  });

  it("reports no indicators for a benign message", () => {
    const verdict = new RuleClassifier(0.7).evaluate({ message: counterpart("See you at lunch"), history: [] });
    assert.strictEqual(verdict.isMalicious, false);
    assert.strictEqual(verdict.reason, "Rule-based fallback (score=0.00): No indicators");
  });
});
