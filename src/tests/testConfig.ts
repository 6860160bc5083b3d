import assert from "assert";
import { describe, it } from "node:test";
import { loadConfig } from "../utils/config";

describe("loadConfig", () => {
  it("applies defaults on an empty environment", () => {
    const config = loadConfig({});
    assert.strictEqual(config.port, 3000);
    assert.strictEqual(config.detection.threshold, 0.7);
    assert.deepStrictEqual(config.strategy, {
      maxMessagesPerSession: 50,
      minMessagesForReport: 5,
      endKeywords: ["bye", "goodbye", "thank you", "thanks", "done", "finished"],
      useLlmForEnd: true
    });
    assert.strictEqual(config.llm.provider, "none");
    assert.strictEqual(config.report.url, "");
    assert.strictEqual(config.supabase.auditEnabled, false);
  });

  it("reads overrides and treats blanks as unset", () => {
    const config = loadConfig({
      SCAM_DECISION_THRESHOLD: "0.8",
      MIN_MESSAGES_FOR_REPORT: "3",
      CONVERSATION_END_KEYWORDS: "Bye, Ciao ,",
      USE_LLM_FOR_CONVERSATION_END: "false",
      PORT: " "
    });
    assert.strictEqual(config.detection.threshold, 0.8);
    assert.strictEqual(config.report.minMessages, 3);
    assert.strictEqual(config.strategy.minMessagesForReport, 3);
    assert.deepStrictEqual(config.strategy.endKeywords, ["bye", "ciao"]);
    assert.strictEqual(config.strategy.useLlmForEnd, false);
    assert.strictEqual(config.port, 3000);
  });

  it("picks a provider only when its key is present", () => {
    assert.strictEqual(loadConfig({ GEMINI_API_KEY: "test-secret" }).llm.provider, "gemini");
    assert.strictEqual(loadConfig({ OPENAI_API_KEY: "test-secret", GEMINI_API_KEY: "test-secret" }).llm.provider, "openai");
    assert.strictEqual(loadConfig({ LLM_PROVIDER: "openai" }).llm.provider, "none");
    assert.strictEqual(loadConfig({ GOOGLE_API_KEY: "test-secret" }).llm.geminiApiKey, "test-secret");
  });

  it("enables auditing only when supabase is configured", () => {
    const config = loadConfig({ SUPABASE_URL: "http://localhost:54321", SUPABASE_SERVICE_ROLE_KEY: "test-secret" });
    assert.strictEqual(config.supabase.auditEnabled, true);
  });

  it("rejects values out of range", () => {
    assert.throws(() => loadConfig({ SCAM_DECISION_THRESHOLD: "1.5" }), /Invalid configuration: SCAM_DECISION_THRESHOLD/);
  });
});
