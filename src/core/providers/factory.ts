import type { AppConfig } from "../../utils/config";
import { safeLog } from "../../utils/logging";
import { createGeminiClient } from "./geminiClient";
import { createOpenAIClient } from "./openaiClient";
import type { LlmClient } from "./types";

export function createLlmClient(config: AppConfig["llm"]): LlmClient | null {
  switch (config.provider) {
    case "openai":
      safeLog(`[LLM] using OpenAI model ${config.openaiModel}`);
      return createOpenAIClient(config.openaiApiKey, config.openaiModel);
    case "gemini":
      safeLog(`[LLM] using Gemini model ${config.geminiModel}`);
      return createGeminiClient(config.geminiApiKey, config.geminiModel);
    case "none":
      safeLog("[LLM] no provider configured, rule-based paths only");
      return null;
  }
}
