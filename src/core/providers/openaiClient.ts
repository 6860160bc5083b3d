import OpenAI from "openai";
import type { CompletionRequest, LlmClient } from "./types";

export function createOpenAIClient(apiKey: string, model: string): LlmClient {
  const client = new OpenAI({ apiKey, maxRetries: 0 });

  return {
    name: `openai:${model}`,
    async complete(request: CompletionRequest): Promise<string> {
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), request.timeoutMs);
      try {
        const response = await client.responses.create(
          {
            model,
            input: [
              { role: "system", content: request.system },
              { role: "user", content: request.user }
            ],
            max_output_tokens: request.maxOutputTokens,
            temperature: request.temperature
          },
          { signal: controller.signal, timeout: request.timeoutMs }
        );
        return response.output_text?.trim() || "";
      } finally {
        clearTimeout(timer);
      }
    }
  };
}
