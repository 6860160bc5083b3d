import { GoogleGenerativeAI } from "@google/generative-ai";
import type { CompletionRequest, LlmClient } from "./types";

export function createGeminiClient(apiKey: string, modelName: string): LlmClient {
  const client = new GoogleGenerativeAI(apiKey);

  return {
    name: `gemini:${modelName}`,
    async complete(request: CompletionRequest): Promise<string> {
      const model = client.getGenerativeModel({
        model: modelName,
        systemInstruction: request.system,
        generationConfig: {
          maxOutputTokens: request.maxOutputTokens,
          temperature: request.temperature
        }
      });
      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error("Gemini timeout")), request.timeoutMs);
      });
      try {
        const result = await Promise.race([model.generateContent(request.user), timeout]);
        return result.response.text().trim();
      } finally {
        clearTimeout(timer);
      }
    }
  };
}
