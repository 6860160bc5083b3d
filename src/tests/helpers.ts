import assert from "assert";
import type { Message } from "../utils/apiSchema";
import type { CompletionRequest, LlmClient } from "../core/providers/types";

export const FIXED_TS = "2026-01-01T00:00:00.000Z";

export function counterpart(text: string): Message {
  return { sender: "counterpart", text, timestamp: FIXED_TS };
}

export function agent(text: string): Message {
  return { sender: "agent", text, timestamp: FIXED_TS };
}

export function approx(actual: number, expected: number, epsilon = 1e-9): void {
  assert.ok(Math.abs(actual - expected) < epsilon, `expected ${actual} to be close to ${expected}`);
}

export type FakeLlm = LlmClient & { calls: CompletionRequest[] };

/** LLM stand-in that answers from a callback and records every request. */
export function fakeLlm(answer: (request: CompletionRequest) => string | Promise<string>): FakeLlm {
  const calls: CompletionRequest[] = [];
  return {
    name: "fake",
    calls,
    async complete(request) {
      calls.push(request);
      return answer(request);
    }
  };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
