import type { IncomingHttpHeaders } from "http";
import { maskApiKey, maskDigits } from "./mask";

type Level = "info" | "warn" | "error";

// Header values replaced by a masked form before they reach the log.
const SECRET_HEADERS = new Set(["x-api-key", "authorization", "cookie"]);

export function sanitizeHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const entries = Object.entries(headers).flatMap(([name, raw]): Array<[string, string]> => {
    if (raw === undefined) return [];
    const key = name.toLowerCase();
    const value = Array.isArray(raw) ? raw.join(", ") : raw;
    return [[key, SECRET_HEADERS.has(key) ? maskApiKey(value) : value]];
  });
  return Object.fromEntries(entries);
}

function serialize(value: unknown): string {
  if (typeof value === "string") return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/** Single-line, digit-masked rendering of a payload, cut at `limit` characters. */
export function toLogText(value: unknown, limit: number): string {
  const text = maskDigits(serialize(value));
  if (text.length <= limit) return text;
  return `${text.slice(0, limit)}...(+${text.length - limit} chars)`;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function emit(level: Level, line: string): void {
  try {
    console[level](line);
  } catch {
    // a failed write is dropped; the turn goes on
  }
}

export function safeLog(message: string): void {
  emit("info", message);
}

export function safeWarn(message: string): void {
  emit("warn", message);
}

export function safeError(message: string, err?: unknown): void {
  emit("error", err === undefined ? message : `${message}: ${describeError(err)}`);
}
