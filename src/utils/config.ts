import { z } from "zod";

export type LlmProvider = "openai" | "gemini" | "none";

export type AppConfig = {
  port: number;
  apiKey: string;
  report: {
    url: string;
    timeoutMs: number;
    minMessages: number;
  };
  detection: {
    threshold: number;
  };
  strategy: {
    maxMessagesPerSession: number;
    minMessagesForReport: number;
    endKeywords: string[];
    useLlmForEnd: boolean;
  };
  llm: {
    provider: LlmProvider;
    timeoutMs: number;
    openaiApiKey: string;
    openaiModel: string;
    geminiApiKey: string;
    geminiModel: string;
  };
  sessions: {
    idleTtlMs: number;
    reaperIntervalMs: number;
  };
  supabase: {
    url: string;
    serviceRoleKey: string;
    auditEnabled: boolean;
  };
};

const DEFAULT_END_KEYWORDS = ["bye", "goodbye", "thank you", "thanks", "done", "finished"];

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .transform((value) => value === "true" || value === "1" || value === "yes");

const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z.object({
  PORT: positiveInt.default(3000),
  API_KEY: z.string().default(""),
  REPORT_URL: z.string().trim().default(""),
  REPORT_TIMEOUT_MS: positiveInt.default(10_000),
  SCAM_DECISION_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  MIN_MESSAGES_FOR_REPORT: positiveInt.default(5),
  MAX_MESSAGES_PER_SESSION: positiveInt.default(50),
  CONVERSATION_END_KEYWORDS: z.string().optional(),
  USE_LLM_FOR_CONVERSATION_END: booleanFlag.default("true"),
  LLM_PROVIDER: z.enum(["openai", "gemini", "none", ""]).default(""),
  LLM_TIMEOUT_MS: positiveInt.default(4_000),
  OPENAI_API_KEY: z.string().default(""),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  GEMINI_API_KEY: z.string().default(""),
  GOOGLE_API_KEY: z.string().default(""),
  GEMINI_MODEL: z.string().default("gemini-2.0-flash"),
  SESSION_IDLE_TTL_MS: positiveInt.default(24 * 60 * 60 * 1000),
  SESSION_REAPER_INTERVAL_MS: positiveInt.default(10 * 60 * 1000),
  SUPABASE_URL: z.string().default(""),
  SUPABASE_SERVICE_ROLE_KEY: z.string().default(""),
  ENABLE_SUPABASE_AUDIT: booleanFlag.default("true")
});

function parseKeywordList(raw: string | undefined): string[] {
  if (raw === undefined || raw.trim().length === 0) return [...DEFAULT_END_KEYWORDS];
  return raw
    .split(",")
    .map((item) => item.trim().toLowerCase())
    .filter(Boolean);
}

function pickProvider(
  requested: LlmProvider | "",
  openaiKey: string,
  geminiKey: string
): LlmProvider {
  if (requested === "none") return "none";
  if (requested === "openai") return openaiKey ? "openai" : "none";
  if (requested === "gemini") return geminiKey ? "gemini" : "none";
  if (openaiKey) return "openai";
  if (geminiKey) return "gemini";
  return "none";
}

function blankToUndefined(env: Record<string, string | undefined>): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    out[key] = value === undefined || value.trim() === "" ? undefined : value;
  }
  return out;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;
  const geminiKey = e.GEMINI_API_KEY || e.GOOGLE_API_KEY;
  const supabaseConfigured = Boolean(e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY);

  return {
    port: e.PORT,
    apiKey: e.API_KEY,
    report: {
      url: e.REPORT_URL,
      timeoutMs: e.REPORT_TIMEOUT_MS,
      minMessages: e.MIN_MESSAGES_FOR_REPORT
    },
    detection: {
      threshold: e.SCAM_DECISION_THRESHOLD
    },
    strategy: {
      maxMessagesPerSession: e.MAX_MESSAGES_PER_SESSION,
      minMessagesForReport: e.MIN_MESSAGES_FOR_REPORT,
      endKeywords: parseKeywordList(e.CONVERSATION_END_KEYWORDS),
      useLlmForEnd: e.USE_LLM_FOR_CONVERSATION_END
    },
    llm: {
      provider: pickProvider(e.LLM_PROVIDER, e.OPENAI_API_KEY, geminiKey),
      timeoutMs: e.LLM_TIMEOUT_MS,
      openaiApiKey: e.OPENAI_API_KEY,
      openaiModel: e.OPENAI_MODEL,
      geminiApiKey: geminiKey,
      geminiModel: e.GEMINI_MODEL
    },
    sessions: {
      idleTtlMs: e.SESSION_IDLE_TTL_MS,
      reaperIntervalMs: e.SESSION_REAPER_INTERVAL_MS
    },
    supabase: {
      url: e.SUPABASE_URL,
      serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY,
      auditEnabled: supabaseConfigured && e.ENABLE_SUPABASE_AUDIT
    }
  };
}
