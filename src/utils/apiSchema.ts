import { z } from "zod";
import { normalizeTimestamp } from "./time";

export type Sender = "counterpart" | "agent";

export type Message = {
  sender: Sender;
  text: string;
  timestamp: string;
};

export type InboundMetadata = {
  channel?: string;
  language?: string;
  locale?: string;
};

export type InboundRequest = {
  sessionId: string;
  message: Message;
  conversationHistory: Message[];
  metadata?: InboundMetadata;
};

export type ReplyEnvelope = {
  status: "success" | "error";
  reply: string | null;
  error?: string;
};

const COUNTERPART_SENDERS = ["scammer", "counterpart"];
const AGENT_SENDERS = ["user", "agent", "honeypot"];

const SenderSchema = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => COUNTERPART_SENDERS.includes(value) || AGENT_SENDERS.includes(value), {
    message: "sender must be one of scammer, counterpart, user, agent"
  })
  .transform((value): Sender => (AGENT_SENDERS.includes(value) ? "agent" : "counterpart"));

const MessageSchema = z.object({
  sender: SenderSchema.default("scammer"),
  text: z.string().refine((value) => value.trim().length > 0, { message: "text must not be empty" }),
  timestamp: z.union([z.number(), z.string()]).optional()
});

const InboundSchema = z.object({
  sessionId: z.string().trim().min(1, "sessionId is required"),
  message: MessageSchema,
  conversationHistory: z.array(MessageSchema).default([]),
  metadata: z
    .object({
      channel: z.string().optional(),
      language: z.string().optional(),
      locale: z.string().optional()
    })
    .optional()
});

export type ParseResult =
  | { ok: true; request: InboundRequest }
  | { ok: false; error: string };

function toMessage(raw: z.infer<typeof MessageSchema>): Message {
  return {
    sender: raw.sender,
    text: raw.text,
    timestamp: normalizeTimestamp(raw.timestamp)
  };
}

export function parseInboundRequest(body: unknown): ParseResult {
  const parsed = InboundSchema.safeParse(body ?? {});
  if (!parsed.success) {
    const error = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
      .join("; ");
    return { ok: false, error };
  }
  const data = parsed.data;
  return {
    ok: true,
    request: {
      sessionId: data.sessionId,
      message: toMessage(data.message),
      conversationHistory: data.conversationHistory.map(toMessage),
      metadata: data.metadata
    }
  };
}

export function successReply(reply: string | null): ReplyEnvelope {
  return { status: "success", reply };
}

export function errorReply(error: string): ReplyEnvelope {
  return { status: "error", reply: null, error };
}
