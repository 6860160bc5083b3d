import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { AppConfig } from "../utils/config";
import { describeError, safeLog, safeWarn } from "../utils/logging";

export type TurnAuditEntry = {
  sessionId: string;
  turnIndex: number;
  method: string;
  confidence: number;
  scamDetected: boolean;
  goal: string | null;
  reply: string | null;
  timestamp: string;
};

export interface AuditSink {
  recordTurn(entry: TurnAuditEntry): Promise<void>;
}

export const noopAuditSink: AuditSink = {
  async recordTurn() {
    // auditing disabled
  }
};

export class SupabaseAuditSink implements AuditSink {
  constructor(
    private readonly client: SupabaseClient,
    private readonly table = "honeypot_turns"
  ) {}

  async recordTurn(entry: TurnAuditEntry): Promise<void> {
    try {
      const { error } = await this.client.from(this.table).insert({
        session_id: entry.sessionId,
        turn_index: entry.turnIndex,
        method: entry.method,
        confidence: entry.confidence,
        scam_detected: entry.scamDetected,
        goal: entry.goal ?? "",
        reply: entry.reply ?? "",
        ts: entry.timestamp
      });
      if (error) safeWarn(`[AUDIT] ${entry.sessionId} insert failed: ${error.message}`);
    } catch (err) {
      safeWarn(`[AUDIT] ${entry.sessionId} insert failed: ${describeError(err)}`);
    }
  }
}

export function createAuditSink(config: AppConfig["supabase"]): AuditSink {
  if (!config.auditEnabled || !config.url || !config.serviceRoleKey) return noopAuditSink;
  safeLog("[AUDIT] supabase turn audit enabled");
  const client = createClient(config.url, config.serviceRoleKey, { auth: { persistSession: false } });
  return new SupabaseAuditSink(client);
}
