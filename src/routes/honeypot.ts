import { Router, Request, Response } from "express";
import type { IncomingHttpHeaders } from "http";
import type { Orchestrator } from "../core/orchestrator";
import { errorReply, parseInboundRequest, type ReplyEnvelope } from "../utils/apiSchema";
import { safeError, safeLog, toLogText, sanitizeHeaders } from "../utils/logging";

export type HoneypotResult = {
  status: number;
  body: ReplyEnvelope;
};

function logIncoming(headers: IncomingHttpHeaders, body: unknown) {
  safeLog(`[INCOMING] headers: ${toLogText(sanitizeHeaders(headers), 2000)}`);
  safeLog(`[INCOMING] body: ${toLogText(body, 2000)}`);
}

function logOutgoing(result: HoneypotResult) {
  safeLog(`[OUTGOING] status: ${result.status} response_json: ${toLogText(result.body, 2000)}`);
}

function headerValue(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/** Transport-free turn handling so the status mapping can be exercised without a server. */
export async function handleHoneypotRequest(
  orchestrator: Orchestrator,
  expectedKey: string,
  headers: IncomingHttpHeaders,
  body: unknown
): Promise<HoneypotResult> {
  if (expectedKey && headerValue(headers, "x-api-key") !== expectedKey) {
    return { status: 401, body: errorReply("Invalid API key") };
  }

  const parsed = parseInboundRequest(body);
  if (!parsed.ok) {
    return { status: 400, body: errorReply(parsed.error) };
  }

  try {
    return { status: 200, body: await orchestrator.handle(parsed.request) };
  } catch (err) {
    safeError(`[ROUTE] ${parsed.request.sessionId} turn failed`, err);
    return { status: 500, body: errorReply("Internal error while processing message") };
  }
}

export function createHoneypotRouter(orchestrator: Orchestrator, expectedKey: string): Router {
  const router = Router();

  router.post("/honeypot", async (req: Request, res: Response) => {
    logIncoming(req.headers, req.body);
    const result = await handleHoneypotRequest(orchestrator, expectedKey, req.headers, req.body);
    logOutgoing(result);
    return res.status(result.status).json(result.body);
  });

  return router;
}
