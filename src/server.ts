import express, { NextFunction, Request, Response } from "express";
import dotenv from "dotenv";
import cors from "cors";
import { createOrchestrator } from "./core/orchestrator";
import { SessionStore } from "./core/sessionStore";
import { createHoneypotRouter } from "./routes/honeypot";
import { errorReply } from "./utils/apiSchema";
import { loadConfig } from "./utils/config";
import { safeError, safeLog } from "./utils/logging";

dotenv.config();

const config = loadConfig();
const store = new SessionStore();
const orchestrator = createOrchestrator(config, store);

const app = express();

app.use(cors());
app.use(express.json({ limit: "2mb" }));

app.use("/api", createHoneypotRouter(orchestrator, config.apiKey));

app.get("/health", (_req: Request, res: Response) => {
  return res.json({ ok: true, sessions: orchestrator.sessionCount });
});

// Body parser failures (bad JSON) still answer with the reply envelope.
app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
  safeError("[ROUTE] request rejected", err);
  const status = err instanceof SyntaxError ? 400 : 500;
  return res.status(status).json(errorReply(status === 400 ? "Malformed JSON body" : "Internal error"));
});

store.startReaper(config.sessions.reaperIntervalMs, config.sessions.idleTtlMs, (ids) => {
  safeLog(`[SESSIONS] reaped ${ids.length} idle session(s)`);
});

app.listen(config.port, () => {
  safeLog(`Honeypot API listening on port ${config.port} (llm=${config.llm.provider})`);
});
