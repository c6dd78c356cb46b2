import express, { NextFunction, Request, Response } from "express";
import dotenv from "dotenv";
import cors from "cors";
import { HoneypotAgent } from "./core/honeypot";
import { SessionStore } from "./core/sessionStore";
import { createHoneypotRouter } from "./routes/honeypot";
import { loadConfig } from "./utils/config";
import type { AppConfig } from "./utils/config";
import { safeError, safeLog } from "./utils/logging";
import { errorBody } from "./utils/requestSchema";

dotenv.config();

const PRUNE_INTERVAL_MS = 60 * 1000;

export type AppDeps = {
  config?: AppConfig;
  store?: SessionStore;
  agent?: HoneypotAgent;
};

export function createApp(deps: AppDeps = {}): express.Express {
  const config = deps.config ?? loadConfig();
  const store = deps.store ?? new SessionStore({ ttlMs: config.sessionTtlMs });
  const agent =
    deps.agent ?? new HoneypotAgent(store, { policy: config.detection, probeWindow: config.probeWindow });

  const app = express();
  app.use(cors());
  app.use(express.json({ type: "*/*", limit: "2mb" }));

  app.use("/api", createHoneypotRouter({ agent, config }));

  app.get("/health", (_req: Request, res: Response) => {
    return res.json({ status: "ok" });
  });

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(err);
    safeError("ERROR", err);
    return res.status(400).json(errorBody("request body must be valid JSON"));
  });

  return app;
}

if (require.main === module) {
  const config = loadConfig();
  const store = new SessionStore({ ttlMs: config.sessionTtlMs });
  const app = createApp({ config, store });

  if (config.sessionTtlMs > 0) {
    const timer = setInterval(() => {
      const removed = store.prune();
      if (removed > 0) safeLog("SESSIONS", `pruned ${removed} idle session(s)`);
    }, PRUNE_INTERVAL_MS);
    timer.unref();
  }

  app.listen(config.port, () => {
    console.info(`Honeypot API listening on port ${config.port}`);
  });
}
