import crypto from "node:crypto";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { EventQueue } from "./events";
import type { StateStore } from "./state";
import { webhookPayloadSchema } from "./validators";
import type { WorkerPool } from "./workerPool";

declare global {
  namespace Express {
    interface Request {
      requestId: string;
    }
  }
}

interface AppDeps {
  queue: EventQueue;
  store: StateStore;
  pool: WorkerPool;
  webhookToken?: string;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.use(express.json({ limit: "512kb" }));

  app.use((req: Request, _res: Response, next: NextFunction) => {
    req.requestId = crypto.randomUUID().slice(0, 8);
    console.log(`[REQ] method=${req.method} path=${req.path} request_id=${req.requestId}`);
    next();
  });

  app.get("/health", (_req, res) => {
    return res.status(200).json({
      ok: true,
      uptime: process.uptime(),
      ts: new Date().toISOString(),
      open_conversations: deps.store.size(),
      queued_events: deps.queue.size(),
      workers: deps.pool.stats(),
    });
  });

  app.post("/webhook", (req, res) => {
    if (deps.webhookToken && req.get("x-webhook-token") !== deps.webhookToken) {
      return res.status(403).json({ ok: false, request_id: req.requestId });
    }

    const parsed = webhookPayloadSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ ok: false, request_id: req.requestId, error: parsed.error.flatten() });
    }

    for (const event of parsed.data) {
      deps.queue.push(event);
    }

    return res.status(200).json({ ok: true, request_id: req.requestId, accepted: parsed.data.length });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    console.error("UNHANDLED_ERR", {
      request_id: req.requestId,
      message: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });

    return res.status(500).json({
      error: true,
      message: err instanceof Error ? err.message : "Internal server error",
      request_id: req.requestId,
    });
  });

  return app;
}
