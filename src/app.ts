import express, { type ErrorRequestHandler } from "express";
import type { Logger } from "pino";
import { nanoid } from "nanoid";
import type { Crm } from "./service/createCrm.js";
import { makeRoutes } from "./api/routes.js";
import { makeRateLimiter } from "./api/rate-limit.js";

function isBodyParseError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "type" in err && err.type === "entity.parse.failed";
}

/** 4xx status of an error meant for the client (body-parser sets expose), else null. */
function clientErrorStatus(err: unknown): { status: number; message: string } | null {
  if (typeof err !== "object" || err === null) return null;
  if (!("expose" in err) || err.expose !== true) return null;
  const status =
    "status" in err && typeof err.status === "number" ? err.status :
    "statusCode" in err && typeof err.statusCode === "number" ? err.statusCode :
    undefined;
  if (status === undefined || status < 400 || status >= 500) return null;
  const message = "message" in err && typeof err.message === "string" ? err.message : "invalid request";
  return { status, message };
}

export function createApp(args: {
  crm: Crm;
  logger: Logger;
  apiPrefix: string;
  rateLimit: { windowMs: number; max: number };
}) {
  const log = args.logger;
  const app = express();

  app.use((req, res, next) => {
    const reqId = nanoid(12);
    const startedAt = Date.now();
    res.setHeader("x-request-id", reqId);
    res.on("finish", () => {
      log.info({ reqId, method: req.method, path: req.originalUrl, status: res.statusCode, ms: Date.now() - startedAt }, "http");
    });
    next();
  });

  app.use(express.json({ limit: "512kb" }));

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.use(args.apiPrefix, makeRateLimiter(args.rateLimit), makeRoutes({ crm: args.crm }));

  app.use((_req, res) => {
    res.status(404).json({ ok: false, error: "not_found" });
  });

  const onError: ErrorRequestHandler = (err, req, res, _next) => {
    if (isBodyParseError(err)) {
      res.status(400).json({ ok: false, error: "invalid_payload", hint: "malformed JSON body" });
      return;
    }
    const client = clientErrorStatus(err);
    if (client) {
      res.status(client.status).json({ ok: false, error: "invalid_payload", hint: client.message });
      return;
    }
    log.error({ err, reqId: res.getHeader("x-request-id"), method: req.method, path: req.originalUrl }, "http: unhandled");
    res.status(500).json({ ok: false, error: "internal" });
  };
  app.use(onError);

  return app;
}
