import express from "express";
import cors from "cors";
import { errorMessage } from "./classify.js";
import { HttpError } from "./errors.js";
import { logger as rootLogger, type Logger } from "./logger.js";
import type { ConnectFn } from "./negotiate.js";
import type { ProbeFn } from "./probe.js";
import type { ClosableSocket } from "./transport.js";
import type { FailureReason } from "./types.js";

export type AppDeps = {
  apiKey?: string;
  timeoutMs: number;
  allowInsecureLoopback: boolean;
  negotiate: ConnectFn<ClosableSocket>;
  probe: ProbeFn;
  logger?: Logger;
};

const FAILURE_STATUS: Record<FailureReason, number> = {
  invalid_request: 400,
  unsafe_profile_rejected: 403,
  transport_unreachable: 502,
  all_profiles_exhausted: 502,
};

const queryString = (value: unknown): string => (typeof value === "string" ? value : "");

const queryTimeout = (value: unknown, fallback: number): number => {
  const parsed = Number(value);
  return typeof value === "string" && Number.isInteger(parsed) && parsed > 0 ? Math.min(parsed, 120_000) : fallback;
};

export function createApp(deps: AppDeps) {
  const log = deps.logger ?? rootLogger;
  const app = express();
  app.use(cors({ origin: "*", methods: ["GET"] }));

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  // simple API key guard
  app.use((req, res, next) => {
    const key = req.header("x-negotiator-key") || "";
    if (!deps.apiKey || key !== deps.apiKey) {
      return res.status(401).json({ error: "unauthorized" });
    }
    next();
  });

  app.get("/negotiate", async (req, res) => {
    const host = queryString(req.query.host);
    const port = Number(queryString(req.query.port) || NaN);
    const profile = queryString(req.query.profile) || "auto";
    const result = await deps.negotiate(host, port, profile, {
      timeoutMs: queryTimeout(req.query.timeout, deps.timeoutMs),
      allowInsecureLoopback: deps.allowInsecureLoopback,
      logger: log,
    });

    if (!result.ok) {
      return res.status(FAILURE_STATUS[result.reason]).json(result);
    }
    // the HTTP API only reports; the session is not kept open
    result.connection.destroy();
    res.json({
      ok: true,
      profileName: result.profileName,
      tlsVersion: result.tlsVersion,
      cipherName: result.cipherName,
    });
  });

  app.get("/probe", async (req, res) => {
    const host = queryString(req.query.host);
    const port = Number(queryString(req.query.port) || NaN);
    try {
      const report = await deps.probe(host, port, {
        timeoutMs: queryTimeout(req.query.timeout, deps.timeoutMs),
        logger: log,
      });
      res.json(report);
    } catch (e) {
      const status = e instanceof HttpError ? e.status : 502;
      if (status >= 500) log.error({ err: e }, "probe failed");
      res.status(status).json({ error: errorMessage(e) || "probe failed" });
    }
  });

  return app;
}
