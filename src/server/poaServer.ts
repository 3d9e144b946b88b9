#!/usr/bin/env node
/**
 * PoA HTTP surface.
 *
 * Routes (under /poa/v1):
 *   GET verify  full verification response; a FAIL verdict is still HTTP 200
 *   GET status  condensed projection of the same result
 *   GET health  liveness only, never touches disk or DNS
 *
 * Run:
 *   npm run build && npm start
 */
import { randomUUID } from "node:crypto";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import express from "express";
import type { Express, NextFunction, Request, Response } from "express";
import { componentLogger, logRequest } from "../../lib/logger.js";
import { loadConfig } from "../config.js";
import { txtLookupFromConfig } from "../dns/txtLookup.js";
import { createVerificationEngine, type VerificationEngine } from "../engine.js";
import { systemClock, type Clock } from "../poa/clock.js";
import { formatError } from "../poa/errors.js";
import {
  POA_BASE_PATH,
  POA_VERIFY_SCHEMA,
  buildLinks,
  buildStatusSummary,
  buildVerifyResponse,
} from "../poa/response.js";

const logger = componentLogger("server");

export interface PoaAppOptions {
  service: string;
  rateLimitWindowMs: number;
  rateLimitMax: number;
  /** Value of Access-Control-Allow-Origin */
  corsOrigin: string;
  /** Drives rate-limit windows and stamps error bodies; defaults to the system clock */
  clock?: Clock;
}

export function createPoaApp(engine: VerificationEngine, options: PoaAppOptions): Express {
  const app = express();
  const clock = options.clock ?? systemClock;
  const context = { service: options.service, basePath: POA_BASE_PATH };

  app.disable("x-powered-by");
  app.use(requestLogMiddleware);
  app.use(createHardeningMiddleware({ ...options, clock }));

  app.get(`${POA_BASE_PATH}/health`, (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  app.get(`${POA_BASE_PATH}/verify`, async (_req: Request, res: Response) => {
    try {
      const result = await engine.verify();
      res.json(buildVerifyResponse(result, context));
    } catch (error) {
      logger.error({ err: formatError(error) }, "verification failed");
      res.status(500).json({
        schema: POA_VERIFY_SCHEMA,
        ts: clock.now().toISOString(),
        verdict: "FAIL",
        message: `verification could not be computed: ${formatError(error)}`,
        service: options.service,
        links: buildLinks(POA_BASE_PATH),
      });
    }
  });

  app.get(`${POA_BASE_PATH}/status`, async (_req: Request, res: Response) => {
    try {
      const result = await engine.verify();
      res.json(buildStatusSummary(result));
    } catch (error) {
      logger.error({ err: formatError(error) }, "status failed");
      res.status(500).json({ ok: false, verdict: "FAIL", error: formatError(error) });
    }
  });

  app.use("/poa", (_req: Request, res: Response) => {
    res.status(404).json({ ok: false, error: "not found" });
  });

  return app;
}

function requestLogMiddleware(req: Request, res: Response, next: NextFunction): void {
  const requestId = randomUUID();
  const started = Date.now();
  res.setHeader("X-Request-Id", requestId);
  res.on("finish", () => {
    logRequest({
      requestId,
      method: req.method,
      path: req.path,
      status: res.statusCode,
      latency: Date.now() - started,
    });
  });
  next();
}

function createHardeningMiddleware({
  rateLimitWindowMs: windowMs,
  rateLimitMax: max,
  corsOrigin,
  clock,
}: Pick<PoaAppOptions, "rateLimitWindowMs" | "rateLimitMax" | "corsOrigin"> & { clock: Clock }) {
  const buckets = new Map<string, { count: number; resetAt: number }>();
  let nextSweepAt = 0;

  // Drops buckets whose window has closed, at most once per window.
  function sweep(now: number): void {
    if (now < nextSweepAt) return;
    for (const [key, bucket] of buckets) {
      if (bucket.resetAt <= now) buckets.delete(key);
    }
    nextSweepAt = now + windowMs;
  }

  return function hardening(req: Request, res: Response, next: NextFunction): void {
    res.setHeader("X-Content-Type-Options", "nosniff");
    res.setHeader("X-Frame-Options", "DENY");
    res.setHeader("Referrer-Policy", "no-referrer");
    res.setHeader("Cache-Control", "no-store");
    res.setHeader("Access-Control-Allow-Origin", corsOrigin);
    res.setHeader("Access-Control-Allow-Methods", "GET,OPTIONS");

    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }

    if (req.path !== `${POA_BASE_PATH}/health`) {
      const key = req.ip || req.socket.remoteAddress || "unknown";
      const now = clock.now().getTime();
      sweep(now);
      const current = buckets.get(key);

      if (!current || current.resetAt <= now) {
        buckets.set(key, { count: 1, resetAt: now + windowMs });
      } else {
        current.count += 1;
        if (current.count > max) {
          const retryAfterSeconds = Math.max(1, Math.ceil((current.resetAt - now) / 1000));
          res.setHeader("Retry-After", String(retryAfterSeconds));
          res.status(429).json({ ok: false, error: "rate limit exceeded" });
          return;
        }
      }
    }

    next();
  };
}

function main(): void {
  const config = loadConfig();
  const engine = createVerificationEngine(config, {
    txtLookup: txtLookupFromConfig(config),
    clock: systemClock,
  });

  const app = createPoaApp(engine, {
    service: config.serviceName,
    rateLimitWindowMs: config.rateLimitWindowMs,
    rateLimitMax: config.rateLimitMax,
    corsOrigin: config.corsOrigin,
  });

  app.listen(config.port, config.host, () => {
    logger.info(
      { host: config.host, port: config.port, exportDir: config.exportDir, dnsName: config.dnsName },
      `PoA verifier listening on http://${config.host}:${config.port}${POA_BASE_PATH}/verify`
    );
  });
}

if (process.argv[1] && fileURLToPath(import.meta.url) === resolve(process.argv[1])) {
  try {
    main();
  } catch (error) {
    logger.fatal({ err: formatError(error) }, "PoA verifier failed to start");
    process.exitCode = 1;
  }
}
