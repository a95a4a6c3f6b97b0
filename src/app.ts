import { Hono } from "hono";
import { cors } from "hono/cors";
import { env } from "./config/env.js";
import type { InMemoryEntityHost } from "./host/entity-host.js";
import { formatErrorResponse } from "./middleware/error-handler.js";
import { createRateLimitMiddleware } from "./middleware/rate-limit.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { createV1Router } from "./routes/v1.js";
import type { ContentHub } from "./services/content-hub.js";
import { logger } from "./utils/logger.js";

interface CreateAppOptions {
  hub: ContentHub;
  host: InMemoryEntityHost;
  rateLimitWindowMs?: number;
  rateLimitMax?: number;
}

export function createApp(options: CreateAppOptions): Hono {
  const app = new Hono();
  const { hub, host } = options;

  app.use("*", requestIdMiddleware);
  app.use("*", async (c, next) => {
    const start = Date.now();
    await next();
    logger.info("request", {
      requestId: c.get("requestId"),
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    });
  });
  app.use(
    "*",
    cors({
      origin: env.CORS_ORIGIN,
      allowMethods: ["GET", "POST", "OPTIONS"],
      allowHeaders: ["Content-Type", "X-Request-Id"],
    }),
  );

  app.use(
    "/api/*",
    createRateLimitMiddleware({
      windowMs: options.rateLimitWindowMs ?? env.RATE_LIMIT_WINDOW_MS,
      max: options.rateLimitMax ?? env.RATE_LIMIT_MAX,
      scope: "api",
    }),
  );

  app.get("/healthz", (c) => {
    return c.json({ code: 200, message: "ok", data: hub.health() }, 200);
  });

  app.route("/api/v1", createV1Router(hub, host));

  app.notFound((c) => {
    return c.json(
      {
        code: 404,
        message: "Not Found",
      },
      404,
    );
  });

  app.onError((error, c) => formatErrorResponse(error, c));

  return app;
}
