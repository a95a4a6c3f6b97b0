import type { Context } from "hono";
import { logger } from "../utils/logger.js";

export type AppErrorStatus = 404 | 500;

export class AppError extends Error {
  status: AppErrorStatus;

  constructor(message: string, status: AppErrorStatus = 500) {
    super(message);
    this.status = status;
  }
}

export function formatErrorResponse(error: unknown, c: Context): Response {
  const requestId = c.get("requestId");

  if (error instanceof AppError) {
    logger.warn("request_failed", {
      requestId,
      status: error.status,
      path: c.req.path,
      error: error.message,
    });
    return c.json(
      {
        code: error.status,
        message: error.message,
      },
      error.status,
    );
  }

  const message = error instanceof Error ? error.message : "Internal Server Error";

  logger.error("unhandled_error", {
    requestId,
    path: c.req.path,
    error: message,
  });

  return c.json(
    {
      code: 500,
      message: "Internal Server Error",
    },
    500,
  );
}
