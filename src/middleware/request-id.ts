import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";

export interface RequestIdVariables {
  requestId: string;
}

declare module "hono" {
  interface ContextVariableMap extends RequestIdVariables {}
}

export const requestIdMiddleware: MiddlewareHandler = async (c, next) => {
  const incomingId = c.req.header("x-request-id")?.trim();
  const requestId = incomingId || randomUUID();
  c.set("requestId", requestId);
  c.header("x-request-id", requestId);
  await next();
};
