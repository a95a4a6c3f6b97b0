import { serve } from "@hono/node-server";
import { createApp } from "./app.js";
import { env } from "./config/env.js";
import { hubConfigFromEnv, type HubConfig } from "./config/hub-config.js";
import { InMemoryEntityHost } from "./host/entity-host.js";
import { ContentHub } from "./services/content-hub.js";
import { errorMessage, logger } from "./utils/logger.js";

let config: HubConfig;
try {
  config = hubConfigFromEnv(env);
} catch (error) {
  logger.error("config_invalid", { error: errorMessage(error) });
  process.exit(1);
}

const host = new InMemoryEntityHost();
const hub = new ContentHub({ config, host });
hub.setup();

const app = createApp({ hub, host });

const server = serve(
  {
    fetch: app.fetch,
    port: env.PORT,
  },
  () => {
    logger.info("server_started", {
      port: env.PORT,
      env: env.NODE_ENV,
    });
  },
);

server.on("error", (error) => {
  logger.error("server_start_failed", {
    port: env.PORT,
    env: env.NODE_ENV,
    error: errorMessage(error),
  });
});

hub.start().catch((error: unknown) => {
  logger.error("hub_start_failed", { error: errorMessage(error) });
});

function shutdown(signal: string): void {
  logger.info("shutdown", { signal });
  server.close();
  hub
    .stop()
    .catch((error: unknown) => {
      logger.error("hub_stop_failed", { error: errorMessage(error) });
    })
    .finally(() => {
      process.exit(0);
    });
}

process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));
