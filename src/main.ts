import { serve } from "@hono/node-server";
import dotenv from "dotenv";
import { createServer } from "./api/server";
import { createServices } from "./app";
import { loadConfigFromEnv } from "./config";
import { createLogger } from "./utils/logger";

dotenv.config();

const log = createLogger("server");

async function main(): Promise<void> {
  const config = loadConfigFromEnv();
  const services = await createServices(config);
  const app = createServer(services);
  const port = config.port ?? 3000;

  serve({ fetch: app.fetch, port }, (info) => {
    log.info(`Server running on http://localhost:${info.port}`);
    log.info(`API docs: http://localhost:${info.port}/docs`);
  });
}

main().catch((error: unknown) => {
  log.error("Failed to start server", error);
  process.exit(1);
});
