import { swaggerUI } from "@hono/swagger-ui";
import { OpenAPIHono } from "@hono/zod-openapi";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import type { AppServices } from "../app";
import { handleError } from "./errors";
import { registerHandlers } from "./handlers";

export function createServer(services: AppServices): OpenAPIHono {
  const app = new OpenAPIHono({
    defaultHook: (result, c) => {
      if (!result.success) {
        return c.json(
          {
            success: false as const,
            error: result.error.issues
              .map((issue) => `${issue.path.join(".") || "(body)"}: ${issue.message}`)
              .join("; "),
            code: "VALIDATION_ERROR",
          },
          400,
        );
      }
    },
  });
  const startTime = Date.now();

  app.use("*", logger());
  app.use("*", cors());
  app.onError(handleError);

  registerHandlers(app, services, startTime);

  app.doc("/openapi.json", {
    openapi: "3.1.0",
    info: {
      title: "Discharge Assist API",
      version: "1.0.0",
      description:
        "Post-discharge patient assistant backed by hybrid dense and keyword retrieval over a reference document.",
    },
  });

  app.get("/docs", swaggerUI({ url: "/openapi.json" }));
  app.get("/", (c) => c.redirect("/docs"));

  return app;
}
