import type { OpenAPIHono } from "@hono/zod-openapi";
import { HTTPException } from "hono/http-exception";
import type { AppServices } from "../app";
import {
  askRoute,
  chatRoute,
  deleteSessionRoute,
  healthRoute,
  ingestPdfRoute,
  retrieveRoute,
  sessionRoute,
  statsRoute,
} from "./routes";

const VERSION = "1.0.0";

export function registerHandlers(
  app: OpenAPIHono,
  services: AppServices,
  startTime: number,
) {
  const { knowledgeBase, patients, clinical, sessions } = services;

  app.openapi(healthRoute, (c) => {
    return c.json(
      {
        status: "ok",
        version: VERSION,
        uptime: Math.floor((Date.now() - startTime) / 1000),
        indexReady: knowledgeBase.isReady,
      },
      200,
    );
  });

  app.openapi(statsRoute, (c) => {
    return c.json(
      {
        success: true as const,
        index: knowledgeBase.getStats(),
        patients: patients.size,
        sessions: sessions.size,
      },
      200,
    );
  });

  app.openapi(retrieveRoute, async (c) => {
    const { query, k, method } = c.req.valid("json");
    const results = await knowledgeBase.retrieve(query, k, method);
    return c.json(
      {
        success: true as const,
        results,
        sufficient: knowledgeBase.isSufficient(results),
        context: knowledgeBase.selectContext(results),
      },
      200,
    );
  });

  app.openapi(askRoute, async (c) => {
    const { query, patientName } = c.req.valid("json");
    const match = patientName ? patients.findByName(patientName) : null;
    const answer = await clinical.answer(query, match?.patient);
    return c.json(
      { success: true as const, answer, patientFound: match !== null },
      200,
    );
  });

  app.openapi(chatRoute, async (c) => {
    const { message, sessionId } = c.req.valid("json");

    let greeting: string | undefined;
    let router = sessionId ? sessions.get(sessionId) : undefined;
    if (sessionId && !router) {
      throw new HTTPException(404, { message: `Unknown session "${sessionId}"` });
    }
    if (!router) {
      router = sessions.create();
      greeting = router.startSession();
    }

    const reply = await router.processMessage(message);
    return c.json(
      {
        success: true as const,
        sessionId: router.sessionId,
        greeting,
        ...reply,
      },
      200,
    );
  });

  app.openapi(sessionRoute, (c) => {
    const { sessionId } = c.req.valid("param");
    const router = sessions.get(sessionId);
    if (!router) {
      throw new HTTPException(404, { message: `Unknown session "${sessionId}"` });
    }
    return c.json(
      {
        success: true as const,
        status: router.getStatus(),
        log: router.getConversationLog(),
      },
      200,
    );
  });

  app.openapi(deleteSessionRoute, (c) => {
    const { sessionId } = c.req.valid("param");
    if (!sessions.delete(sessionId)) {
      throw new HTTPException(404, { message: `Unknown session "${sessionId}"` });
    }
    return c.json({ success: true as const, sessionId }, 200);
  });

  app.openapi(ingestPdfRoute, async (c) => {
    const { source } = c.req.valid("query");
    const body = new Uint8Array(await c.req.arrayBuffer());
    if (body.byteLength === 0) {
      throw new HTTPException(400, { message: "Empty request body" });
    }

    const result = await services.ingestDocument(body, source ?? "upload.pdf");
    return c.json(
      {
        success: true as const,
        result,
        message: `Indexed ${result.chunkCount} chunks from ${result.sources.join(", ")}`,
      },
      200,
    );
  });
}
