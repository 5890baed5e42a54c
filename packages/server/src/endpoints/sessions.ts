/**
 * Session endpoints - staff create, look up and close remote sessions
 */

import type { Hono } from "hono";
import type { Logger } from "pino";
import {
  ENDPOINTS,
  ERROR_CODES,
  SessionCreateRequestSchema,
  type SessionCreateResponse,
} from "@deskrelay/shared";
import { toSnapshot, type SessionRegistry } from "../services/session-registry.js";
import type { AppEnv } from "./staff-auth.js";

export function setupSessionEndpoints(
  app: Hono<AppEnv>,
  registry: SessionRegistry,
  log: Logger
) {
  // Create session
  app.post(ENDPOINTS.SESSIONS, async (c) => {
    try {
      let body: unknown;
      try {
        body = await c.req.json();
      } catch {
        return c.json({ error: "Request body must be JSON" }, ERROR_CODES.VALIDATION_ERROR);
      }

      const parsed = SessionCreateRequestSchema.safeParse(body);
      if (!parsed.success) {
        return c.json(
          { error: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ") },
          ERROR_CODES.VALIDATION_ERROR
        );
      }

      const { workItemId, userName, operatorName } = parsed.data;
      const session = registry.createSession(
        workItemId,
        userName,
        operatorName ?? c.get("staff").name
      );

      const response: SessionCreateResponse = {
        sessionId: session.id,
        userToken: session.userToken,
        operatorToken: session.operatorToken,
        expiresAt: new Date(session.expiresAt).toISOString(),
      };
      return c.json(response);
    } catch (error) {
      log.error({ err: error }, "Session creation error");
      return c.json({ error: String(error) }, ERROR_CODES.INTERNAL);
    }
  });

  // Session snapshot (tokens are never echoed back)
  app.get(ENDPOINTS.SESSION, (c) => {
    const session = registry.getSession(c.req.param("id"));
    if (!session) {
      return c.json({ error: "Session not found" }, ERROR_CODES.NOT_FOUND);
    }
    return c.json(toSnapshot(session));
  });

  // Current session for a work-item
  app.get(ENDPOINTS.WORK_ITEM_SESSION, (c) => {
    const session = registry.getSessionByWorkItem(c.req.param("workItemId"));
    if (!session) {
      return c.json({ error: "No session for work-item" }, ERROR_CODES.NOT_FOUND);
    }
    return c.json(toSnapshot(session));
  });

  // Close session
  app.post(ENDPOINTS.SESSION_CLOSE, (c) => {
    const sessionId = c.req.param("id");
    if (!registry.closeSession(sessionId, "closed")) {
      return c.json({ error: "Session not found" }, ERROR_CODES.NOT_FOUND);
    }
    log.info({ sessionId, staff: c.get("staff").name }, "Session closed by staff");
    return c.json({ closed: true });
  });
}
