/**
 * Monitoring endpoints
 */

import type { Hono } from "hono";
import { ENDPOINTS } from "@deskrelay/shared";
import { toSnapshot, type SessionRegistry } from "../services/session-registry.js";
import type { FrameProducer } from "../services/frame-producer.js";
import type { InputAuthorizer } from "../services/input-authorizer.js";
import type { AppEnv } from "./staff-auth.js";

export function setupStatusEndpoints(
  app: Hono<AppEnv>,
  registry: SessionRegistry,
  frames: FrameProducer,
  input: InputAuthorizer
) {
  app.get(ENDPOINTS.SESSION_STATS, (c) => c.json(registry.stats()));
  app.get(ENDPOINTS.ACTIVE_SESSIONS, (c) =>
    c.json({ sessions: registry.getActiveSessions().map(toSnapshot) })
  );
  app.get(ENDPOINTS.SCREEN_STATS, (c) => c.json(frames.getStats()));
  app.get(ENDPOINTS.INPUT_STATS, (c) => c.json(input.getStats()));
}
