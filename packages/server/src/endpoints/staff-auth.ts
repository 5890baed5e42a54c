/**
 * Bearer-token guard for staff-only routes
 */

import { createMiddleware } from "hono/factory";
import { ERROR_CODES } from "@deskrelay/shared";
import type { StaffAuthenticator, StaffClaims } from "../services/staff-auth.js";

export type AppEnv = {
  Variables: {
    staff: StaffClaims;
  };
};

const BEARER = /^Bearer\s+(\S+)$/i;

export function requireStaff(auth: StaffAuthenticator) {
  return createMiddleware<AppEnv>(async (c, next) => {
    const match = BEARER.exec(c.req.header("Authorization") ?? "");
    if (!match) {
      return c.json({ error: "Missing bearer token" }, ERROR_CODES.UNAUTHENTICATED);
    }

    const staff = await auth.verify(match[1]);
    if (!staff) {
      return c.json({ error: "Invalid staff token" }, ERROR_CODES.UNAUTHENTICATED);
    }

    c.set("staff", staff);
    await next();
  });
}
