/**
 * Shared constants
 */

/**
 * HTTP status codes used by the API
 */
export const ERROR_CODES = {
  VALIDATION_ERROR: 400,
  UNAUTHENTICATED: 401,
  NOT_FOUND: 404,
  INTERNAL: 500,
} as const;

/**
 * Endpoints
 */
export const ENDPOINTS = {
  HEALTH: "/",
  SESSIONS: "/sessions",
  SESSION: "/sessions/:id",
  SESSION_CLOSE: "/sessions/:id/close",
  WORK_ITEM_SESSION: "/work-items/:workItemId/session",
  SESSION_STATS: "/api/remote-sessions",
  ACTIVE_SESSIONS: "/api/remote-sessions/active",
  SCREEN_STATS: "/api/screen-stats",
  INPUT_STATS: "/api/input-stats",
  CHANNEL: "/ws",
} as const;

/**
 * Identifier sizes (nanoid alphabet, 6 bits per character)
 */
export const ID_LENGTHS = {
  SESSION_ID: 32, // 192 bits
  TOKEN: 43, // 258 bits
  CONNECTION_ID: 21,
} as const;

export const SHUTDOWN_GRACE_PERIOD_MS = 30_000;

export const STAFF_TOKEN_ISSUER = "deskrelay";
