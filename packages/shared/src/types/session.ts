/**
 * Remote-control session types
 */

import { z } from "zod";

export const SessionIdSchema = z.string().min(1).brand<"SessionId">();
export type SessionId = z.infer<typeof SessionIdSchema>;

export const ConnectionIdSchema = z.string().min(1).brand<"ConnectionId">();
export type ConnectionId = z.infer<typeof ConnectionIdSchema>;

export const SessionStatusSchema = z.enum(["pending", "active", "closed"]);
export type SessionStatus = z.infer<typeof SessionStatusSchema>;

export const PartyRoleSchema = z.enum(["user", "operator"]);
export type PartyRole = z.infer<typeof PartyRoleSchema>;

/**
 * Why a session stopped accepting parties. `replaced` means a newer session was
 * opened for the same work-item.
 */
export const CloseReasonSchema = z.enum([
  "closed",
  "replaced",
  "expired",
  "auth_lockout",
]);
export type CloseReason = z.infer<typeof CloseReasonSchema>;

export interface RemoteSession {
  readonly id: SessionId;
  readonly workItemId: string;
  readonly userName: string;
  readonly operatorName: string;
  readonly userToken: string;
  readonly operatorToken: string;
  readonly createdAt: number;
  readonly expiresAt: number;
  lastActivityAt: number;
  status: SessionStatus;
  userConnected: boolean;
  operatorConnected: boolean;
  authFailures: number;
}

/**
 * What parties and staff get to see of a session. Never carries tokens.
 */
export const SessionSnapshotSchema = z.object({
  sessionId: z.string(),
  workItemId: z.string(),
  userName: z.string(),
  operatorName: z.string(),
  createdAt: z.string(),
  expiresAt: z.string(),
  status: SessionStatusSchema,
  userConnected: z.boolean(),
  operatorConnected: z.boolean(),
  lastActivityAt: z.string(),
});
export type SessionSnapshot = z.infer<typeof SessionSnapshotSchema>;

export const SessionCreateRequestSchema = z.object({
  workItemId: z.string().min(1),
  userName: z.string().min(1),
  /** Defaults to the name of the staff member making the request */
  operatorName: z.string().min(1).optional(),
});
export type SessionCreateRequest = z.infer<typeof SessionCreateRequestSchema>;

export const SessionCreateResponseSchema = z.object({
  sessionId: z.string(),
  userToken: z.string(),
  operatorToken: z.string(),
  expiresAt: z.string(),
});
export type SessionCreateResponse = z.infer<typeof SessionCreateResponseSchema>;

export interface SessionStats {
  total: number;
  active: number;
  pending: number;
  closed: number;
  workItems: number;
}
