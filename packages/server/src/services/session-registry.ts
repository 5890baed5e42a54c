/**
 * Remote-control session registry
 *
 * Single source of truth for sessions and the work-item each one was opened
 * for. Every method is synchronous: the two maps are only ever touched inside
 * one turn of the event loop, so no caller (the sweep included) can observe
 * them half-updated.
 */

import { EventEmitter } from "node:events";
import type { Logger } from "pino";
import {
  SessionIdSchema,
  type CloseReason,
  type PartyRole,
  type RemoteSession,
  type SessionId,
  type SessionSnapshot,
  type SessionStats,
} from "@deskrelay/shared";
import { generateSessionId, generateToken, tokensMatch } from "./crypto.js";

export interface SessionRegistryOptions {
  ttlMs: number;
  /** Rejected token presentations before a session is closed; 0 disables */
  maxAuthFailures: number;
}

export type SessionClosedListener = (
  session: Readonly<RemoteSession>,
  reason: CloseReason
) => void;

export class SessionRegistry {
  private sessions = new Map<SessionId, RemoteSession>();
  private workItemSessions = new Map<string, SessionId>();
  private events = new EventEmitter();

  constructor(
    private options: SessionRegistryOptions,
    private log: Logger
  ) {}

  createSession(
    workItemId: string,
    userName: string,
    operatorName: string
  ): Readonly<RemoteSession> {
    const previousId = this.workItemSessions.get(workItemId);
    if (previousId) {
      this.closeSession(previousId, "replaced");
    }

    const now = Date.now();
    const session: RemoteSession = {
      id: generateSessionId(),
      workItemId,
      userName,
      operatorName,
      userToken: generateToken(),
      operatorToken: generateToken(),
      createdAt: now,
      expiresAt: now + this.options.ttlMs,
      lastActivityAt: now,
      status: "pending",
      userConnected: false,
      operatorConnected: false,
      authFailures: 0,
    };

    this.sessions.set(session.id, session);
    this.workItemSessions.set(workItemId, session.id);

    this.log.info(
      { sessionId: session.id, workItemId, replaced: previousId ?? null },
      "Created remote session"
    );
    return session;
  }

  /**
   * Expired and closed sessions are reported as absent even while they still
   * sit in the map waiting for the sweep.
   */
  getSession(id: string): Readonly<RemoteSession> | undefined {
    return this.getLiveSession(id);
  }

  getSessionByWorkItem(workItemId: string): Readonly<RemoteSession> | undefined {
    const id = this.workItemSessions.get(workItemId);
    return id ? this.getLiveSession(id) : undefined;
  }

  authenticateAsUser(id: string, token: string): boolean {
    return this.authenticate(id, "user", token);
  }

  authenticateAsOperator(id: string, token: string): boolean {
    return this.authenticate(id, "operator", token);
  }

  authenticate(id: string, role: PartyRole, token: string): boolean {
    const session = this.getLiveSession(id);
    if (!session) return false;

    const expected = role === "user" ? session.userToken : session.operatorToken;
    if (!tokensMatch(token, expected)) {
      this.recordAuthFailure(session, role);
      return false;
    }

    if (role === "user") {
      session.userConnected = true;
    } else {
      session.operatorConnected = true;
    }
    session.lastActivityAt = Date.now();

    this.log.info({ sessionId: session.id, role }, "Party authenticated");
    return true;
  }

  /**
   * Requires both parties to be connected right now. Never happens implicitly.
   */
  activate(id: string): boolean {
    const session = this.getLiveSession(id);
    if (!session || !session.userConnected || !session.operatorConnected) {
      return false;
    }

    session.status = "active";
    session.lastActivityAt = Date.now();
    this.log.info({ sessionId: session.id }, "Session activated");
    return true;
  }

  recordActivity(id: string): void {
    const session = this.getLiveSession(id);
    if (session) {
      session.lastActivityAt = Date.now();
    }
  }

  disconnectUser(id: string): void {
    this.disconnect(id, "user");
  }

  disconnectOperator(id: string): void {
    this.disconnect(id, "operator");
  }

  disconnect(id: string, role: PartyRole): void {
    const session = this.getLiveSession(id);
    if (!session) return;

    if (role === "user") {
      session.userConnected = false;
    } else {
      session.operatorConnected = false;
    }
    // Back to the handshake: only a fresh activate() restores control
    if (session.status === "active") {
      session.status = "pending";
    }
    this.log.info({ sessionId: session.id, role }, "Party disconnected");
  }

  /**
   * Closes the session and drops its work-item mapping. The id entry itself is
   * left for the sweep to prune. An open session past its expiry is closed with
   * reason `expired` and reported as not found.
   */
  closeSession(id: string, reason: CloseReason = "closed"): boolean {
    const session = this.lookup(id);
    if (!session || session.status === "closed") return false;

    const expired = Date.now() > session.expiresAt;
    const closeReason: CloseReason = expired ? "expired" : reason;

    session.status = "closed";
    session.userConnected = false;
    session.operatorConnected = false;

    // A newer session may already own the work-item
    if (this.workItemSessions.get(session.workItemId) === session.id) {
      this.workItemSessions.delete(session.workItemId);
    }

    this.log.info({ sessionId: session.id, reason: closeReason }, "Session closed");
    this.events.emit("closed", session, closeReason);
    return !expired;
  }

  /**
   * Removes every expired or closed entry from both maps.
   * @returns number of entries removed
   */
  sweepExpired(): number {
    const now = Date.now();
    const stale: RemoteSession[] = [];

    for (const session of this.sessions.values()) {
      if (session.status === "closed" || now > session.expiresAt) {
        stale.push(session);
      }
    }

    for (const session of stale) {
      if (session.status !== "closed") {
        this.closeSession(session.id, "expired");
      }
      this.sessions.delete(session.id);
    }

    if (stale.length > 0) {
      this.log.info({ count: stale.length }, "Swept stale sessions");
    }
    return stale.length;
  }

  getActiveSessions(): Readonly<RemoteSession>[] {
    const now = Date.now();
    return Array.from(this.sessions.values()).filter(
      (s) => s.status === "active" && now <= s.expiresAt
    );
  }

  stats(): SessionStats {
    const all = Array.from(this.sessions.values());
    return {
      total: all.length,
      active: all.filter((s) => s.status === "active").length,
      pending: all.filter((s) => s.status === "pending").length,
      closed: all.filter((s) => s.status === "closed").length,
      workItems: this.workItemSessions.size,
    };
  }

  /**
   * @returns a function that removes the listener
   */
  onSessionClosed(listener: SessionClosedListener): () => void {
    this.events.on("closed", listener);
    return () => {
      this.events.off("closed", listener);
    };
  }

  private lookup(id: string): RemoteSession | undefined {
    const parsed = SessionIdSchema.safeParse(id);
    return parsed.success ? this.sessions.get(parsed.data) : undefined;
  }

  private getLiveSession(id: string): RemoteSession | undefined {
    const session = this.lookup(id);
    if (!session) return undefined;
    if (session.status === "closed" || Date.now() > session.expiresAt) {
      return undefined;
    }
    return session;
  }

  private recordAuthFailure(session: RemoteSession, role: PartyRole): void {
    session.authFailures++;
    this.log.warn(
      { sessionId: session.id, role, failures: session.authFailures },
      "Rejected session token"
    );

    const limit = this.options.maxAuthFailures;
    if (limit > 0 && session.authFailures >= limit) {
      this.closeSession(session.id, "auth_lockout");
    }
  }
}

export function toSnapshot(session: Readonly<RemoteSession>): SessionSnapshot {
  return {
    sessionId: session.id,
    workItemId: session.workItemId,
    userName: session.userName,
    operatorName: session.operatorName,
    createdAt: new Date(session.createdAt).toISOString(),
    expiresAt: new Date(session.expiresAt).toISOString(),
    status: session.status,
    userConnected: session.userConnected,
    operatorConnected: session.operatorConnected,
    lastActivityAt: new Date(session.lastActivityAt).toISOString(),
  };
}
