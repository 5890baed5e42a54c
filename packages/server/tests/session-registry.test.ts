import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import pino from "pino";
import type { CloseReason } from "@deskrelay/shared";
import { SessionRegistry, toSnapshot } from "../src/services/session-registry.js";

const log = pino({ level: "silent" });
const TTL = 60_000;
const START = new Date("2026-03-01T09:00:00.000Z");

function createRegistry(maxAuthFailures = 5) {
  return new SessionRegistry({ ttlMs: TTL, maxAuthFailures }, log);
}

describe("SessionRegistry", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(START);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("createSession", () => {
    it("creates a pending session with independent tokens", () => {
      const registry = createRegistry();
      const session = registry.createSession("T1", "Alice", "Bob");

      expect(session.status).toBe("pending");
      expect(session.workItemId).toBe("T1");
      expect(session.userName).toBe("Alice");
      expect(session.operatorName).toBe("Bob");
      expect(session.id).toHaveLength(32);
      expect(session.userToken).toHaveLength(43);
      expect(session.operatorToken).toHaveLength(43);
      expect(session.userToken).not.toBe(session.operatorToken);
      expect(session.createdAt).toBe(START.getTime());
      expect(session.expiresAt).toBe(START.getTime() + TTL);
      expect(session.userConnected).toBe(false);
      expect(session.operatorConnected).toBe(false);
    });

    it("indexes the session by work-item", () => {
      const registry = createRegistry();
      const session = registry.createSession("T1", "Alice", "Bob");

      expect(registry.getSession(session.id)).toBe(session);
      expect(registry.getSessionByWorkItem("T1")).toBe(session);
      expect(registry.getSessionByWorkItem("T2")).toBeUndefined();
    });

    it("replaces the previous session for the same work-item", () => {
      const registry = createRegistry();
      const closed: Array<[string, CloseReason]> = [];
      registry.onSessionClosed((s, reason) => closed.push([s.id, reason]));

      const first = registry.createSession("T1", "Alice", "Bob");
      const second = registry.createSession("T1", "Alice", "Bob");

      expect(closed).toEqual([[first.id, "replaced"]]);
      expect(registry.getSession(first.id)).toBeUndefined();
      expect(registry.getSessionByWorkItem("T1")).toBe(second);
      expect(registry.authenticateAsUser(first.id, first.userToken)).toBe(false);
    });
  });

  describe("authentication", () => {
    it("accepts each party only with its own token", () => {
      const registry = createRegistry();
      const session = registry.createSession("T1", "Alice", "Bob");

      expect(registry.authenticateAsUser(session.id, session.operatorToken)).toBe(false);
      expect(registry.authenticateAsOperator(session.id, session.userToken)).toBe(false);
      expect(session.userConnected).toBe(false);
      expect(session.operatorConnected).toBe(false);

      expect(registry.authenticateAsUser(session.id, session.userToken)).toBe(true);
      expect(session.userConnected).toBe(true);
      expect(session.operatorConnected).toBe(false);

      expect(registry.authenticateAsOperator(session.id, session.operatorToken)).toBe(true);
      expect(session.operatorConnected).toBe(true);
    });

    it("rejects unknown sessions", () => {
      const registry = createRegistry();
      expect(registry.authenticate("missing", "user", "token")).toBe(false);
      expect(registry.authenticate("", "operator", "token")).toBe(false);
    });

    it("counts rejected tokens", () => {
      const registry = createRegistry();
      const session = registry.createSession("T1", "Alice", "Bob");

      registry.authenticateAsUser(session.id, "wrong");
      registry.authenticateAsOperator(session.id, "wrong");

      expect(session.authFailures).toBe(2);
      expect(session.status).toBe("pending");
    });

    it("closes the session once the failure limit is reached", () => {
      const registry = createRegistry(3);
      const reasons: CloseReason[] = [];
      registry.onSessionClosed((_s, reason) => reasons.push(reason));
      const session = registry.createSession("T1", "Alice", "Bob");

      registry.authenticateAsUser(session.id, "wrong-1");
      registry.authenticateAsUser(session.id, "wrong-2");
      expect(registry.getSession(session.id)).toBe(session);

      registry.authenticateAsUser(session.id, "wrong-3");
      expect(reasons).toEqual(["auth_lockout"]);
      expect(registry.getSession(session.id)).toBeUndefined();
      expect(registry.getSessionByWorkItem("T1")).toBeUndefined();
      expect(registry.authenticateAsUser(session.id, session.userToken)).toBe(false);
    });

    it("never locks out when the limit is 0", () => {
      const registry = createRegistry(0);
      const session = registry.createSession("T1", "Alice", "Bob");

      for (let i = 0; i < 20; i++) {
        registry.authenticateAsOperator(session.id, "wrong");
      }

      expect(session.authFailures).toBe(20);
      expect(registry.authenticateAsOperator(session.id, session.operatorToken)).toBe(true);
    });
  });

  describe("activate", () => {
    it("requires both parties to be connected", () => {
      const registry = createRegistry();
      const session = registry.createSession("T1", "Alice", "Bob");

      expect(registry.activate(session.id)).toBe(false);
      registry.authenticateAsUser(session.id, session.userToken);
      expect(registry.activate(session.id)).toBe(false);
      expect(session.status).toBe("pending");

      registry.authenticateAsOperator(session.id, session.operatorToken);
      expect(registry.activate(session.id)).toBe(true);
      expect(session.status).toBe("active");
    });

    it("falls back to pending when a party disconnects", () => {
      const registry = createRegistry();
      const session = registry.createSession("T1", "Alice", "Bob");
      registry.authenticateAsUser(session.id, session.userToken);
      registry.authenticateAsOperator(session.id, session.operatorToken);
      registry.activate(session.id);

      registry.disconnectUser(session.id);

      expect(session.status).toBe("pending");
      expect(session.userConnected).toBe(false);
      expect(session.operatorConnected).toBe(true);
      expect(registry.activate(session.id)).toBe(false);

      // Re-join with the same token, then activate again
      expect(registry.authenticateAsUser(session.id, session.userToken)).toBe(true);
      expect(registry.activate(session.id)).toBe(true);
    });
  });

  describe("expiry", () => {
    it("treats a session as live up to and including its expiry instant", () => {
      const registry = createRegistry();
      const session = registry.createSession("T1", "Alice", "Bob");

      vi.setSystemTime(START.getTime() + TTL);
      expect(registry.getSession(session.id)).toBe(session);

      vi.setSystemTime(START.getTime() + TTL + 1);
      expect(registry.getSession(session.id)).toBeUndefined();
      expect(registry.getSessionByWorkItem("T1")).toBeUndefined();
      expect(registry.authenticateAsUser(session.id, session.userToken)).toBe(false);
    });

    it("does not extend the lifetime on activity", () => {
      const registry = createRegistry();
      const session = registry.createSession("T1", "Alice", "Bob");

      vi.setSystemTime(START.getTime() + 1_000);
      registry.recordActivity(session.id);

      expect(session.lastActivityAt).toBe(START.getTime() + 1_000);
      expect(session.expiresAt).toBe(START.getTime() + TTL);
    });

    it("sweeps expired sessions and reports them as expired", () => {
      const registry = createRegistry();
      const reasons: CloseReason[] = [];
      registry.onSessionClosed((_s, reason) => reasons.push(reason));
      registry.createSession("T1", "Alice", "Bob");
      registry.createSession("T2", "Carol", "Bob");

      vi.setSystemTime(START.getTime() + TTL + 1);
      const fresh = registry.createSession("T3", "Dave", "Bob");

      expect(registry.sweepExpired()).toBe(2);
      expect(reasons).toEqual(["expired", "expired"]);
      expect(registry.stats()).toEqual({
        total: 1,
        active: 0,
        pending: 1,
        closed: 0,
        workItems: 1,
      });
      expect(registry.getSessionByWorkItem("T3")).toBe(fresh);
    });

    it("keeps the newer work-item mapping when sweeping a replaced session", () => {
      const registry = createRegistry();
      registry.createSession("T1", "Alice", "Bob");
      const second = registry.createSession("T1", "Alice", "Bob");

      expect(registry.sweepExpired()).toBe(1);
      expect(registry.getSessionByWorkItem("T1")).toBe(second);
      expect(registry.stats().total).toBe(1);
    });
  });

  describe("closeSession", () => {
    it("closes once", () => {
      const registry = createRegistry();
      const session = registry.createSession("T1", "Alice", "Bob");

      expect(registry.closeSession(session.id)).toBe(true);
      expect(registry.closeSession(session.id)).toBe(false);
      expect(registry.closeSession("missing")).toBe(false);
      expect(session.status).toBe("closed");
      expect(registry.getSessionByWorkItem("T1")).toBeUndefined();
    });

    it("reports an expired session as expired and not found", () => {
      const registry = createRegistry();
      const reasons: CloseReason[] = [];
      registry.onSessionClosed((_s, reason) => reasons.push(reason));
      const session = registry.createSession("T1", "Alice", "Bob");

      vi.setSystemTime(START.getTime() + TTL + 1);

      expect(registry.closeSession(session.id)).toBe(false);
      expect(reasons).toEqual(["expired"]);
      expect(session.status).toBe("closed");
      expect(registry.closeSession(session.id)).toBe(false);
      expect(reasons).toEqual(["expired"]);
    });

    it("stops notifying after unsubscribe", () => {
      const registry = createRegistry();
      const listener = vi.fn();
      const unsubscribe = registry.onSessionClosed(listener);
      unsubscribe();

      registry.closeSession(registry.createSession("T1", "Alice", "Bob").id);

      expect(listener).not.toHaveBeenCalled();
    });
  });

  it("lists only active sessions", () => {
    const registry = createRegistry();
    const active = registry.createSession("T1", "Alice", "Bob");
    registry.createSession("T2", "Carol", "Bob");
    registry.authenticateAsUser(active.id, active.userToken);
    registry.authenticateAsOperator(active.id, active.operatorToken);
    registry.activate(active.id);

    expect(registry.getActiveSessions()).toEqual([active]);
    expect(registry.stats()).toEqual({
      total: 2,
      active: 1,
      pending: 1,
      closed: 0,
      workItems: 2,
    });
  });

  it("snapshots without tokens", () => {
    const registry = createRegistry();
    const session = registry.createSession("T1", "Alice", "Bob");

    expect(toSnapshot(session)).toEqual({
      sessionId: session.id,
      workItemId: "T1",
      userName: "Alice",
      operatorName: "Bob",
      createdAt: "2026-03-01T09:00:00.000Z",
      expiresAt: "2026-03-01T09:01:00.000Z",
      status: "pending",
      userConnected: false,
      operatorConnected: false,
      lastActivityAt: "2026-03-01T09:00:00.000Z",
    });
  });
});
