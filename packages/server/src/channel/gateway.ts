/**
 * Remote-control gateway - routes channel messages between connected parties
 * and the session, capture and input services.
 *
 * Transport agnostic: the WebSocket binding hands every connection over as a
 * ChannelPeer and forwards raw text frames to handleMessage().
 */

import type { Logger } from "pino";
import {
  ClientMessageSchema,
  type ChannelErrorCode,
  type ClientMessage,
  type CloseReason,
  type ConnectionId,
  type Frame,
  type PartyRole,
  type RemoteSession,
  type ServerEvent,
  type SessionId,
} from "@deskrelay/shared";
import { generateConnectionId } from "../services/crypto.js";
import type { FrameProducer } from "../services/frame-producer.js";
import type { InputAuthorizer } from "../services/input-authorizer.js";
import { toSnapshot, type SessionRegistry } from "../services/session-registry.js";

export interface ChannelPeer {
  send(event: ServerEvent): void;
}

export interface GatewayOptions {
  /** Push every captured frame to operators of active sessions */
  pushFrames: boolean;
}

interface Connection {
  id: ConnectionId;
  peer: ChannelPeer;
  sessionId: SessionId | null;
  role: PartyRole | null;
}

type InputMessage = Extract<
  ClientMessage,
  {
    type:
      | "pointer_move"
      | "pointer_button"
      | "pointer_scroll"
      | "key"
      | "key_combination"
      | "text_input";
  }
>;

export class RemoteControlGateway {
  private connections = new Map<ConnectionId, Connection>();
  private rooms = new Map<SessionId, Set<ConnectionId>>();
  private unsubscribers: Array<() => void> = [];

  constructor(
    private registry: SessionRegistry,
    private frames: FrameProducer,
    private input: InputAuthorizer,
    private log: Logger,
    options: GatewayOptions = { pushFrames: false }
  ) {
    this.unsubscribers.push(
      registry.onSessionClosed((session, reason) =>
        this.handleSessionClosed(session, reason)
      )
    );
    if (options.pushFrames) {
      this.unsubscribers.push(frames.onFrame((frame) => this.pushFrame(frame)));
    }
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  connect(peer: ChannelPeer): ConnectionId {
    const id = generateConnectionId();
    this.connections.set(id, { id, peer, sessionId: null, role: null });
    this.log.debug({ connectionId: id }, "Channel connected");
    return id;
  }

  async handleMessage(connectionId: ConnectionId, raw: string): Promise<void> {
    const conn = this.connections.get(connectionId);
    if (!conn) return;

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch {
      this.fail(conn, "invalid_message", "Message is not valid JSON");
      return;
    }

    const parsed = ClientMessageSchema.safeParse(payload);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      this.fail(
        conn,
        "invalid_message",
        issue ? `${issue.path.join(".") || "message"}: ${issue.message}` : "Invalid message"
      );
      return;
    }

    try {
      await this.dispatch(conn, parsed.data);
    } catch (err) {
      this.log.error({ err, connectionId, type: parsed.data.type }, "Channel handler failed");
      this.fail(conn, "internal", "Internal error");
    }
  }

  disconnect(connectionId: ConnectionId): void {
    const conn = this.connections.get(connectionId);
    if (!conn) return;

    this.leave(conn);
    this.connections.delete(connectionId);
    this.log.debug({ connectionId }, "Channel disconnected");
  }

  /**
   * Detach from the services and drop every connection. Used on shutdown.
   */
  close(): void {
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];
    for (const id of Array.from(this.connections.keys())) {
      this.disconnect(id);
    }
  }

  private async dispatch(conn: Connection, message: ClientMessage): Promise<void> {
    switch (message.type) {
      case "join_session":
        this.join(conn, message.sessionId, message.role, message.token);
        return;
      case "leave_session":
        this.leave(conn);
        return;
      case "activate":
        this.activate(conn);
        return;
      case "request_frame":
        this.requestFrame(conn);
        return;
      default:
        await this.applyInput(conn, message);
    }
  }

  private join(
    conn: Connection,
    sessionId: string,
    role: PartyRole,
    token: string
  ): void {
    if (!this.registry.getSession(sessionId)) {
      this.fail(conn, "not_found", "Session not found");
      return;
    }
    if (!this.registry.authenticate(sessionId, role, token)) {
      this.fail(conn, "auth_failed", "Authentication failed");
      return;
    }

    // The token check already marked the role connected; re-joining the same
    // seat must not undo that
    const session = this.registry.getSession(sessionId);
    if (!session) {
      this.fail(conn, "not_found", "Session not found");
      return;
    }
    if (conn.sessionId !== session.id || conn.role !== role) {
      this.leave(conn);
    }

    conn.sessionId = session.id;
    conn.role = role;
    this.roomOf(session.id).add(conn.id);

    if (role === "operator") {
      this.input.authorize(conn.id);
      this.frames.addReader(conn.id);
    }

    this.send(conn, { type: "session_joined", role, session: toSnapshot(session) });
    this.broadcast(session.id, {
      type: role === "user" ? "user_connected" : "operator_connected",
      sessionId: session.id,
    });
  }

  private leave(conn: Connection): void {
    const { sessionId, role } = conn;
    if (!sessionId || !role) return;

    conn.sessionId = null;
    conn.role = null;

    const room = this.rooms.get(sessionId);
    room?.delete(conn.id);
    if (room && room.size === 0) {
      this.rooms.delete(sessionId);
    }

    if (role === "operator") {
      this.frames.removeReader(conn.id);
      this.input.revoke(conn.id);
    }

    // Another connection may still hold the same seat
    if (!this.roleStillPresent(sessionId, role)) {
      this.registry.disconnect(sessionId, role);
    }

    this.broadcast(sessionId, {
      type: role === "user" ? "user_disconnected" : "operator_disconnected",
      sessionId,
    });
  }

  private activate(conn: Connection): void {
    if (!conn.sessionId) {
      this.fail(conn, "not_joined", "Join a session first");
      return;
    }
    if (!this.registry.activate(conn.sessionId)) {
      if (this.registry.getSession(conn.sessionId)) {
        this.fail(conn, "not_ready", "Both parties must be connected");
      } else {
        this.fail(conn, "not_found", "Session not found");
      }
      return;
    }

    const session = this.registry.getSession(conn.sessionId);
    if (session) {
      this.broadcast(session.id, {
        type: "session_activated",
        session: toSnapshot(session),
      });
    }
  }

  private requestFrame(conn: Connection): void {
    if (!this.requireActiveOperator(conn)) return;

    const frame = this.frames.latestFrame();
    if (frame) {
      this.send(conn, toFrameEvent(frame));
    }
  }

  private async applyInput(conn: Connection, message: InputMessage): Promise<void> {
    const session = this.requireActiveOperator(conn);
    if (!session) return;

    const ok = await this.performInput(conn.id, message);
    if (ok) {
      this.registry.recordActivity(session.id);
      return;
    }

    if (this.input.isAuthorized(conn.id)) {
      this.fail(conn, "input_failed", `Could not perform ${message.type}`);
    } else {
      this.fail(conn, "unauthorized", "Connection is not authorized for input");
    }
  }

  private performInput(connectionId: ConnectionId, message: InputMessage): Promise<boolean> {
    switch (message.type) {
      case "pointer_move":
        return this.input.pointerMove(
          connectionId,
          message.x,
          message.y,
          message.sourceWidth,
          message.sourceHeight
        );
      case "pointer_button":
        return this.input.pointerButton(
          connectionId,
          message.x,
          message.y,
          message.sourceWidth,
          message.sourceHeight,
          message.button,
          message.kind
        );
      case "pointer_scroll":
        return this.input.pointerScroll(
          connectionId,
          message.x,
          message.y,
          message.sourceWidth,
          message.sourceHeight,
          message.delta
        );
      case "key":
        return this.input.keyAction(connectionId, message.key, message.action);
      case "key_combination":
        return this.input.keyCombination(connectionId, message.keys);
      case "text_input":
        return this.input.textInput(connectionId, message.text);
    }
  }

  private requireActiveOperator(conn: Connection): Readonly<RemoteSession> | undefined {
    if (!conn.sessionId) {
      this.fail(conn, "not_joined", "Join a session first");
      return undefined;
    }
    if (conn.role !== "operator") {
      this.fail(conn, "unauthorized", "Only the operator may control the desktop");
      return undefined;
    }
    const session = this.registry.getSession(conn.sessionId);
    if (!session) {
      this.fail(conn, "not_found", "Session not found");
      return undefined;
    }
    if (session.status !== "active") {
      this.fail(conn, "not_active", "Session is not active");
      return undefined;
    }
    return session;
  }

  private handleSessionClosed(session: Readonly<RemoteSession>, reason: CloseReason): void {
    const room = this.rooms.get(session.id);
    if (!room) return;
    this.rooms.delete(session.id);

    for (const id of room) {
      const conn = this.connections.get(id);
      if (!conn) continue;

      if (conn.role === "operator") {
        this.frames.removeReader(conn.id);
        this.input.revoke(conn.id);
      }
      conn.sessionId = null;
      conn.role = null;
      this.send(conn, { type: "session_closed", sessionId: session.id, reason });
    }
  }

  private pushFrame(frame: Frame): void {
    let event: ServerEvent | null = null;

    for (const [sessionId, room] of this.rooms) {
      if (this.registry.getSession(sessionId)?.status !== "active") continue;

      for (const id of room) {
        const conn = this.connections.get(id);
        if (conn?.role !== "operator") continue;
        event ??= toFrameEvent(frame);
        this.send(conn, event);
      }
    }
  }

  private roleStillPresent(sessionId: SessionId, role: PartyRole): boolean {
    const room = this.rooms.get(sessionId);
    if (!room) return false;
    for (const id of room) {
      if (this.connections.get(id)?.role === role) return true;
    }
    return false;
  }

  private roomOf(sessionId: SessionId): Set<ConnectionId> {
    let room = this.rooms.get(sessionId);
    if (!room) {
      room = new Set();
      this.rooms.set(sessionId, room);
    }
    return room;
  }

  private broadcast(sessionId: SessionId, event: ServerEvent): void {
    const room = this.rooms.get(sessionId);
    if (!room) return;
    for (const id of room) {
      const conn = this.connections.get(id);
      if (conn) this.send(conn, event);
    }
  }

  private fail(conn: Connection, code: ChannelErrorCode, message: string): void {
    this.send(conn, { type: "error", code, message });
  }

  private send(conn: Connection, event: ServerEvent): void {
    try {
      conn.peer.send(event);
    } catch (err) {
      this.log.warn({ err, connectionId: conn.id, type: event.type }, "Failed to deliver event");
    }
  }
}

function toFrameEvent(frame: Frame): ServerEvent {
  return {
    type: "screen_frame",
    image: frame.data.toString("base64"),
    mimeType: frame.mimeType,
    width: frame.width,
    height: frame.height,
    capturedAt: frame.capturedAt,
  };
}
