/**
 * Channel messages exchanged over the WebSocket
 */

import { z } from "zod";
import {
  CloseReasonSchema,
  PartyRoleSchema,
  SessionSnapshotSchema,
} from "./session.js";
import {
  ClickKindSchema,
  KeyActionKindSchema,
  PointerButtonSchema,
} from "./input.js";

// Coordinates are expressed in the sender's viewport; the source size lets the
// receiving side rescale them to its own screen.
const pointerFields = {
  x: z.number().finite(),
  y: z.number().finite(),
  sourceWidth: z.number().finite().positive(),
  sourceHeight: z.number().finite().positive(),
};

/**
 * Party-to-server messages
 */
export const ClientMessageSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("join_session"),
    sessionId: z.string().min(1),
    token: z.string().min(1),
    role: PartyRoleSchema,
  }),
  z.object({ type: z.literal("leave_session") }),
  z.object({ type: z.literal("activate") }),
  z.object({ type: z.literal("request_frame") }),
  z.object({ type: z.literal("pointer_move"), ...pointerFields }),
  z.object({
    type: z.literal("pointer_button"),
    ...pointerFields,
    button: PointerButtonSchema.default("left"),
    kind: ClickKindSchema.default("single"),
  }),
  z.object({
    type: z.literal("pointer_scroll"),
    ...pointerFields,
    delta: z.number().finite(),
  }),
  z.object({
    type: z.literal("key"),
    key: z.string().min(1),
    action: KeyActionKindSchema.default("press"),
  }),
  z.object({
    type: z.literal("key_combination"),
    keys: z.array(z.string().min(1)).min(1),
  }),
  z.object({ type: z.literal("text_input"), text: z.string() }),
]);

/** Parsed form, defaults applied */
export type ClientMessage = z.infer<typeof ClientMessageSchema>;
/** What a sender may put on the wire */
export type ClientMessageInput = z.input<typeof ClientMessageSchema>;

export const ChannelErrorCodeSchema = z.enum([
  "invalid_message",
  "not_found",
  "auth_failed",
  "not_joined",
  "unauthorized",
  "not_active",
  "not_ready",
  "input_failed",
  "internal",
]);
export type ChannelErrorCode = z.infer<typeof ChannelErrorCodeSchema>;

/**
 * Server-to-party events
 */
export const ServerEventSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("session_joined"),
    role: PartyRoleSchema,
    session: SessionSnapshotSchema,
  }),
  z.object({ type: z.literal("user_connected"), sessionId: z.string() }),
  z.object({ type: z.literal("operator_connected"), sessionId: z.string() }),
  z.object({ type: z.literal("user_disconnected"), sessionId: z.string() }),
  z.object({ type: z.literal("operator_disconnected"), sessionId: z.string() }),
  z.object({
    type: z.literal("session_activated"),
    session: SessionSnapshotSchema,
  }),
  z.object({
    type: z.literal("session_closed"),
    sessionId: z.string(),
    reason: CloseReasonSchema,
  }),
  z.object({
    type: z.literal("screen_frame"),
    image: z.string(), // base64
    mimeType: z.literal("image/jpeg"),
    width: z.number(),
    height: z.number(),
    capturedAt: z.number(),
  }),
  z.object({
    type: z.literal("error"),
    code: ChannelErrorCodeSchema,
    message: z.string(),
  }),
]);
export type ServerEvent = z.infer<typeof ServerEventSchema>;
export type ServerEventType = ServerEvent["type"];
