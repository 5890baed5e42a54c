/**
 * Configuration types - deskrelay.config.json
 */

import { z } from "zod";

export const SessionConfigSchema = z.object({
  ttlMs: z.number().int().positive().default(2 * 60 * 60 * 1000), // 2 hours
  sweepIntervalMs: z.number().int().positive().default(5 * 60 * 1000), // 5 minutes
  // 0 disables the lockout
  maxAuthFailures: z.number().int().min(0).default(5),
});
export type SessionConfig = z.infer<typeof SessionConfigSchema>;

export const CaptureConfigSchema = z.object({
  fps: z.number().positive().max(60).default(15),
  quality: z.number().int().min(1).max(100).default(70),
  maxWidth: z.number().int().positive().default(1920),
  pushFrames: z.boolean().default(false),
});
export type CaptureConfig = z.infer<typeof CaptureConfigSchema>;

export const InputConfigSchema = z.object({
  typingDelayMs: z.number().int().min(0).default(10),
});
export type InputConfig = z.infer<typeof InputConfigSchema>;

export const DeskRelayConfigSchema = z.object({
  session: SessionConfigSchema.default({}),
  capture: CaptureConfigSchema.default({}),
  input: InputConfigSchema.default({}),
  staffTokenTtl: z.string().min(1).default("8h"),
  signingKeyPath: z.string().min(1).default(".deskrelay/keys/"),
});
export type DeskRelayConfig = z.infer<typeof DeskRelayConfigSchema>;
export type DeskRelayConfigInput = z.input<typeof DeskRelayConfigSchema>;

export const DEFAULT_CONFIG: DeskRelayConfig = DeskRelayConfigSchema.parse({});
