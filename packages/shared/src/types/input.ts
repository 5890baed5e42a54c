/**
 * Input injection types
 */

import { z } from "zod";

export const PointerButtonSchema = z.enum(["left", "right", "middle"]);
export type PointerButton = z.infer<typeof PointerButtonSchema>;

export const ClickKindSchema = z.enum(["single", "double", "down", "up"]);
export type ClickKind = z.infer<typeof ClickKindSchema>;

export const KeyActionKindSchema = z.enum(["press", "down", "up"]);
export type KeyActionKind = z.infer<typeof KeyActionKindSchema>;

export interface ScreenSize {
  width: number;
  height: number;
}

export interface PointerPosition {
  x: number;
  y: number;
}

export interface InputStats {
  screen: ScreenSize;
  authorizedConnections: number;
  pointer: PointerPosition | null;
}
