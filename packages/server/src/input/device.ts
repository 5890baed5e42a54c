/**
 * Input devices - the machine-level side of input injection
 *
 * Key names reaching a device are already normalized (see keys.ts):
 * lower-case names such as "enter", "left", "f5", "ctrl", or single characters.
 */

import type {
  ClickKind,
  KeyActionKind,
  PointerButton,
  ScreenSize,
} from "@deskrelay/shared";

export interface InputDevice {
  screenSize(): Promise<ScreenSize>;
  moveTo(x: number, y: number): Promise<void>;
  click(x: number, y: number, button: PointerButton, kind: ClickKind): Promise<void>;
  /** Positive delta scrolls up */
  scroll(x: number, y: number, delta: number): Promise<void>;
  key(key: string, action: KeyActionKind): Promise<void>;
  /** Press all keys together, release in reverse order */
  chord(keys: string[]): Promise<void>;
  type(text: string): Promise<void>;
}
