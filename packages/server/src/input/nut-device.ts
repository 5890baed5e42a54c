/**
 * nut.js-backed input device
 */

import type { Key as NutKey } from "@nut-tree-fork/nut-js";
import type {
  ClickKind,
  KeyActionKind,
  PointerButton,
  ScreenSize,
} from "@deskrelay/shared";
import type { InputDevice } from "./device.js";

type NutModule = typeof import("@nut-tree-fork/nut-js");

// Normalized names whose nut.js enum member is spelled differently
const KEY_ALIASES: Readonly<Record<string, string>> = {
  esc: "escape",
  ctrl: "leftcontrol",
  alt: "leftalt",
  shift: "leftshift",
  win: "leftsuper",
  "0": "num0",
  "1": "num1",
  "2": "num2",
  "3": "num3",
  "4": "num4",
  "5": "num5",
  "6": "num6",
  "7": "num7",
  "8": "num8",
  "9": "num9",
  "-": "minus",
  "=": "equal",
  ",": "comma",
  ".": "period",
  "/": "slash",
  ";": "semicolon",
  "'": "quote",
  "[": "leftbracket",
  "]": "rightbracket",
  "\\": "backslash",
  "`": "grave",
};

export interface NutInputDeviceOptions {
  typingDelayMs: number;
}

export class NutInputDevice implements InputDevice {
  private nut: NutModule | null = null;
  private keys = new Map<string, NutKey>();

  constructor(private options: NutInputDeviceOptions) {}

  async screenSize(): Promise<ScreenSize> {
    const { screen } = await this.load();
    return { width: await screen.width(), height: await screen.height() };
  }

  async moveTo(x: number, y: number): Promise<void> {
    const { mouse, Point } = await this.load();
    await mouse.setPosition(new Point(x, y));
  }

  async click(
    x: number,
    y: number,
    button: PointerButton,
    kind: ClickKind
  ): Promise<void> {
    const { mouse, Point, Button } = await this.load();
    const target =
      button === "right"
        ? Button.RIGHT
        : button === "middle"
          ? Button.MIDDLE
          : Button.LEFT;

    await mouse.setPosition(new Point(x, y));
    switch (kind) {
      case "single":
        await mouse.click(target);
        break;
      case "double":
        await mouse.doubleClick(target);
        break;
      case "down":
        await mouse.pressButton(target);
        break;
      case "up":
        await mouse.releaseButton(target);
        break;
    }
  }

  async scroll(x: number, y: number, delta: number): Promise<void> {
    const { mouse, Point } = await this.load();
    await mouse.setPosition(new Point(x, y));
    if (delta > 0) {
      await mouse.scrollUp(delta);
    } else if (delta < 0) {
      await mouse.scrollDown(-delta);
    }
  }

  async key(key: string, action: KeyActionKind): Promise<void> {
    const { keyboard } = await this.load();
    const resolved = this.keys.get(KEY_ALIASES[key] ?? key);

    if (resolved === undefined) {
      // Printable characters without a key of their own can still be typed
      if (action === "press" && [...key].length === 1) {
        await keyboard.type(key);
        return;
      }
      throw new Error(`Unsupported key: ${key}`);
    }

    switch (action) {
      case "press":
        await keyboard.pressKey(resolved);
        await keyboard.releaseKey(resolved);
        break;
      case "down":
        await keyboard.pressKey(resolved);
        break;
      case "up":
        await keyboard.releaseKey(resolved);
        break;
    }
  }

  async chord(keys: string[]): Promise<void> {
    const { keyboard } = await this.load();
    const resolved = keys.map((key) => {
      const found = this.keys.get(KEY_ALIASES[key] ?? key);
      if (found === undefined) {
        throw new Error(`Unsupported key in combination: ${key}`);
      }
      return found;
    });

    await keyboard.pressKey(...resolved);
    await keyboard.releaseKey(...[...resolved].reverse());
  }

  async type(text: string): Promise<void> {
    const { keyboard } = await this.load();
    await keyboard.type(text);
  }

  private async load(): Promise<NutModule> {
    if (this.nut) return this.nut;

    const nut = await import("@nut-tree-fork/nut-js");
    nut.keyboard.config.autoDelayMs = this.options.typingDelayMs;
    nut.mouse.config.autoDelayMs = 0;

    for (const [name, value] of Object.entries(nut.Key)) {
      if (typeof value === "number") {
        this.keys.set(name.toLowerCase(), value);
      }
    }

    this.nut = nut;
    return nut;
  }
}
