/**
 * Input authorizer - gates and dispatches remote mouse/keyboard input
 *
 * Knows nothing about sessions: a connection id is the capability. Every
 * action first checks membership and answers false without touching the
 * device when the connection is not authorized. Authorized actions share one
 * exclusion region because the physical input devices are a single resource.
 */

import type { Logger } from "pino";
import type {
  ClickKind,
  InputStats,
  KeyActionKind,
  PointerButton,
  PointerPosition,
  ScreenSize,
} from "@deskrelay/shared";
import type { InputDevice } from "../input/device.js";
import { normalizeChordKey, normalizeKey } from "../input/keys.js";

/**
 * Scale a coordinate from the sender's viewport to the local screen and clamp
 * it to [0, localDim - 1].
 */
export function scaleCoordinate(
  value: number,
  sourceDim: number,
  localDim: number
): number {
  const actual = Math.round((value / sourceDim) * localDim);
  return Math.max(0, Math.min(actual, localDim - 1));
}

export class InputAuthorizer {
  private authorized = new Set<string>();
  private screen: ScreenSize | null = null;
  private lastPointer: PointerPosition | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private device: InputDevice,
    private log: Logger
  ) {}

  /**
   * Read the local screen size. When the device is unusable input stays
   * disabled: every action reports failure, the rest of the server keeps
   * running.
   */
  async initialize(): Promise<void> {
    try {
      this.screen = await this.device.screenSize();
      this.log.info(this.screen, "Input handler initialized");
    } catch (err) {
      this.screen = null;
      this.log.error({ err }, "Input device unavailable, remote input disabled");
    }
  }

  authorize(connectionId: string): void {
    this.authorized.add(connectionId);
    this.log.info({ connectionId }, "Connection authorized for remote input");
  }

  revoke(connectionId: string): void {
    if (this.authorized.delete(connectionId)) {
      this.log.info({ connectionId }, "Remote input authorization revoked");
    }
  }

  isAuthorized(connectionId: string): boolean {
    return this.authorized.has(connectionId);
  }

  pointerMove(
    connectionId: string,
    x: number,
    y: number,
    sourceWidth: number,
    sourceHeight: number
  ): Promise<boolean> {
    return this.perform(connectionId, "pointer move", async (screen) => {
      const target = this.remap(screen, x, y, sourceWidth, sourceHeight);
      await this.device.moveTo(target.x, target.y);
      this.lastPointer = target;
    });
  }

  pointerButton(
    connectionId: string,
    x: number,
    y: number,
    sourceWidth: number,
    sourceHeight: number,
    button: PointerButton = "left",
    kind: ClickKind = "single"
  ): Promise<boolean> {
    return this.perform(connectionId, "pointer button", async (screen) => {
      const target = this.remap(screen, x, y, sourceWidth, sourceHeight);
      await this.device.click(target.x, target.y, button, kind);
      this.lastPointer = target;
      this.log.debug({ ...target, button, kind }, "Pointer button");
    });
  }

  pointerScroll(
    connectionId: string,
    x: number,
    y: number,
    sourceWidth: number,
    sourceHeight: number,
    delta: number
  ): Promise<boolean> {
    return this.perform(connectionId, "pointer scroll", async (screen) => {
      const target = this.remap(screen, x, y, sourceWidth, sourceHeight);
      await this.device.scroll(target.x, target.y, Math.trunc(delta));
      this.lastPointer = target;
    });
  }

  keyAction(
    connectionId: string,
    key: string,
    action: KeyActionKind = "press"
  ): Promise<boolean> {
    return this.perform(connectionId, "key action", async () => {
      const actualKey = normalizeKey(key);
      await this.device.key(actualKey, action);
      this.log.debug({ key: actualKey, action }, "Key action");
    });
  }

  keyCombination(connectionId: string, keys: string[]): Promise<boolean> {
    return this.perform(connectionId, "key combination", async () => {
      if (keys.length === 0) {
        throw new Error("Empty key combination");
      }
      const chord = keys.map(normalizeChordKey);
      await this.device.chord(chord);
      this.log.debug({ keys: chord.join(" + ") }, "Key combination");
    });
  }

  textInput(connectionId: string, text: string): Promise<boolean> {
    return this.perform(connectionId, "text input", async () => {
      await this.device.type(text);
      this.log.debug(
        { text: text.length > 50 ? `${text.slice(0, 50)}...` : text },
        "Text input"
      );
    });
  }

  getStats(): InputStats {
    return {
      screen: this.screen ?? { width: 0, height: 0 },
      authorizedConnections: this.authorized.size,
      pointer: this.lastPointer,
    };
  }

  private remap(
    screen: ScreenSize,
    x: number,
    y: number,
    sourceWidth: number,
    sourceHeight: number
  ): PointerPosition {
    if (!isPositive(sourceWidth) || !isPositive(sourceHeight)) {
      throw new Error(
        `Invalid source dimensions ${sourceWidth}x${sourceHeight}`
      );
    }
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      throw new Error(`Invalid coordinates (${x}, ${y})`);
    }
    return {
      x: scaleCoordinate(x, sourceWidth, screen.width),
      y: scaleCoordinate(y, sourceHeight, screen.height),
    };
  }

  /**
   * Authorization check, then the action inside the exclusion region. Any
   * failure is logged and reported as false so the channel stays usable for
   * the next event.
   */
  private async perform(
    connectionId: string,
    label: string,
    action: (screen: ScreenSize) => Promise<void>
  ): Promise<boolean> {
    if (!this.isAuthorized(connectionId)) {
      this.log.warn({ connectionId, action: label }, "Unauthorized input rejected");
      return false;
    }

    return this.exclusive(async () => {
      const screen = this.screen;
      if (!screen) {
        this.log.error({ action: label }, "Input device unavailable");
        return false;
      }
      try {
        await action(screen);
        return true;
      } catch (err) {
        this.log.error({ err, connectionId }, `${capitalize(label)} error`);
        return false;
      }
    });
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // The caller observes a rejection through `run`; the chain must not break
    this.queue = run.catch(() => undefined);
    return run;
  }
}

function isPositive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
