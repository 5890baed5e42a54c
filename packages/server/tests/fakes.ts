import type {
  ClickKind,
  KeyActionKind,
  PointerButton,
  ScreenSize,
  ServerEvent,
  ServerEventType,
} from "@deskrelay/shared";
import type { RawScreenImage, ScreenSource } from "../src/capture/screen-source.js";
import type { EncodedImage, EncodeOptions, FrameEncoder } from "../src/capture/encoder.js";
import type { InputDevice } from "../src/input/device.js";
import type { ChannelPeer } from "../src/channel/gateway.js";

export class FakeScreenSource implements ScreenSource {
  grabs = 0;
  failWith: Error | null = null;

  async grab(): Promise<RawScreenImage> {
    if (this.failWith) throw this.failWith;
    this.grabs++;
    return { data: Buffer.alloc(4 * 2 * 3, this.grabs), width: 4, height: 2, channels: 3 };
  }
}

/** Encodes each capture as a one-byte buffer holding the grab counter */
export class FakeEncoder implements FrameEncoder {
  calls: EncodeOptions[] = [];

  async encode(image: RawScreenImage, options: EncodeOptions): Promise<EncodedImage> {
    this.calls.push(options);
    return { data: Buffer.from([image.data[0]]), width: image.width, height: image.height };
  }
}

export type DeviceCall =
  | { op: "moveTo"; x: number; y: number }
  | { op: "click"; x: number; y: number; button: PointerButton; kind: ClickKind }
  | { op: "scroll"; x: number; y: number; delta: number }
  | { op: "key"; key: string; action: KeyActionKind }
  | { op: "chord"; keys: string[] }
  | { op: "type"; text: string };

export class FakeInputDevice implements InputDevice {
  calls: DeviceCall[] = [];
  failNext: Error | null = null;
  unavailable = false;

  constructor(private size: ScreenSize = { width: 1920, height: 1080 }) {}

  async screenSize(): Promise<ScreenSize> {
    if (this.unavailable) throw new Error("no display");
    return this.size;
  }

  async moveTo(x: number, y: number): Promise<void> {
    this.record({ op: "moveTo", x, y });
  }

  async click(x: number, y: number, button: PointerButton, kind: ClickKind): Promise<void> {
    this.record({ op: "click", x, y, button, kind });
  }

  async scroll(x: number, y: number, delta: number): Promise<void> {
    this.record({ op: "scroll", x, y, delta });
  }

  async key(key: string, action: KeyActionKind): Promise<void> {
    this.record({ op: "key", key, action });
  }

  async chord(keys: string[]): Promise<void> {
    this.record({ op: "chord", keys });
  }

  async type(text: string): Promise<void> {
    this.record({ op: "type", text });
  }

  private record(call: DeviceCall): void {
    const failure = this.failNext;
    if (failure) {
      this.failNext = null;
      throw failure;
    }
    this.calls.push(call);
  }
}

export class RecordingPeer implements ChannelPeer {
  events: ServerEvent[] = [];

  send(event: ServerEvent): void {
    this.events.push(event);
  }

  types(): ServerEventType[] {
    return this.events.map((e) => e.type);
  }

  last(): ServerEvent | undefined {
    return this.events[this.events.length - 1];
  }

  clear(): void {
    this.events = [];
  }
}
