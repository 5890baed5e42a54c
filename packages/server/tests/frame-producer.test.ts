import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import pino from "pino";
import type { Frame } from "@deskrelay/shared";
import { FrameProducer } from "../src/services/frame-producer.js";
import { CaptureUnavailableError } from "../src/capture/screen-source.js";
import { FakeEncoder, FakeScreenSource } from "./fakes.js";

const log = pino({ level: "silent" });

describe("FrameProducer", () => {
  let source: FakeScreenSource;
  let encoder: FakeEncoder;
  let producer: FrameProducer;

  beforeEach(() => {
    source = new FakeScreenSource();
    encoder = new FakeEncoder();
    producer = new FrameProducer(source, encoder, { fps: 50, quality: 60, maxWidth: 800 }, log);
  });

  afterEach(async () => {
    await producer.stop();
  });

  it("does not capture without readers", async () => {
    await new Promise((resolve) => setTimeout(resolve, 50));

    expect(source.grabs).toBe(0);
    expect(producer.latestFrame()).toBeUndefined();
    expect(producer.getStats()).toMatchObject({ running: false, clients: 0, framesCaptured: 0 });
  });

  it("captures while a reader is subscribed", async () => {
    producer.addReader("conn-1");
    expect(producer.isRunning).toBe(true);

    await vi.waitFor(() => expect(producer.getStats().framesCaptured).toBeGreaterThanOrEqual(2));

    const frame = producer.latestFrame();
    expect(frame).toMatchObject({ mimeType: "image/jpeg", width: 4, height: 2 });
    expect(encoder.calls[0]).toEqual({ quality: 60, maxWidth: 800 });
  });

  it("notifies frame listeners with non-decreasing timestamps", async () => {
    const seen: Frame[] = [];
    const unsubscribe = producer.onFrame((frame) => seen.push(frame));
    producer.addReader("conn-1");

    await vi.waitFor(() => expect(seen.length).toBeGreaterThanOrEqual(3));
    unsubscribe();

    for (let i = 1; i < seen.length; i++) {
      expect(seen[i].capturedAt).toBeGreaterThanOrEqual(seen[i - 1].capturedAt);
    }
  });

  it("hands out copies of the latest frame", async () => {
    producer.addReader("conn-1");
    await vi.waitFor(() => expect(producer.latestFrame()).toBeDefined());
    producer.removeReader("conn-1");
    await producer.stop();

    const first = producer.latestFrame();
    const second = producer.latestFrame();
    expect(first).toBeDefined();
    expect(second).toBeDefined();
    if (!first || !second) return;

    const original = second.data[0];
    first.data[0] = 255;
    expect(second.data[0]).toBe(original);
    expect(producer.latestFrame()?.data[0]).toBe(original);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it("gives listeners their own copy of each frame", async () => {
    const seen: Frame[] = [];
    producer.onFrame((frame) => {
      frame.data.fill(0xff);
      seen.push(frame);
    });
    producer.addReader("conn-1");
    await vi.waitFor(() => expect(seen.length).toBeGreaterThanOrEqual(1));
    producer.removeReader("conn-1");
    await producer.stop();

    const latest = producer.latestFrame();
    expect(latest?.data[0]).toBeGreaterThan(0);
    expect(latest?.data[0]).toBeLessThan(0xff);
  });

  it("stops once the last reader leaves", async () => {
    producer.addReader("conn-1");
    producer.addReader("conn-2");
    await vi.waitFor(() => expect(source.grabs).toBeGreaterThan(0));

    producer.removeReader("conn-1");
    expect(producer.isRunning).toBe(true);

    producer.removeReader("conn-2");
    expect(producer.isRunning).toBe(false);
    await producer.stop();

    const grabs = source.grabs;
    await new Promise((resolve) => setTimeout(resolve, 60));
    expect(source.grabs).toBe(grabs);
    expect(producer.readerCount).toBe(0);
  });

  it("restarts when a reader returns", async () => {
    producer.addReader("conn-1");
    await vi.waitFor(() => expect(source.grabs).toBeGreaterThan(0));
    producer.removeReader("conn-1");
    await producer.stop();
    const grabs = source.grabs;

    producer.addReader("conn-2");
    await vi.waitFor(() => expect(source.grabs).toBeGreaterThan(grabs));
  });

  it("keeps the previous frame when a capture fails", async () => {
    producer.addReader("conn-1");
    await vi.waitFor(() => expect(producer.latestFrame()).toBeDefined());

    source.failWith = new Error("grab failed");
    const before = producer.getStats().framesCaptured;
    await vi.waitFor(() => expect(producer.getStats().failedCycles).toBeGreaterThanOrEqual(2));

    expect(producer.isRunning).toBe(true);
    expect(producer.getStats().framesCaptured).toBe(before);
    expect(producer.latestFrame()?.data[0]).toBe(before);
  });

  it("halts when the capture device is unavailable", async () => {
    source.failWith = new CaptureUnavailableError("no display");
    producer.addReader("conn-1");

    await vi.waitFor(() => expect(producer.getStats().halted).toBe(true));
    expect(producer.isRunning).toBe(false);
    expect(producer.getStats().failedCycles).toBe(0);
  });

  it("isolates a failing frame listener", async () => {
    producer.onFrame(() => {
      throw new Error("listener failed");
    });
    producer.addReader("conn-1");

    await vi.waitFor(() => expect(producer.getStats().framesCaptured).toBeGreaterThanOrEqual(2));
    expect(producer.getStats().failedCycles).toBe(0);
  });
});
