/**
 * Frame producer - captures the screen on a fixed cadence while anyone is
 * watching and keeps only the most recent encoded frame.
 *
 * The buffer is a single slot: slow readers miss intermediate frames instead
 * of queueing them.
 */

import type { Logger } from "pino";
import type { CaptureStats, Frame } from "@deskrelay/shared";
import {
  CaptureUnavailableError,
  type ScreenSource,
} from "../capture/screen-source.js";
import type { FrameEncoder } from "../capture/encoder.js";

export interface FrameProducerOptions {
  fps: number;
  quality: number;
  maxWidth: number;
}

export type FrameListener = (frame: Frame) => void;

export class FrameProducer {
  private readers = new Set<string>();
  private listeners = new Set<FrameListener>();
  private frame: Frame | null = null;

  private running = false;
  private halted = false;
  private loop: Promise<void> | null = null;
  private wake: (() => void) | null = null;

  // Metrics
  private framesCaptured = 0;
  private failedCycles = 0;

  constructor(
    private source: ScreenSource,
    private encoder: FrameEncoder,
    private options: FrameProducerOptions,
    private log: Logger
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  get readerCount(): number {
    return this.readers.size;
  }

  addReader(readerId: string): void {
    this.readers.add(readerId);
    this.log.info(
      { readerId, readers: this.readers.size },
      "Frame reader added"
    );

    if (!this.running) {
      this.start();
    }
  }

  /**
   * The loop stops after the last reader leaves; a cycle already in flight
   * still completes.
   */
  removeReader(readerId: string): void {
    if (!this.readers.delete(readerId)) return;
    this.log.info(
      { readerId, readers: this.readers.size },
      "Frame reader removed"
    );

    if (this.readers.size === 0 && this.running) {
      this.running = false;
      this.wake?.();
      this.log.info("Screen capture stopped");
    }
  }

  /**
   * Copy of the most recent successful capture, or undefined before the first
   * one completes.
   */
  latestFrame(): Frame | undefined {
    return this.frame ? this.copyFrame(this.frame) : undefined;
  }

  /**
   * @returns a function that removes the listener
   */
  onFrame(listener: FrameListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Stop capturing regardless of readers and wait for the loop to exit
   */
  async stop(): Promise<void> {
    this.running = false;
    this.wake?.();
    if (this.loop) {
      await this.loop;
    }
  }

  getStats(): CaptureStats {
    return {
      running: this.running,
      halted: this.halted,
      clients: this.readers.size,
      fps: this.options.fps,
      quality: this.options.quality,
      maxWidth: this.options.maxWidth,
      framesCaptured: this.framesCaptured,
      failedCycles: this.failedCycles,
      lastCaptureAt: this.frame?.capturedAt ?? null,
    };
  }

  private start(): void {
    this.running = true;
    this.halted = false;
    if (!this.loop) {
      this.spawnLoop();
    }
    this.log.info(
      { fps: this.options.fps, quality: this.options.quality },
      "Screen capture started"
    );
  }

  private spawnLoop(): void {
    const loop = this.captureLoop().finally(() => {
      if (this.loop === loop) this.loop = null;
      // A reader may have subscribed while the previous loop was winding down
      if (this.running && !this.loop) this.spawnLoop();
    });
    this.loop = loop;
  }

  private async captureLoop(): Promise<void> {
    const frameTime = 1000 / this.options.fps;

    while (this.running) {
      const startTime = Date.now();

      try {
        await this.captureCycle();
      } catch (err) {
        if (err instanceof CaptureUnavailableError) {
          this.log.error({ err }, "Capture device unavailable, capture halted");
          this.running = false;
          this.halted = true;
          return;
        }
        this.failedCycles++;
        this.log.error({ err }, "Screen capture error");
      }

      if (!this.running) return;

      // Sleep only the remainder so cadence holds while capture time varies
      const elapsed = Date.now() - startTime;
      await this.pause(Math.max(0, frameTime - elapsed));
    }
  }

  private async captureCycle(): Promise<void> {
    const raw = await this.source.grab();
    const encoded = await this.encoder.encode(raw, {
      quality: this.options.quality,
      maxWidth: this.options.maxWidth,
    });

    const frame: Frame = {
      data: encoded.data,
      mimeType: "image/jpeg",
      width: encoded.width,
      height: encoded.height,
      capturedAt: Math.max(Date.now(), this.frame?.capturedAt ?? 0),
    };
    this.frame = Object.freeze(frame);
    this.framesCaptured++;

    for (const listener of this.listeners) {
      try {
        listener(this.copyFrame(frame));
      } catch (err) {
        this.log.error({ err }, "Frame listener failed");
      }
    }
  }

  private copyFrame(frame: Frame): Frame {
    return Object.freeze({ ...frame, data: Buffer.from(frame.data) });
  }

  private pause(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}
