/**
 * Screen frame types
 */

export interface Frame {
  readonly data: Buffer;
  readonly mimeType: "image/jpeg";
  readonly width: number;
  readonly height: number;
  /** Epoch milliseconds, monotonic across frames */
  readonly capturedAt: number;
}

export interface CaptureStats {
  running: boolean;
  halted: boolean;
  clients: number;
  fps: number;
  quality: number;
  maxWidth: number;
  framesCaptured: number;
  failedCycles: number;
  lastCaptureAt: number | null;
}
