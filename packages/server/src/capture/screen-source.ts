/**
 * Screen sources - where raw pixels come from
 */

export interface RawScreenImage {
  data: Buffer;
  width: number;
  height: number;
  channels: 3 | 4;
}

export interface ScreenSource {
  grab(): Promise<RawScreenImage>;
}

/**
 * The capture device cannot be used at all (no display, missing native
 * bindings). Unlike an ordinary failed grab this stops the capture loop.
 */
export class CaptureUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CaptureUnavailableError";
  }
}

type NutModule = typeof import("@nut-tree-fork/nut-js");

/**
 * Desktop capture through nut.js. The native bindings are loaded on first
 * grab, so headless hosts only pay for them when a reader subscribes.
 */
export class NutScreenSource implements ScreenSource {
  private nut: NutModule | null = null;

  async grab(): Promise<RawScreenImage> {
    const { screen } = await this.load();
    const image = await (await screen.grab()).toRGB();

    const channels = image.channels;
    if (channels !== 3 && channels !== 4) {
      throw new Error(`Unsupported channel count from screen grab: ${channels}`);
    }

    return {
      data: image.data,
      width: image.width,
      height: image.height,
      channels,
    };
  }

  private async load(): Promise<NutModule> {
    if (this.nut) return this.nut;
    try {
      this.nut = await import("@nut-tree-fork/nut-js");
      return this.nut;
    } catch (err) {
      throw new CaptureUnavailableError("Screen capture bindings unavailable", {
        cause: err,
      });
    }
  }
}
