/**
 * Frame encoding - downscale and compress raw captures
 */

import sharp from "sharp";
import type { RawScreenImage } from "./screen-source.js";

export interface EncodeOptions {
  /** JPEG quality, 1-100 */
  quality: number;
  /** Wider captures are scaled down to this width, keeping aspect ratio */
  maxWidth: number;
}

export interface EncodedImage {
  data: Buffer;
  width: number;
  height: number;
}

export interface FrameEncoder {
  encode(image: RawScreenImage, options: EncodeOptions): Promise<EncodedImage>;
}

export class SharpFrameEncoder implements FrameEncoder {
  async encode(
    image: RawScreenImage,
    options: EncodeOptions
  ): Promise<EncodedImage> {
    let pipeline = sharp(image.data, {
      raw: {
        width: image.width,
        height: image.height,
        channels: image.channels,
      },
    });

    if (image.width > options.maxWidth) {
      pipeline = pipeline.resize({ width: options.maxWidth });
    }

    const { data, info } = await pipeline
      .jpeg({ quality: options.quality })
      .toBuffer({ resolveWithObject: true });

    return { data, width: info.width, height: info.height };
  }
}
