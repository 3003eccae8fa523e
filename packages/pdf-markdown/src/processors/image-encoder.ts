import { PNG } from 'pngjs';

import { RAW_IMAGE_KIND } from '../config/constants';

/**
 * Decoded pixels of a PDF image as pdf.js delivers them
 */
export interface RawImage {
  width: number;
  height: number;
  /** One of {@link RAW_IMAGE_KIND} */
  kind: number;
  data: Uint8Array | Uint8ClampedArray;
}

/**
 * Narrow a pdf.js image object to {@link RawImage}.
 *
 * Returns null for objects without pixel data, such as images pdf.js
 * decoded straight to a bitmap.
 */
export function toRawImage(value: unknown): RawImage | null {
  if (typeof value !== 'object' || value === null) return null;
  if (!('width' in value) || !('height' in value) || !('data' in value)) {
    return null;
  }

  const { width, height, data } = value;
  const kind = 'kind' in value ? value.kind : undefined;
  if (
    typeof width !== 'number' ||
    typeof height !== 'number' ||
    typeof kind !== 'number' ||
    width <= 0 ||
    height <= 0
  ) {
    return null;
  }
  if (!(data instanceof Uint8Array) && !(data instanceof Uint8ClampedArray)) {
    return null;
  }

  return { width, height, kind, data };
}

/**
 * ImageEncoder
 *
 * Encodes raw PDF image pixels as PNG with pngjs. Output is always RGBA.
 */
export class ImageEncoder {
  /**
   * @throws RangeError when the kind is unknown or the buffer is shorter
   * than the dimensions require
   */
  static toPng(image: RawImage): Buffer {
    const png = new PNG({ width: image.width, height: image.height });
    ImageEncoder.fillRgba(image, png.data);
    return PNG.sync.write(png);
  }

  private static fillRgba(image: RawImage, target: Buffer): void {
    const { width, height, kind, data } = image;
    const pixelCount = width * height;

    switch (kind) {
      case RAW_IMAGE_KIND.GRAYSCALE_1BPP: {
        const rowBytes = (width + 7) >> 3;
        ImageEncoder.assertLength(data, rowBytes * height, kind);
        for (let y = 0; y < height; y++) {
          for (let x = 0; x < width; x++) {
            const bit = data[y * rowBytes + (x >> 3)] & (0x80 >> (x & 7));
            const value = bit ? 255 : 0;
            const offset = (y * width + x) * 4;
            target[offset] = value;
            target[offset + 1] = value;
            target[offset + 2] = value;
            target[offset + 3] = 255;
          }
        }
        return;
      }
      case RAW_IMAGE_KIND.RGB_24BPP: {
        ImageEncoder.assertLength(data, pixelCount * 3, kind);
        for (let i = 0; i < pixelCount; i++) {
          target[i * 4] = data[i * 3];
          target[i * 4 + 1] = data[i * 3 + 1];
          target[i * 4 + 2] = data[i * 3 + 2];
          target[i * 4 + 3] = 255;
        }
        return;
      }
      case RAW_IMAGE_KIND.RGBA_32BPP: {
        ImageEncoder.assertLength(data, pixelCount * 4, kind);
        target.set(data.subarray(0, pixelCount * 4));
        return;
      }
      default:
        throw new RangeError(`Unsupported image kind: ${kind}`);
    }
  }

  private static assertLength(
    data: Uint8Array | Uint8ClampedArray,
    expected: number,
    kind: number,
  ): void {
    if (data.length < expected) {
      throw new RangeError(
        `Image data too short for kind ${kind}: expected ${expected} bytes, got ${data.length}`,
      );
    }
  }
}
