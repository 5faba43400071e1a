import { createBinaryBuffer, type BinaryBuffer, type GrayBuffer } from '../../models/pixel-buffer.model';
import type { DitheringStrategy } from './types';

export const BAYER_4X4: readonly (readonly number[])[] = [
  [0, 8, 2, 10],
  [12, 4, 14, 6],
  [3, 11, 1, 9],
  [15, 7, 13, 5],
];

/**
 * Bayer offset for a cell, scaled to 0-255. This departs from the plain
 * `matrix * 16` offset on purpose: the +8 centres each cell so that pure white
 * never falls under `threshold + 128` at the default threshold. With the plain
 * offset, white at a cell holding 0 would print black.
 */
export function bayerOffset(x: number, y: number): number {
  return BAYER_4X4[y & 3][x & 3] * 16 + 8;
}

/**
 * Ordered dithering: each pixel depends only on its own value and its
 * position modulo 4, so there is no scan-order dependency.
 */
export class OrderedBayerStrategy implements DitheringStrategy {
  readonly mode = 'orderedBayer' as const;

  dither(input: GrayBuffer, threshold: number): BinaryBuffer {
    const { width: w, height: h } = input;
    const out = createBinaryBuffer(w, h);
    const cutoff = threshold + 128;

    for (let y = 0; y < h; y++) {
      for (let x = 0; x < w; x++) {
        const idx = y * w + x;
        const g = Math.round(input.data[idx]);
        out.data[idx] = g + bayerOffset(x, y) < cutoff ? 0 : 255;
      }
    }
    return out;
  }
}
