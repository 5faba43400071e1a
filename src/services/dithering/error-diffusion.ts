import { createBinaryBuffer, type BinaryBuffer, type GrayBuffer } from '../../models/pixel-buffer.model';
import type { DiffusionTap } from './types';

/**
 * Row-major error diffusion shared by Floyd-Steinberg and Atkinson.
 *
 * Error accumulates in a Float32 working copy, so a sample is read only after
 * every earlier pixel has pushed its share into it. Each sample is clamped to
 * 0-255 before it is quantized, and the error is taken from the clamped value.
 * Taps that fall outside the image are dropped without renormalizing the rest.
 */
export function diffuseError(
  input: GrayBuffer,
  threshold: number,
  taps: readonly DiffusionTap[],
  errorScale: number,
): BinaryBuffer {
  const { width: w, height: h } = input;
  const work = Float32Array.from(input.data);
  const out = createBinaryBuffer(w, h);

  for (let y = 0; y < h; y++) {
    for (let x = 0; x < w; x++) {
      const idx = y * w + x;
      const sample = work[idx];
      const oldVal = sample < 0 ? 0 : sample > 255 ? 255 : sample;
      const newVal = oldVal < threshold ? 0 : 255;
      const err = (oldVal - newVal) * errorScale;
      out.data[idx] = newVal;

      for (const tap of taps) {
        const nx = x + tap.dx;
        const ny = y + tap.dy;
        if (nx < 0 || nx >= w || ny >= h) continue;
        work[ny * w + nx] += err * tap.weight;
      }
    }
  }

  return out;
}
