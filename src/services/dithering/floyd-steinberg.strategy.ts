import type { BinaryBuffer, GrayBuffer } from '../../models/pixel-buffer.model';
import { diffuseError } from './error-diffusion';
import type { DiffusionTap, DitheringStrategy } from './types';

/** 7/16 right, 3/16 below-left, 5/16 below, 1/16 below-right: all error is conserved */
const FLOYD_STEINBERG_TAPS: readonly DiffusionTap[] = [
  { dx: 1, dy: 0, weight: 7 / 16 },
  { dx: -1, dy: 1, weight: 3 / 16 },
  { dx: 0, dy: 1, weight: 5 / 16 },
  { dx: 1, dy: 1, weight: 1 / 16 },
];

export class FloydSteinbergStrategy implements DitheringStrategy {
  readonly mode = 'floydSteinberg' as const;

  dither(input: GrayBuffer, threshold: number): BinaryBuffer {
    return diffuseError(input, threshold, FLOYD_STEINBERG_TAPS, 1);
  }
}
