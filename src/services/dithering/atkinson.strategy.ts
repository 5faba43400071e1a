import type { BinaryBuffer, GrayBuffer } from '../../models/pixel-buffer.model';
import { diffuseError } from './error-diffusion';
import type { DiffusionTap, DitheringStrategy } from './types';

/**
 * Six neighbours each receive 1/8 of the error; the remaining 2/8 is
 * discarded, which keeps highlights open on thermal paper.
 */
const ATKINSON_TAPS: readonly DiffusionTap[] = [
  { dx: 1, dy: 0, weight: 1 },
  { dx: 2, dy: 0, weight: 1 },
  { dx: -1, dy: 1, weight: 1 },
  { dx: 0, dy: 1, weight: 1 },
  { dx: 1, dy: 1, weight: 1 },
  { dx: 0, dy: 2, weight: 1 },
];

export class AtkinsonStrategy implements DitheringStrategy {
  readonly mode = 'atkinson' as const;

  dither(input: GrayBuffer, threshold: number): BinaryBuffer {
    return diffuseError(input, threshold, ATKINSON_TAPS, 1 / 8);
  }
}
