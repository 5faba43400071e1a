import type { BinaryBuffer, GrayBuffer } from '../../models/pixel-buffer.model';
import type { DitherMode } from '../../models/print-settings.model';

/**
 * Reduces grayscale to strictly binary output (0 or 255 per pixel).
 * Implementations are deterministic and never mutate their input.
 */
export interface DitheringStrategy {
  readonly mode: DitherMode;
  dither(input: GrayBuffer, threshold: number): BinaryBuffer;
}

/** An error-diffusion neighbour: offset from the current pixel and its share of the error */
export interface DiffusionTap {
  readonly dx: number;
  readonly dy: number;
  readonly weight: number;
}
