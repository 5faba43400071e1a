import { createBinaryBuffer, type BinaryBuffer, type GrayBuffer } from '../../models/pixel-buffer.model';
import type { DitheringStrategy } from './types';

/** Plain threshold, no error propagation */
export class ThresholdStrategy implements DitheringStrategy {
  readonly mode = 'threshold' as const;

  dither(input: GrayBuffer, threshold: number): BinaryBuffer {
    const out = createBinaryBuffer(input.width, input.height);
    for (let i = 0; i < input.data.length; i++) {
      out.data[i] = input.data[i] < threshold ? 0 : 255;
    }
    return out;
  }
}
