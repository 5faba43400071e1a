import type { BinaryBuffer, GrayBuffer } from '../../models/pixel-buffer.model';
import type { DitherMode } from '../../models/print-settings.model';
import { AtkinsonStrategy } from './atkinson.strategy';
import { FloydSteinbergStrategy } from './floyd-steinberg.strategy';
import { OrderedBayerStrategy } from './ordered-bayer.strategy';
import { ThresholdStrategy } from './threshold.strategy';
import type { DitheringStrategy } from './types';

export type { DitheringStrategy } from './types';

/** Dithering strategy registry, keyed by settings value */
const registry = new Map<DitherMode, DitheringStrategy>();

function register(strategy: DitheringStrategy): void {
  registry.set(strategy.mode, strategy);
}

register(new ThresholdStrategy());
register(new FloydSteinbergStrategy());
register(new AtkinsonStrategy());
register(new OrderedBayerStrategy());

export function getDitherStrategy(mode: DitherMode): DitheringStrategy {
  const strategy = registry.get(mode);
  if (!strategy) {
    throw new Error(`Unknown dither mode: ${mode}`);
  }
  return strategy;
}

/** Reduce a grayscale buffer to 1-bit with the given mode */
export function dither(input: GrayBuffer, mode: DitherMode, threshold: number): BinaryBuffer {
  return getDitherStrategy(mode).dither(input, threshold);
}

export function listDitherModes(): DitherMode[] {
  return Array.from(registry.keys());
}
