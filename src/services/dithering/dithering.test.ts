import { describe, it, expect } from 'vitest';
import { createGrayBuffer, type BinaryBuffer, type GrayBuffer } from '../../models/pixel-buffer.model';
import { DITHER_MODES } from '../../models/print-settings.model';
import { dither, getDitherStrategy, listDitherModes } from './index';
import { BAYER_4X4, bayerOffset } from './ordered-bayer.strategy';

function flat(width: number, height: number, value: number): GrayBuffer {
  return createGrayBuffer(width, height, new Float32Array(width * height).fill(value));
}

function mean(buf: BinaryBuffer): number {
  let sum = 0;
  for (const v of buf.data) sum += v;
  return sum / buf.data.length;
}

function isBinary(buf: BinaryBuffer): boolean {
  return buf.data.every((v) => v === 0 || v === 255);
}

describe('dithering', () => {
  it('registers every mode', () => {
    expect(listDitherModes()).toEqual(['threshold', 'floydSteinberg', 'atkinson', 'orderedBayer']);
    for (const mode of DITHER_MODES) {
      expect(getDitherStrategy(mode).mode).toBe(mode);
    }
  });

  it('keeps pure white white in every mode at threshold 128', () => {
    for (const mode of DITHER_MODES) {
      const out = dither(flat(100, 50, 255), mode, 128);
      expect(out.kind).toBe('binary');
      expect(out.data.every((v) => v === 255)).toBe(true);
    }
  });

  it('keeps pure black black in every mode at threshold 128', () => {
    for (const mode of DITHER_MODES) {
      const out = dither(flat(16, 16, 0), mode, 128);
      expect(out.data.every((v) => v === 0)).toBe(true);
    }
  });

  it('produces strictly binary output and leaves the input untouched', () => {
    const data = new Float32Array(32 * 32);
    for (let i = 0; i < data.length; i++) data[i] = (i * 37) % 256;
    const input = createGrayBuffer(32, 32, data);
    const before = Array.from(input.data);

    for (const mode of DITHER_MODES) {
      expect(isBinary(dither(input, mode, 128))).toBe(true);
    }
    expect(Array.from(input.data)).toEqual(before);
  });

  describe('threshold', () => {
    it('treats values below the threshold as black', () => {
      const input = createGrayBuffer(4, 1, new Float32Array([0, 127.9, 128, 255]));
      expect(Array.from(dither(input, 'threshold', 128).data)).toEqual([0, 0, 255, 255]);
    });

    it('reproduces a black and white checkerboard exactly', () => {
      const data = new Float32Array(8 * 8);
      for (let y = 0; y < 8; y++) {
        for (let x = 0; x < 8; x++) data[y * 8 + x] = (x + y) % 2 === 0 ? 0 : 255;
      }
      const out = dither(createGrayBuffer(8, 8, data), 'threshold', 128);
      expect(Array.from(out.data)).toEqual(Array.from(data));
    });

    it('is idempotent', () => {
      const data = new Float32Array(16);
      for (let i = 0; i < data.length; i++) data[i] = i * 16;
      const once = dither(createGrayBuffer(16, 1, data), 'threshold', 100);
      const twice = dither(createGrayBuffer(16, 1, Float32Array.from(once.data)), 'threshold', 100);
      expect(Array.from(twice.data)).toEqual(Array.from(once.data));
    });
  });

  describe('floydSteinberg', () => {
    it('pushes 7/16 of the error to the right', () => {
      // 100 -> black, error 100; right neighbour becomes 143.75 -> white
      const out = dither(createGrayBuffer(2, 1, new Float32Array([100, 100])), 'floydSteinberg', 128);
      expect(Array.from(out.data)).toEqual([0, 255]);
    });

    it('clamps accumulated error at white before passing it on', () => {
      // 255 + 52.5 clamps back to 255 and forwards no error, so 110 stays black
      const out = dither(createGrayBuffer(3, 1, new Float32Array([120, 255, 110])), 'floydSteinberg', 128);
      expect(Array.from(out.data)).toEqual([0, 255, 0]);
    });

    it('preserves mean tone on flat gray', () => {
      for (const level of [64, 128, 192]) {
        const out = dither(flat(64, 64, level), 'floydSteinberg', 128);
        expect(Math.abs(mean(out) - level)).toBeLessThan(1);
      }
    });
  });

  describe('atkinson', () => {
    it('spreads only 1/8 of the error per neighbour', () => {
      // 100 -> black, each neighbour +12.5; 112.5 -> black, +14.0625; 126.5625 -> black
      const out = dither(createGrayBuffer(3, 1, new Float32Array([100, 100, 100])), 'atkinson', 128);
      expect(Array.from(out.data)).toEqual([0, 0, 0]);
    });

    it('clamps accumulated error at white before passing it on', () => {
      const out = dither(createGrayBuffer(4, 1, new Float32Array([120, 255, 255, 127])), 'atkinson', 128);
      expect(Array.from(out.data)).toEqual([0, 255, 255, 0]);
    });

    it('keeps mid gray balanced', () => {
      const out = dither(flat(64, 64, 128), 'atkinson', 128);
      expect(Math.abs(mean(out) - 128)).toBeLessThan(1);
    });

    it('loses error, pushing shadows darker and highlights lighter than floydSteinberg', () => {
      expect(mean(dither(flat(64, 64, 64), 'atkinson', 128))).toBeLessThan(
        mean(dither(flat(64, 64, 64), 'floydSteinberg', 128)),
      );
      expect(mean(dither(flat(64, 64, 192), 'atkinson', 128))).toBeGreaterThan(
        mean(dither(flat(64, 64, 192), 'floydSteinberg', 128)),
      );
    });
  });

  describe('orderedBayer', () => {
    it('centres the matrix offsets', () => {
      expect(bayerOffset(0, 0)).toBe(8);
      expect(bayerOffset(3, 3)).toBe(BAYER_4X4[3][3] * 16 + 8);
      expect(bayerOffset(4, 5)).toBe(bayerOffset(0, 1));
    });

    it('turns flat mid gray into half coverage', () => {
      // 128 + offset < 256 exactly for matrix entries 0-7
      const out = dither(flat(4, 4, 128), 'orderedBayer', 128);
      for (let y = 0; y < 4; y++) {
        for (let x = 0; x < 4; x++) {
          expect(out.data[y * 4 + x]).toBe(BAYER_4X4[y][x] < 8 ? 0 : 255);
        }
      }
      expect(mean(out)).toBe(127.5);
    });

    it('repeats with period 4 on flat input', () => {
      const out = dither(flat(12, 8, 100), 'orderedBayer', 128);
      for (let y = 0; y < 8; y++) {
        for (let x = 0; x < 12; x++) {
          expect(out.data[y * 12 + x]).toBe(out.data[(y % 4) * 12 + (x % 4)]);
        }
      }
    });

    it('does not depend on other pixels', () => {
      const base = flat(8, 8, 90);
      const changed = flat(8, 8, 90);
      changed.data[0] = 255;
      const a = dither(base, 'orderedBayer', 128);
      const b = dither(changed, 'orderedBayer', 128);
      expect(Array.from(b.data.slice(1))).toEqual(Array.from(a.data.slice(1)));
    });
  });
});
