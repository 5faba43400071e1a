/** Row-major RGB, 3 bytes per pixel */
export interface RgbBuffer {
  readonly kind: 'rgb';
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
}

/** One float sample per pixel; nominally 0-255 */
export interface GrayBuffer {
  readonly kind: 'gray';
  readonly width: number;
  readonly height: number;
  readonly data: Float32Array;
}

/** One byte per pixel, each exactly 0 (black) or 255 (white) */
export interface BinaryBuffer {
  readonly kind: 'binary';
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
}

export type PixelBuffer = RgbBuffer | GrayBuffer | BinaryBuffer;

export function createRgbBuffer(width: number, height: number, data?: Uint8Array): RgbBuffer {
  const expected = width * height * 3;
  if (data && data.length !== expected) {
    throw new Error(`RGB data length ${data.length} does not match ${width}x${height}`);
  }
  return { kind: 'rgb', width, height, data: data ?? new Uint8Array(expected) };
}

export function createGrayBuffer(width: number, height: number, data?: Float32Array): GrayBuffer {
  const expected = width * height;
  if (data && data.length !== expected) {
    throw new Error(`Gray data length ${data.length} does not match ${width}x${height}`);
  }
  return { kind: 'gray', width, height, data: data ?? new Float32Array(expected) };
}

export function createBinaryBuffer(width: number, height: number): BinaryBuffer {
  return { kind: 'binary', width, height, data: new Uint8Array(width * height) };
}
