import { createGrayBuffer, type GrayBuffer, type RgbBuffer } from '../models/pixel-buffer.model';

/** ITU-R BT.601 luma weights */
const LUMA_R = 0.299;
const LUMA_G = 0.587;
const LUMA_B = 0.114;

/** RGB -> single-channel luminance */
export function toGrayscale(buf: RgbBuffer): GrayBuffer {
  const out = createGrayBuffer(buf.width, buf.height);
  const src = buf.data;
  for (let i = 0, p = 0; i < out.data.length; i++, p += 3) {
    out.data[i] = LUMA_R * src[p] + LUMA_G * src[p + 1] + LUMA_B * src[p + 2];
  }
  return out;
}

/**
 * out = clamp(in * contrast + brightness, 0, 255).
 * Clamping happens once, after the transform.
 */
export function adjustContrastBrightness(buf: GrayBuffer, contrast: number, brightness: number): GrayBuffer {
  const out = createGrayBuffer(buf.width, buf.height);
  for (let i = 0; i < buf.data.length; i++) {
    const v = buf.data[i] * contrast + brightness;
    out.data[i] = v < 0 ? 0 : v > 255 ? 255 : v;
  }
  return out;
}

/** Grayscale followed by the contrast/brightness transform */
export function normalizeTone(buf: RgbBuffer, contrast: number, brightness: number): GrayBuffer {
  const gray = toGrayscale(buf);
  return adjustContrastBrightness(gray, contrast, brightness);
}
