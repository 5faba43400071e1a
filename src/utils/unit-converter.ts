/** 203 DPI thermal heads place 8 dots per millimetre */
export const DEVICE_DPI = 203;
export const DOTS_PER_MM = 8;

/** mm -> printer dots */
export function mmToDots(mm: number): number {
  return Math.round(mm * DOTS_PER_MM);
}

/** printer dots -> mm */
export function dotsToMm(dots: number): number {
  return dots / DOTS_PER_MM;
}

