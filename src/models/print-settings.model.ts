export const MEDIA_SENSING_MODES = ['gap', 'blackMark', 'continuous'] as const;
export const DITHER_MODES = ['threshold', 'floydSteinberg', 'atkinson', 'orderedBayer'] as const;

export type MediaSensing = (typeof MEDIA_SENSING_MODES)[number];
export type DitherMode = (typeof DITHER_MODES)[number];

export interface PrintSettings {
  readonly paperWidthMm: number;
  /** Advertised media height; pages take their height from the rendered document */
  readonly paperHeightMm: number;
  readonly mediaSensing: MediaSensing;
  /** Ordinal 0-8, mapped to device density 1-15 */
  readonly darkness: number;
  /** Ordinal 0-4, mapped to device speed 1-5 */
  readonly speed: number;
  readonly ditherMode: DitherMode;
  readonly threshold: number;
  /** 1.0 = unchanged */
  readonly contrast: number;
  /** -128..+128 shift, 0 = unchanged */
  readonly brightness: number;
}

export const DEFAULT_PRINT_SETTINGS: PrintSettings = {
  paperWidthMm: 78,
  paperHeightMm: 150,
  mediaSensing: 'gap',
  darkness: 5,
  speed: 2,
  ditherMode: 'floydSteinberg',
  threshold: 128,
  contrast: 1.0,
  brightness: 0,
};

/**
 * Settings screens store contrast and brightness as 0-200 sliders centred on 100.
 * contrast: 0-200 -> 0.0-2.0, brightness: 0-200 -> -128..+128.
 */
export function fromSliderScale(contrastSlider: number, brightnessSlider: number): {
  contrast: number;
  brightness: number;
} {
  return {
    contrast: contrastSlider / 100,
    brightness: (brightnessSlider - 100) * 1.28,
  };
}
