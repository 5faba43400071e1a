import { z } from 'zod';
import { DITHER_MODES, MEDIA_SENSING_MODES } from '../models/print-settings.model';

export const printSettingsSchema = z.object({
  paperWidthMm: z.coerce.number().positive().max(300),
  paperHeightMm: z.coerce.number().positive().max(3000),
  mediaSensing: z.enum(MEDIA_SENSING_MODES),
  darkness: z.coerce.number().int().min(0).max(8),
  speed: z.coerce.number().int().min(0).max(4),
  ditherMode: z.enum(DITHER_MODES),
  threshold: z.coerce.number().int().min(0).max(255),
  contrast: z.coerce.number().min(0).max(2),
  brightness: z.coerce.number().min(-128).max(128),
});

/** Partial update; slider-scale values (0-200) are accepted in place of contrast/brightness */
export const printSettingsPatchSchema = printSettingsSchema.partial().extend({
  contrastSlider: z.coerce.number().min(0).max(200).optional(),
  brightnessSlider: z.coerce.number().min(0).max(200).optional(),
});

export type PrintSettingsPatch = z.infer<typeof printSettingsPatchSchema>;
