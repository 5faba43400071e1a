import fs from 'fs';
import path from 'path';
import { config } from '../config';
import { DEFAULT_PRINT_SETTINGS, fromSliderScale, type PrintSettings } from '../models/print-settings.model';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { printSettingsSchema, type PrintSettingsPatch } from '../validators/settings.validator';

let currentSettings: PrintSettings = DEFAULT_PRINT_SETTINGS;

/** Merge a patch over base settings and validate the result */
export function applySettingsPatch(base: PrintSettings, patch: PrintSettingsPatch): PrintSettings {
  const { contrastSlider, brightnessSlider, ...direct } = patch;
  const merged: Record<string, unknown> = { ...base };

  if (contrastSlider !== undefined || brightnessSlider !== undefined) {
    const scaled = fromSliderScale(contrastSlider ?? 100, brightnessSlider ?? 100);
    if (contrastSlider !== undefined) merged.contrast = scaled.contrast;
    if (brightnessSlider !== undefined) merged.brightness = scaled.brightness;
  }
  for (const [key, value] of Object.entries(direct)) {
    if (value !== undefined) merged[key] = value;
  }

  return printSettingsSchema.parse(merged);
}

/** Load persisted settings; a missing or invalid file falls back to defaults */
export function loadSettings(file: string = config.settingsFile): PrintSettings {
  try {
    if (fs.existsSync(file)) {
      const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
      currentSettings = printSettingsSchema.parse({ ...DEFAULT_PRINT_SETTINGS, ...(raw !== null && typeof raw === 'object' ? raw : {}) });
    } else {
      currentSettings = DEFAULT_PRINT_SETTINGS;
    }
  } catch (error) {
    logger.error({ file, error: errorMessage(error) }, 'Failed to load print settings, using defaults');
    currentSettings = DEFAULT_PRINT_SETTINGS;
  }
  logger.info({ settings: currentSettings }, 'Print settings loaded');
  return currentSettings;
}

/** Immutable snapshot of the current settings */
export function getSettings(): PrintSettings {
  return currentSettings;
}

export function updateSettings(patch: PrintSettingsPatch, file: string = config.settingsFile): PrintSettings {
  const next = applySettingsPatch(currentSettings, patch);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(next, null, 2), 'utf-8');
  currentSettings = next;
  logger.info({ settings: next }, 'Print settings updated');
  return next;
}
