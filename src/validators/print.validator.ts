import { z } from 'zod';
import { printSettingsPatchSchema } from './settings.validator';

/** Multipart fields arrive as strings; settings may be sent as a JSON string */
function parseJsonField(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  if (value.trim() === '') return undefined;
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

export const printRequestSchema = z.object({
  /** Serial device path or tcp://host:port; empty = pinned/discovered printer */
  printer: z.string()
    .max(256)
    .regex(/^[a-zA-Z0-9\s\-_./\\():]+$/, 'Printer address contains invalid characters')
    .optional(),
  /** Base64 document, used when no file is uploaded */
  document: z.string().min(1).optional(),
  documentName: z.string().max(256).optional(),
  settings: z.preprocess(parseJsonField, printSettingsPatchSchema.optional()),
});

export type PrintRequest = z.infer<typeof printRequestSchema>;
