import { describe, it, expect } from 'vitest';
import { base64ToBuffer } from '../utils/base64';
import { printRequestSchema } from './print.validator';

describe('printRequestSchema', () => {
  it('parses settings sent as a JSON string in a multipart field', () => {
    const parsed = printRequestSchema.parse({
      printer: 'tcp://192.168.1.50:9100',
      settings: '{"ditherMode":"orderedBayer","threshold":"100","brightnessSlider":"150"}',
    });
    expect(parsed.printer).toBe('tcp://192.168.1.50:9100');
    expect(parsed.settings?.ditherMode).toBe('orderedBayer');
    expect(parsed.settings?.threshold).toBe(100);
    expect(parsed.settings?.brightnessSlider).toBe(150);
  });

  it('treats a blank settings field as absent', () => {
    expect(printRequestSchema.parse({ settings: '  ' }).settings).toBeUndefined();
  });

  it('accepts serial device paths', () => {
    expect(printRequestSchema.parse({ printer: '/dev/ttyUSB0' }).printer).toBe('/dev/ttyUSB0');
    expect(printRequestSchema.parse({ printer: 'COM3' }).printer).toBe('COM3');
  });

  it('rejects printer names with shell characters', () => {
    expect(() => printRequestSchema.parse({ printer: 'COM3; reboot' })).toThrow('Printer address contains invalid characters');
  });

  it('rejects unknown dither modes', () => {
    expect(() => printRequestSchema.parse({ settings: { ditherMode: 'halftone' } })).toThrow();
  });
});

describe('base64ToBuffer', () => {
  it('decodes plain base64 and data URLs', () => {
    expect(base64ToBuffer('aGVsbG8=').toString('utf-8')).toBe('hello');
    expect(base64ToBuffer('data:image/png;base64,aGVsbG8=').toString('utf-8')).toBe('hello');
  });
});
