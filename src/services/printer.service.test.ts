import { describe, it, expect } from 'vitest';
import { DEFAULT_PRINT_SETTINGS } from '../models/print-settings.model';
import { isPrinterCandidate, selectPrinters, type PortCandidate } from './printer.service';

const ports: PortCandidate[] = [
  { path: '/dev/ttyS0' },
  { path: '/dev/ttyUSB0', manufacturer: 'Generic', pnpId: 'usb-B300_Label_Printer-if00', serialNumber: 'SN123' },
  { path: 'COM4', friendlyName: 'Standard Serial over Bluetooth link (COM4)' },
];

describe('printer.service', () => {
  describe('isPrinterCandidate', () => {
    it('matches the name filter case-insensitively', () => {
      const options = { pinnedAddress: '', nameFilter: 'b300' };
      expect(ports.map((p) => isPrinterCandidate(p, options))).toEqual([false, true, false]);
    });

    it('accepts every port with an empty filter', () => {
      const options = { pinnedAddress: '', nameFilter: '' };
      expect(ports.every((p) => isPrinterCandidate(p, options))).toBe(true);
    });

    it('matches only the pinned path or serial number', () => {
      expect(isPrinterCandidate(ports[2], { pinnedAddress: 'COM4', nameFilter: 'B300' })).toBe(true);
      expect(isPrinterCandidate(ports[1], { pinnedAddress: 'COM4', nameFilter: 'B300' })).toBe(false);
      expect(isPrinterCandidate(ports[1], { pinnedAddress: 'SN123', nameFilter: '' })).toBe(true);
    });
  });

  describe('selectPrinters', () => {
    it('describes matching ports with the media from settings', () => {
      const printers = selectPrinters(ports, DEFAULT_PRINT_SETTINGS, { pinnedAddress: '', nameFilter: 'B300' });
      expect(printers).toEqual([
        {
          id: '/dev/ttyUSB0',
          displayName: 'Generic',
          capabilities: { mediaWidthMm: 78, mediaHeightMm: 150, dpi: 203, color: 'monochrome' },
        },
      ]);
    });

    it('always lists a pinned network printer', () => {
      const printers = selectPrinters(ports, DEFAULT_PRINT_SETTINGS, {
        pinnedAddress: 'tcp://192.168.1.50:9100',
        nameFilter: 'B300',
      });
      expect(printers.map((p) => p.id)).toEqual(['tcp://192.168.1.50:9100']);
    });
  });
});
