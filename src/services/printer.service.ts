import { SerialPort } from 'serialport';
import { config } from '../config';
import type { PrinterInfo } from '../models/printer.model';
import type { PrintSettings } from '../models/print-settings.model';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { DEVICE_DPI } from '../utils/unit-converter';
import { isTcpAddress } from './transport.service';

/** Fields of a serial port listing that discovery looks at */
export interface PortCandidate {
  readonly path: string;
  readonly manufacturer?: string;
  readonly serialNumber?: string;
  readonly pnpId?: string;
  readonly friendlyName?: string;
}

export interface DiscoveryOptions {
  /** Pinned device: only this path, serial number or address qualifies */
  readonly pinnedAddress: string;
  /** Otherwise, ports whose description contains this text (case-insensitive) */
  readonly nameFilter: string;
}

function describePort(port: PortCandidate): string {
  return port.friendlyName || port.manufacturer || port.path;
}

/** Does this port look like one of our printers? */
export function isPrinterCandidate(port: PortCandidate, options: DiscoveryOptions): boolean {
  if (options.pinnedAddress) {
    return port.path === options.pinnedAddress || port.serialNumber === options.pinnedAddress;
  }
  const needle = options.nameFilter.toLowerCase();
  if (!needle) return true;
  return [port.path, port.manufacturer, port.pnpId, port.friendlyName]
    .some((field) => field !== undefined && field.toLowerCase().includes(needle));
}

export function toPrinterInfo(id: string, displayName: string, settings: PrintSettings): PrinterInfo {
  return {
    id,
    displayName,
    capabilities: {
      mediaWidthMm: settings.paperWidthMm,
      mediaHeightMm: settings.paperHeightMm,
      dpi: DEVICE_DPI,
      color: 'monochrome',
    },
  };
}

/** Printers among the given ports; a pinned tcp:// address is always listed */
export function selectPrinters(
  ports: readonly PortCandidate[],
  settings: PrintSettings,
  options: DiscoveryOptions,
): PrinterInfo[] {
  const printers = ports
    .filter((port) => isPrinterCandidate(port, options))
    .map((port) => toPrinterInfo(port.path, describePort(port), settings));

  if (isTcpAddress(options.pinnedAddress)) {
    printers.push(toPrinterInfo(options.pinnedAddress, options.pinnedAddress, settings));
  }
  return printers;
}

/** List printers reachable over serial ports (plus a pinned TCP printer) */
export async function listPrinters(settings: PrintSettings): Promise<PrinterInfo[]> {
  const options = { pinnedAddress: config.printerAddress, nameFilter: config.printerNameFilter };
  try {
    const ports = await SerialPort.list();
    const printers = selectPrinters(ports, settings, options);
    logger.debug({ ports: ports.length, printers: printers.length }, 'Printer discovery finished');
    return printers;
  } catch (error) {
    logger.error({ error: errorMessage(error) }, 'Failed to list serial ports');
    throw new Error('Failed to list printers');
  }
}

/** Effective printer address: explicit > pinned > first discovered */
export async function resolvePrinterId(explicit: string | undefined, settings: PrintSettings): Promise<string | undefined> {
  if (explicit) return explicit;
  if (config.printerAddress) return config.printerAddress;
  const printers = await listPrinters(settings);
  return printers[0]?.id;
}
