import net from 'net';
import { SerialPort } from 'serialport';
import { config } from '../config';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { TSPL_DEVICE_CAPABILITIES, type DeviceCapabilities } from './tspl.service';

/**
 * Byte pipe to a printer. `open` and `write` report failure by resolving
 * false; `close` is safe to call any number of times.
 */
export interface PrinterTransport {
  readonly capabilities: DeviceCapabilities;
  open(address: string): Promise<boolean>;
  write(bytes: Buffer): Promise<boolean>;
  close(): Promise<void>;
}

export type TransportFactory = (address: string) => PrinterTransport;

const TCP_PREFIX = 'tcp://';
const SERIAL_PREFIX = 'serial:';
const DEFAULT_RAW_PORT = 9100;

export function isTcpAddress(address: string): boolean {
  return address.startsWith(TCP_PREFIX);
}

/** tcp://host[:port] -> host and port (raw port 9100 by default) */
export function parseTcpAddress(address: string): { host: string; port: number } {
  const rest = address.slice(TCP_PREFIX.length);
  const sep = rest.lastIndexOf(':');
  if (sep === -1) {
    return { host: rest, port: DEFAULT_RAW_PORT };
  }
  const port = parseInt(rest.slice(sep + 1), 10);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid port in printer address: ${address}`);
  }
  return { host: rest.slice(0, sep), port };
}

export function serialPathOf(address: string): string {
  return address.startsWith(SERIAL_PREFIX) ? address.slice(SERIAL_PREFIX.length) : address;
}

/** Serial (USB CDC or Bluetooth SPP) printer port */
export class SerialTransport implements PrinterTransport {
  readonly capabilities: DeviceCapabilities;
  private port: SerialPort | null = null;

  constructor(
    private readonly baudRate: number = config.serialBaudRate,
    capabilities: DeviceCapabilities = TSPL_DEVICE_CAPABILITIES,
  ) {
    this.capabilities = capabilities;
  }

  async open(address: string): Promise<boolean> {
    const path = serialPathOf(address);
    const port = new SerialPort({ path, baudRate: this.baudRate, autoOpen: false });
    // Failed writes are also emitted as stream errors; the write callback reports them
    port.on('error', (err) => {
      logger.error({ path, error: err.message }, 'Serial port error');
    });

    return new Promise((resolve) => {
      port.open((err) => {
        if (err) {
          logger.error({ path, error: err.message }, 'Failed to open serial port');
          resolve(false);
          return;
        }
        this.port = port;
        logger.info({ path, baudRate: this.baudRate }, 'Serial port opened');
        resolve(true);
      });
    });
  }

  async write(bytes: Buffer): Promise<boolean> {
    const port = this.port;
    if (!port) return false;

    return new Promise((resolve) => {
      port.write(bytes, (writeErr) => {
        if (writeErr) {
          logger.error({ error: writeErr.message }, 'Serial write failed');
          resolve(false);
          return;
        }
        // Wait until the OS has pushed every byte to the device
        port.drain((drainErr) => {
          if (drainErr) {
            logger.error({ error: drainErr.message }, 'Serial drain failed');
            resolve(false);
            return;
          }
          logger.debug({ bytes: bytes.length }, 'Serial data written');
          resolve(true);
        });
      });
    });
  }

  async close(): Promise<void> {
    const port = this.port;
    this.port = null;
    if (!port || !port.isOpen) return;

    await new Promise<void>((resolve) => {
      port.close((err) => {
        if (err) {
          logger.warn({ error: err.message }, 'Serial port close reported an error');
        }
        resolve();
      });
    });
  }
}

/** Raw TCP printer port (JetDirect-style, 9100) */
export class TcpTransport implements PrinterTransport {
  readonly capabilities: DeviceCapabilities;
  private socket: net.Socket | null = null;

  constructor(
    private readonly connectTimeoutMs = 10_000,
    capabilities: DeviceCapabilities = TSPL_DEVICE_CAPABILITIES,
  ) {
    this.capabilities = capabilities;
  }

  async open(address: string): Promise<boolean> {
    let target: { host: string; port: number };
    try {
      target = parseTcpAddress(address);
    } catch (error) {
      logger.error({ address, error: errorMessage(error) }, 'Invalid TCP printer address');
      return false;
    }

    return new Promise((resolve) => {
      const client = new net.Socket();
      const timeout = setTimeout(() => {
        client.destroy();
        logger.error(target, 'TCP connection to printer timed out');
        resolve(false);
      }, this.connectTimeoutMs);

      client.once('error', (err) => {
        clearTimeout(timeout);
        logger.error({ ...target, error: err.message }, 'TCP connection to printer failed');
        client.destroy();
        resolve(false);
      });

      client.connect(target.port, target.host, () => {
        clearTimeout(timeout);
        client.removeAllListeners('error');
        client.on('error', (err) => {
          logger.error({ ...target, error: err.message }, 'Printer socket error');
        });
        this.socket = client;
        logger.info(target, 'TCP printer connection opened');
        resolve(true);
      });
    });
  }

  async write(bytes: Buffer): Promise<boolean> {
    const socket = this.socket;
    if (!socket || socket.destroyed) return false;

    return new Promise((resolve) => {
      socket.write(bytes, (err) => {
        if (err) {
          logger.error({ error: err.message }, 'TCP write failed');
          resolve(false);
        } else {
          logger.debug({ bytes: bytes.length }, 'TCP data written');
          resolve(true);
        }
      });
    });
  }

  async close(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    if (!socket || socket.destroyed) return;

    await new Promise<void>((resolve) => {
      socket.once('close', () => resolve());
      socket.end(() => socket.destroy());
    });
  }
}

/** tcp://host:port -> raw TCP; anything else is a serial device path */
export const createTransport: TransportFactory = (address) =>
  isTcpAddress(address) ? new TcpTransport() : new SerialTransport();
