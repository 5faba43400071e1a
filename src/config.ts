import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';

dotenv.config();

const baseDir = path.join(__dirname, '..');

function readVersion(): string {
  const pkgPath = path.join(baseDir, 'package.json');
  try {
    if (fs.existsSync(pkgPath)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
    }
  } catch {
    return '0.0.0';
  }
  return '0.0.0';
}

function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

const dataDir = process.env.DATA_DIR || path.join(baseDir, 'data');

export const config = {
  port: intFromEnv('PORT', 39600),
  host: process.env.HOST || '127.0.0.1',
  logLevel: process.env.LOG_LEVEL || 'info',
  isProduction: process.env.NODE_ENV === 'production',
  dataDir,
  /** Seekable copies of incoming documents live here for the duration of a job */
  tmpDir: process.env.TMP_DIR || path.join(dataDir, 'tmp'),
  settingsFile: path.join(dataDir, 'settings.json'),
  /** Pause after each page so the printer can drain its buffer */
  settleDelayMs: intFromEnv('SETTLE_DELAY_MS', 500),
  supersample: Math.max(1, intFromEnv('SUPERSAMPLE', 2)),
  serialBaudRate: intFromEnv('SERIAL_BAUD_RATE', 115200),
  /** Serial path, serial number or tcp:// address of a pinned printer */
  printerAddress: process.env.PRINTER_ADDRESS || '',
  printerNameFilter: process.env.PRINTER_NAME_FILTER || 'B300',
  version: readVersion(),
} as const;
