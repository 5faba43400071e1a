import type { BinaryBuffer } from '../models/pixel-buffer.model';
import type { MediaSensing, PrintSettings } from '../models/print-settings.model';
import { CapabilityUnsupported, RenderError } from '../utils/errors';
import { logger } from '../utils/logger';
import { dotsToMm } from '../utils/unit-converter';

/**
 * TSPL command builder for 203 DPI thermal label printers.
 *
 * - SIZE m mm,n mm        : label width/height
 * - SPEED n               : print speed (inches/sec)
 * - DENSITY n             : darkness 0-15
 * - GAP m mm,n mm         : gap sensing, gap height and offset
 * - BLINE m mm,n mm       : black-mark sensing, mark height and offset
 * - REFERENCE x,y         : origin; REFERENCE 0,0 for continuous media
 * - CLS                   : clear image buffer
 * - BITMAP x,y,wb,h,m,... : raw 1-bit image, wb bytes per row, 0 bit = black dot
 * - PRINT m               : print m labels
 */

const CRLF = '\r\n';

/** Speed ordinal (0-4) -> device speed */
export const SPEED_TABLE: readonly number[] = [1, 2, 3, 4, 5];
/** Darkness ordinal (0-8) -> device density */
export const DENSITY_TABLE: readonly number[] = [1, 3, 5, 7, 8, 10, 12, 14, 15];
const DEFAULT_DENSITY = 10;

/** Gap between labels for gap-sensing media */
const GAP_MM = 2;
/** Black mark height for black-mark media */
const BLACK_MARK_MM = 2;

export type BitmapMode = 'overwrite' | 'or' | 'xor';

const BITMAP_MODE_CODES: Record<BitmapMode, number> = {
  overwrite: 0,
  or: 1,
  xor: 2,
};

export type TsplDirective =
  | { readonly kind: 'size'; readonly widthMm: number; readonly heightMm: number }
  | { readonly kind: 'speed'; readonly value: number }
  | { readonly kind: 'density'; readonly value: number }
  | { readonly kind: 'gap'; readonly gapMm: number; readonly offsetMm: number }
  | { readonly kind: 'blackMark'; readonly markMm: number; readonly offsetMm: number }
  | { readonly kind: 'reference'; readonly x: number; readonly y: number }
  | { readonly kind: 'cls' }
  | {
      readonly kind: 'bitmap';
      readonly x: number;
      readonly y: number;
      readonly widthBytes: number;
      readonly height: number;
      /** Absent on the legacy signature, which has no compositing argument */
      readonly mode?: BitmapMode;
      readonly data: Buffer;
    }
  | { readonly kind: 'print'; readonly copies: number };

/** One page's printer program */
export interface CommandStream {
  readonly directives: readonly TsplDirective[];
}

/** What the device behind a transport can do */
export interface DeviceCapabilities {
  /** Device speed values the printer accepts; omit when SPEED is not supported */
  readonly speeds?: readonly number[];
  /** Device density values the printer accepts; omit when DENSITY is not supported */
  readonly densities?: readonly number[];
  readonly blackMarkSensing: boolean;
  /** `extended` takes a compositing mode, `legacy` does not */
  readonly bitmapTransfer: 'extended' | 'legacy' | 'none';
}

export const TSPL_DEVICE_CAPABILITIES: DeviceCapabilities = {
  speeds: SPEED_TABLE,
  densities: Array.from({ length: 16 }, (_, i) => i),
  blackMarkSensing: true,
  bitmapTransfer: 'extended',
};

export type Capability<T> =
  | { readonly supported: true; readonly value: T }
  | { readonly supported: false };

export interface NegotiatedCapabilities {
  readonly speed: Capability<ReadonlySet<number>>;
  readonly density: Capability<ReadonlySet<number>>;
  readonly blackMark: Capability<true>;
  readonly bitmap: Capability<'extended' | 'legacy'>;
}

const unsupported = { supported: false } as const;

function valueSet(values: readonly number[] | undefined): Capability<ReadonlySet<number>> {
  return values && values.length > 0 ? { supported: true, value: new Set(values) } : unsupported;
}

export function negotiateCapabilities(device: DeviceCapabilities): NegotiatedCapabilities {
  return {
    speed: valueSet(device.speeds),
    density: valueSet(device.densities),
    blackMark: device.blackMarkSensing ? { supported: true, value: true } : unsupported,
    bitmap: device.bitmapTransfer === 'none' ? unsupported : { supported: true, value: device.bitmapTransfer },
  };
}

export function speedForOrdinal(ordinal: number): number {
  const clamped = Math.min(Math.max(Math.trunc(ordinal), 0), SPEED_TABLE.length - 1);
  return SPEED_TABLE[clamped];
}

export function densityForOrdinal(ordinal: number): number {
  return Number.isInteger(ordinal) ? DENSITY_TABLE[ordinal] ?? DEFAULT_DENSITY : DEFAULT_DENSITY;
}

/** mm values print with at most 3 decimals and no trailing zeros */
function formatMm(mm: number): string {
  return String(Number(mm.toFixed(3)));
}

// ── TSPL command helpers ──

export function cmdSize(widthMm: number, heightMm: number): Buffer {
  return Buffer.from(`SIZE ${formatMm(widthMm)} mm,${formatMm(heightMm)} mm${CRLF}`, 'ascii');
}

export function cmdSpeed(speed: number): Buffer {
  return Buffer.from(`SPEED ${speed}${CRLF}`, 'ascii');
}

export function cmdDensity(density: number): Buffer {
  return Buffer.from(`DENSITY ${density}${CRLF}`, 'ascii');
}

export function cmdGap(gapMm: number, offsetMm: number): Buffer {
  return Buffer.from(`GAP ${formatMm(gapMm)} mm,${formatMm(offsetMm)} mm${CRLF}`, 'ascii');
}

export function cmdBline(markMm: number, offsetMm: number): Buffer {
  return Buffer.from(`BLINE ${formatMm(markMm)} mm,${formatMm(offsetMm)} mm${CRLF}`, 'ascii');
}

export function cmdReference(x: number, y: number): Buffer {
  return Buffer.from(`REFERENCE ${x},${y}${CRLF}`, 'ascii');
}

export function cmdCls(): Buffer {
  return Buffer.from(`CLS${CRLF}`, 'ascii');
}

export function cmdBitmap(
  x: number,
  y: number,
  widthBytes: number,
  height: number,
  data: Buffer,
  mode?: BitmapMode,
): Buffer {
  const expected = widthBytes * height;
  if (data.length !== expected) {
    throw new Error(`Bitmap data must be ${expected} bytes, got ${data.length}`);
  }
  const modeArg = mode === undefined ? '' : `${BITMAP_MODE_CODES[mode]},`;
  const header = Buffer.from(`BITMAP ${x},${y},${widthBytes},${height},${modeArg}`, 'ascii');
  return Buffer.concat([header, data, Buffer.from(CRLF, 'ascii')]);
}

export function cmdPrint(copies: number): Buffer {
  return Buffer.from(`PRINT ${copies}${CRLF}`, 'ascii');
}

/**
 * Pack a binary buffer into TSPL rows: MSB = leftmost dot, 0 bit = black.
 * Padding bits at the end of each row stay 1 (white).
 */
export function packBitmap(binary: BinaryBuffer): { widthBytes: number; data: Buffer } {
  const widthBytes = Math.ceil(binary.width / 8);
  const data = Buffer.alloc(widthBytes * binary.height, 0xff);
  for (let y = 0; y < binary.height; y++) {
    for (let x = 0; x < binary.width; x++) {
      if (binary.data[y * binary.width + x] === 0) {
        data[y * widthBytes + (x >> 3)] &= ~(0x80 >> (x & 7));
      }
    }
  }
  return { widthBytes, data };
}

export function serializeDirective(d: TsplDirective): Buffer {
  switch (d.kind) {
    case 'size':
      return cmdSize(d.widthMm, d.heightMm);
    case 'speed':
      return cmdSpeed(d.value);
    case 'density':
      return cmdDensity(d.value);
    case 'gap':
      return cmdGap(d.gapMm, d.offsetMm);
    case 'blackMark':
      return cmdBline(d.markMm, d.offsetMm);
    case 'reference':
      return cmdReference(d.x, d.y);
    case 'cls':
      return cmdCls();
    case 'bitmap':
      return cmdBitmap(d.x, d.y, d.widthBytes, d.height, d.data, d.mode);
    case 'print':
      return cmdPrint(d.copies);
  }
}

export function serializeCommandStream(stream: CommandStream): Buffer {
  return Buffer.concat(stream.directives.map(serializeDirective));
}

/** SIZE first, PRINT last, exactly one BITMAP */
export function isWellFormed(stream: CommandStream): boolean {
  const { directives } = stream;
  if (directives.length < 3) return false;
  return (
    directives[0].kind === 'size' &&
    directives[directives.length - 1].kind === 'print' &&
    directives.filter((d) => d.kind === 'bitmap').length === 1
  );
}

/**
 * Builds one TSPL program per page. Device capabilities are negotiated once,
 * at construction; missing optional features fall back to safe defaults.
 */
export class TsplEncoder {
  readonly capabilities: NegotiatedCapabilities;
  private readonly reported = new Set<string>();

  constructor(device: DeviceCapabilities = TSPL_DEVICE_CAPABILITIES) {
    this.capabilities = negotiateCapabilities(device);
  }

  encodePage(binary: BinaryBuffer, settings: PrintSettings): CommandStream {
    if (binary.width <= 0 || binary.height <= 0) {
      throw new RenderError(`Cannot encode an empty ${binary.width}x${binary.height} bitmap`);
    }

    const directives: TsplDirective[] = [
      { kind: 'size', widthMm: settings.paperWidthMm, heightMm: dotsToMm(binary.height) },
    ];

    const speed = this.speedDirective(settings.speed);
    if (speed) directives.push(speed);

    const density = this.densityDirective(settings.darkness);
    if (density) directives.push(density);

    directives.push(this.mediaDirective(settings.mediaSensing));
    directives.push({ kind: 'cls' });
    directives.push(this.bitmapDirective(binary));
    directives.push({ kind: 'print', copies: 1 });

    return { directives };
  }

  encodePageBytes(binary: BinaryBuffer, settings: PrintSettings): Buffer {
    return serializeCommandStream(this.encodePage(binary, settings));
  }

  private speedDirective(ordinal: number): TsplDirective | null {
    const value = speedForOrdinal(ordinal);
    const cap = this.capabilities.speed;
    if (!cap.supported || !cap.value.has(value)) {
      this.report(new CapabilityUnsupported('speed', `Speed ${value} not supported, printer default used`));
      return null;
    }
    return { kind: 'speed', value };
  }

  private densityDirective(ordinal: number): TsplDirective | null {
    const value = densityForOrdinal(ordinal);
    const cap = this.capabilities.density;
    if (!cap.supported || !cap.value.has(value)) {
      this.report(new CapabilityUnsupported('density', `Density ${value} not supported, printer default used`));
      return null;
    }
    return { kind: 'density', value };
  }

  private mediaDirective(mode: MediaSensing): TsplDirective {
    switch (mode) {
      case 'continuous':
        return { kind: 'reference', x: 0, y: 0 };
      case 'blackMark':
        if (this.capabilities.blackMark.supported) {
          return { kind: 'blackMark', markMm: BLACK_MARK_MM, offsetMm: 0 };
        }
        this.report(new CapabilityUnsupported('blackMark', 'Black-mark sensing not supported, using zero gap'));
        return { kind: 'gap', gapMm: 0, offsetMm: 0 };
      case 'gap':
        return { kind: 'gap', gapMm: GAP_MM, offsetMm: 0 };
    }
  }

  private bitmapDirective(binary: BinaryBuffer): TsplDirective {
    const cap = this.capabilities.bitmap;
    if (!cap.supported) {
      throw new RenderError('Printer does not accept bitmap data');
    }
    const { widthBytes, data } = packBitmap(binary);
    if (cap.value === 'legacy') {
      this.report(new CapabilityUnsupported('extendedBitmap', 'Extended BITMAP not supported, using legacy form'));
      return { kind: 'bitmap', x: 0, y: 0, widthBytes, height: binary.height, data };
    }
    return { kind: 'bitmap', x: 0, y: 0, widthBytes, height: binary.height, mode: 'overwrite', data };
  }

  /** Warn once per missing capability, debug afterwards */
  private report(gap: CapabilityUnsupported): void {
    if (this.reported.has(gap.message)) {
      logger.debug({ capability: gap.capability }, gap.message);
      return;
    }
    this.reported.add(gap.message);
    logger.warn({ capability: gap.capability }, gap.message);
  }
}

