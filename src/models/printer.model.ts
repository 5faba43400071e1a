export interface PrinterCapabilities {
  readonly mediaWidthMm: number;
  readonly mediaHeightMm: number;
  readonly dpi: number;
  readonly color: 'monochrome';
}

/** A printer surfaced by discovery; `id` is the transport address */
export interface PrinterInfo {
  readonly id: string;
  readonly displayName: string;
  readonly capabilities: PrinterCapabilities;
}
