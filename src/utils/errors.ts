/** Classified failures of the print pipeline. */
export type PrintErrorCode = 'DOCUMENT' | 'TRANSPORT' | 'RENDER' | 'CAPABILITY_UNSUPPORTED';

export class PrintPipelineError extends Error {
  public readonly code: PrintErrorCode;

  constructor(message: string, code: PrintErrorCode, cause?: unknown) {
    super(message);
    this.name = 'PrintPipelineError';
    this.code = code;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/** Document could not be read, copied, or has no pages */
export class DocumentError extends PrintPipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, 'DOCUMENT', cause);
    this.name = 'DocumentError';
  }
}

/** Transport could not be opened or a write was rejected */
export class TransportError extends PrintPipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, 'TRANSPORT', cause);
    this.name = 'TransportError';
  }
}

/** A page could not be rasterized or its bitmap could not be encoded */
export class RenderError extends PrintPipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, 'RENDER', cause);
    this.name = 'RenderError';
  }
}

/** An optional device feature is missing; callers fall back instead of failing */
export class CapabilityUnsupported extends PrintPipelineError {
  public readonly capability: string;

  constructor(capability: string, message?: string) {
    super(message ?? `Printer does not support ${capability}`, 'CAPABILITY_UNSUPPORTED');
    this.name = 'CapabilityUnsupported';
    this.capability = capability;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
