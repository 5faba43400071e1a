import {
  canTransition,
  describeState,
  isTerminal,
  type JobState,
  type JobStatusEvent,
  type JobStatusSink,
  type TerminalJobState,
} from '../models/print-job.model';
import type { PrintSettings } from '../models/print-settings.model';
import { DocumentError, PrintPipelineError, TransportError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { ResourceStack } from '../utils/resource-stack';
import { dither } from './dithering';
import { createSeekableCopy, type DocumentSource, type RendererFactory } from './document.service';
import { rasterizePage } from './rasterizer.service';
import { normalizeTone } from './tone.service';
import type { TransportFactory } from './transport.service';
import { TsplEncoder } from './tspl.service';

export interface PrintJobRequest {
  readonly id: string;
  /** Transport address of the printer (serial path or tcp://host:port) */
  readonly printerId: string;
  readonly document: DocumentSource;
  /** Snapshot resolved when the job starts; never re-read mid-job */
  readonly settings: PrintSettings;
}

export interface PrintJobRunnerDeps {
  readonly rendererFactory: RendererFactory;
  readonly createTransport: TransportFactory;
  readonly tmpDir: string;
  readonly settleDelayMs: number;
  readonly supersample: number;
  /** Receives lifecycle notifications; pass a queued sink to keep delivery off the worker */
  readonly onStatus?: JobStatusSink;
  readonly onStateChange?: (state: JobState) => void;
  readonly sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Drives one job end to end: copies the document to a seekable temp file,
 * opens the renderer and the transport, then loops pages through
 * rasterize -> tone -> dither -> encode -> write.
 *
 * Cancellation is cooperative and only observed at the top of each page; a
 * page already being rendered runs to completion. Whatever the outcome, the
 * transport, renderer and temp copy are released in reverse acquisition order.
 */
export class PrintJobRunner {
  private state: JobState = { kind: 'queued' };
  private cancelRequested = false;
  private readonly resources = new ResourceStack();
  private running: Promise<TerminalJobState> | null = null;

  constructor(
    private readonly request: PrintJobRequest,
    private readonly deps: PrintJobRunnerDeps,
  ) {}

  get id(): string {
    return this.request.id;
  }

  get currentState(): JobState {
    return this.state;
  }

  /** Names of resources not yet released */
  get heldResources(): string[] {
    return this.resources.held;
  }

  requestCancel(): void {
    if (isTerminal(this.state) || this.cancelRequested) return;
    this.cancelRequested = true;
    logger.info({ jobId: this.request.id, state: describeState(this.state) }, 'Cancellation requested');
  }

  /** Runs the job once; later calls return the same outcome */
  run(): Promise<TerminalJobState> {
    if (!this.running) {
      this.running = this.execute();
    }
    return this.running;
  }

  private async execute(): Promise<TerminalJobState> {
    const { id: jobId, printerId, settings } = this.request;
    let outcome: TerminalJobState;

    try {
      if (this.cancelRequested) {
        outcome = { kind: 'cancelled' };
      } else {
        this.transition({ kind: 'started' });
        this.notify({ type: 'started', jobId });
        outcome = await this.printPages();
      }
    } catch (error) {
      const reason = errorMessage(error);
      const code = error instanceof PrintPipelineError ? error.code : undefined;
      logger.error({ jobId, printerId, error: reason, code }, 'Print job failed');
      outcome = { kind: 'failed', reason };
    }

    this.transition(outcome);
    await this.resources.releaseAll();

    switch (outcome.kind) {
      case 'completed':
        logger.info({ jobId, printerId, ditherMode: settings.ditherMode }, 'Print job completed');
        this.notify({ type: 'completed', jobId });
        break;
      case 'cancelled':
        logger.info({ jobId, printerId }, 'Print job cancelled');
        this.notify({ type: 'cancelled', jobId });
        break;
      case 'failed':
        this.notify({ type: 'failed', jobId, message: outcome.reason });
        break;
    }
    return outcome;
  }

  private async printPages(): Promise<TerminalJobState> {
    const { id: jobId, printerId, document, settings } = this.request;
    const { rendererFactory, createTransport, tmpDir, settleDelayMs, supersample } = this.deps;
    const sleep = this.deps.sleep ?? defaultSleep;

    const copy = await createSeekableCopy(document, tmpDir);
    this.resources.push('seekable copy', () => copy.release());

    const renderer = await rendererFactory.open(copy.path);
    this.resources.push('renderer', () => renderer.close());

    const total = renderer.pageCount();
    if (total <= 0) {
      throw new DocumentError(`Document "${document.name}" has no pages`);
    }

    const transport = createTransport(printerId);
    this.resources.push('transport', () => transport.close());
    if (!(await transport.open(printerId))) {
      throw new TransportError(`Cannot connect to printer: ${printerId}`);
    }

    const encoder = new TsplEncoder(transport.capabilities);
    logger.info(
      { jobId, printerId, pages: total, widthMm: settings.paperWidthMm, dither: settings.ditherMode, threshold: settings.threshold },
      'Printing document',
    );

    for (let page = 0; page < total; page++) {
      if (this.cancelRequested) {
        return { kind: 'cancelled' };
      }

      this.transition({ kind: 'rendering', page });
      const rgb = await rasterizePage(renderer, page, { paperWidthMm: settings.paperWidthMm, supersample });
      const gray = normalizeTone(rgb, settings.contrast, settings.brightness);
      const binary = dither(gray, settings.ditherMode, settings.threshold);
      const bytes = encoder.encodePageBytes(binary, settings);

      this.transition({ kind: 'transmitting', page });
      if (!(await transport.write(bytes))) {
        throw new TransportError(`Write to printer ${printerId} failed on page ${page + 1}`);
      }
      logger.debug({ jobId, page: page + 1, total, bytes: bytes.length }, 'Page transmitted');
      this.notify({ type: 'pageProgress', jobId, page: page + 1, total });

      await sleep(settleDelayMs);
    }

    return { kind: 'completed' };
  }

  private transition(next: JobState): void {
    if (!canTransition(this.state, next)) {
      throw new Error(`Illegal job state transition ${describeState(this.state)} -> ${describeState(next)}`);
    }
    this.state = next;
    this.deps.onStateChange?.(next);
  }

  private notify(event: JobStatusEvent): void {
    this.deps.onStatus?.(event);
  }
}
