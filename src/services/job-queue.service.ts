import { v4 as uuidv4 } from 'uuid';
import { config } from '../config';
import {
  isTerminal,
  type JobState,
  type JobStatusEvent,
  type JobStatusSink,
  type PrintJob,
} from '../models/print-job.model';
import type { PrintSettings } from '../models/print-settings.model';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { createQueuedSink } from '../utils/status-dispatcher';
import type { PrintSettingsPatch } from '../validators/settings.validator';
import { sharpRendererFactory, type DocumentSource } from './document.service';
import { PrintJobRunner, type PrintJobRunnerDeps } from './print-job.service';
import { applySettingsPatch, getSettings } from './settings.service';
import { createTransport } from './transport.service';

const JOB_TTL_MS = 60 * 60 * 1000; // 1 hour

export interface SubmitJobParams {
  readonly printerId: string | undefined;
  readonly document: DocumentSource;
  /** Applied over the settings snapshot taken when the job starts */
  readonly settings?: PrintSettingsPatch;
}

export type SubmitResult =
  | { readonly accepted: true; readonly jobId: string }
  | { readonly accepted: false; readonly reason: string };

export interface JobQueueDeps extends Omit<PrintJobRunnerDeps, 'onStatus' | 'onStateChange'> {
  /** Read once per job, when it starts */
  readonly settingsProvider: () => PrintSettings;
  readonly statusSink?: JobStatusSink;
  readonly jobTtlMs?: number;
}

interface PendingJob {
  readonly id: string;
  readonly params: SubmitJobParams & { readonly printerId: string };
}

/**
 * Serial print queue: one job runs at a time, the rest wait in FIFO order.
 * Job records stay in memory and expire after an hour.
 */
export class JobQueue {
  private readonly jobs = new Map<string, PrintJob>();
  private readonly pending: PendingJob[] = [];
  private active: PrintJobRunner | null = null;
  private processing: Promise<void> | null = null;
  private readonly notify: JobStatusSink;

  constructor(private readonly deps: JobQueueDeps) {
    const sink = deps.statusSink;
    this.notify = createQueuedSink((event) => {
      this.recordEvent(event);
      sink?.(event);
    });
  }

  submit(params: SubmitJobParams): SubmitResult {
    const printerId = params.printerId?.trim();
    if (!printerId) {
      logger.warn({ document: params.document.name }, 'Print job rejected: no printer selected');
      return { accepted: false, reason: 'No printer selected' };
    }

    const id = uuidv4();
    const job: PrintJob = {
      id,
      printer: printerId,
      documentName: params.document.name,
      state: { kind: 'queued' },
      pagesPrinted: 0,
      createdAt: new Date(),
    };
    this.jobs.set(id, job);
    this.scheduleCleanup(id);
    this.pending.push({ id, params: { ...params, printerId } });
    logger.info({ jobId: id, printer: printerId, document: job.documentName }, 'Print job queued');

    this.startProcessing();
    return { accepted: true, jobId: id };
  }

  /** Request cancellation; takes effect at the next page boundary */
  cancel(jobId: string): boolean {
    const idx = this.pending.findIndex((p) => p.id === jobId);
    if (idx !== -1) {
      this.pending.splice(idx, 1);
      this.updateJob(jobId, { state: { kind: 'cancelled' }, completedAt: new Date() });
      this.notify({ type: 'cancelled', jobId });
      logger.info({ jobId }, 'Queued print job cancelled');
      return true;
    }
    if (this.active && this.active.id === jobId) {
      this.active.requestCancel();
      return true;
    }
    return false;
  }

  getJob(jobId: string): PrintJob | undefined {
    return this.jobs.get(jobId);
  }

  /** Most recent first */
  getAllJobs(limit = 50): PrintJob[] {
    return Array.from(this.jobs.values())
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit);
  }

  getQueueStats() {
    const all = Array.from(this.jobs.values());
    const count = (kinds: readonly JobState['kind'][]) => all.filter((j) => kinds.includes(j.state.kind)).length;
    return {
      total: all.length,
      queued: count(['queued']),
      printing: count(['started', 'rendering', 'transmitting']),
      completed: count(['completed']),
      cancelled: count(['cancelled']),
      failed: count(['failed']),
    };
  }

  /** Resolves once every queued job has finished */
  whenIdle(): Promise<void> {
    return this.processing ?? Promise.resolve();
  }

  private startProcessing(): void {
    if (this.processing) return;
    this.processing = this.processQueue()
      .catch((error) => {
        logger.error({ error: errorMessage(error) }, 'Print queue worker stopped unexpectedly');
      })
      .finally(() => {
        this.processing = null;
        if (this.pending.length > 0) this.startProcessing();
      });
  }

  private async processQueue(): Promise<void> {
    for (let next = this.pending.shift(); next; next = this.pending.shift()) {
      await this.runJob(next);
    }
  }

  private async runJob({ id, params }: PendingJob): Promise<void> {
    let settings: PrintSettings;
    try {
      settings = applySettingsPatch(this.deps.settingsProvider(), params.settings ?? {});
    } catch (error) {
      const reason = `Invalid print settings: ${errorMessage(error)}`;
      this.updateJob(id, { state: { kind: 'failed', reason }, error: reason, completedAt: new Date() });
      this.notify({ type: 'failed', jobId: id, message: reason });
      return;
    }
    this.updateJob(id, { settings });

    const runner = new PrintJobRunner(
      { id, printerId: params.printerId, document: params.document, settings },
      {
        ...this.deps,
        onStatus: this.notify,
        onStateChange: (state) => this.onStateChange(id, state),
      },
    );
    this.active = runner;
    try {
      await runner.run();
    } finally {
      this.active = null;
    }
  }

  private onStateChange(jobId: string, state: JobState): void {
    if (!isTerminal(state)) {
      this.updateJob(jobId, { state });
      return;
    }
    this.updateJob(jobId, {
      state,
      completedAt: new Date(),
      error: state.kind === 'failed' ? state.reason : undefined,
    });
  }

  private recordEvent(event: JobStatusEvent): void {
    if (event.type === 'pageProgress') {
      this.updateJob(event.jobId, { pagesPrinted: event.page, pagesTotal: event.total });
    }
  }

  private updateJob(jobId: string, patch: Partial<Omit<PrintJob, 'id'>>): void {
    const job = this.jobs.get(jobId);
    if (!job) return;
    this.jobs.set(jobId, { ...job, ...patch });
  }

  private scheduleCleanup(jobId: string): void {
    const timer = setTimeout(() => {
      if (this.jobs.delete(jobId)) {
        logger.debug({ jobId }, 'Expired job cleaned up');
      }
    }, this.deps.jobTtlMs ?? JOB_TTL_MS);
    timer.unref();
  }
}

// Event handler for Socket.IO integration
type JobEventHandler = (event: JobStatusEvent) => void;
let eventHandler: JobEventHandler | null = null;

export function setJobEventHandler(handler: JobEventHandler): void {
  eventHandler = handler;
}

let defaultQueue: JobQueue | null = null;

/** The process-wide queue wired to sharp, the serial/TCP transports and stored settings */
export function getJobQueue(): JobQueue {
  if (!defaultQueue) {
    defaultQueue = new JobQueue({
      rendererFactory: sharpRendererFactory,
      createTransport,
      tmpDir: config.tmpDir,
      settleDelayMs: config.settleDelayMs,
      supersample: config.supersample,
      settingsProvider: getSettings,
      statusSink: (event) => eventHandler?.(event),
    });
  }
  return defaultQueue;
}
