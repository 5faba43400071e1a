import type { PrintSettings } from './print-settings.model';

export type JobState =
  | { readonly kind: 'queued' }
  | { readonly kind: 'started' }
  | { readonly kind: 'rendering'; readonly page: number }
  | { readonly kind: 'transmitting'; readonly page: number }
  | { readonly kind: 'completed' }
  | { readonly kind: 'cancelled' }
  | { readonly kind: 'failed'; readonly reason: string };

export type JobStateKind = JobState['kind'];

export type TerminalJobState = Extract<JobState, { kind: 'completed' | 'cancelled' | 'failed' }>;

export function isTerminal(state: JobState): state is TerminalJobState {
  return state.kind === 'completed' || state.kind === 'cancelled' || state.kind === 'failed';
}

/**
 * Forward-only transitions. Cancelled and failed are reachable from any
 * non-terminal state; nothing leaves a terminal state.
 */
export function canTransition(from: JobState, to: JobState): boolean {
  if (isTerminal(from)) return false;
  if (to.kind === 'cancelled' || to.kind === 'failed') return true;

  switch (from.kind) {
    case 'queued':
      return to.kind === 'started';
    case 'started':
      return to.kind === 'rendering' && to.page === 0;
    case 'rendering':
      return to.kind === 'transmitting' && to.page === from.page;
    case 'transmitting':
      return (to.kind === 'rendering' && to.page === from.page + 1) || to.kind === 'completed';
  }
}

export function describeState(state: JobState): string {
  switch (state.kind) {
    case 'rendering':
    case 'transmitting':
      return `${state.kind}(${state.page})`;
    case 'failed':
      return `failed(${state.reason})`;
    default:
      return state.kind;
  }
}

/** Notifications delivered to the job status sink */
export type JobStatusEvent =
  | { readonly type: 'started'; readonly jobId: string }
  | { readonly type: 'pageProgress'; readonly jobId: string; readonly page: number; readonly total: number }
  | { readonly type: 'completed'; readonly jobId: string }
  | { readonly type: 'cancelled'; readonly jobId: string }
  | { readonly type: 'failed'; readonly jobId: string; readonly message: string };

export type JobStatusSink = (event: JobStatusEvent) => void;

/** Job record kept by the queue for the HTTP API */
export interface PrintJob {
  readonly id: string;
  readonly printer: string;
  readonly documentName: string;
  readonly state: JobState;
  readonly pagesTotal?: number;
  readonly pagesPrinted: number;
  /** Snapshot taken when the job started */
  readonly settings?: PrintSettings;
  readonly createdAt: Date;
  readonly completedAt?: Date;
  readonly error?: string;
}
