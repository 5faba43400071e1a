import type { JobStatusEvent, JobStatusSink } from '../models/print-job.model';
import { errorMessage } from './errors';
import { logger } from './logger';

/**
 * Queues status events for a sink instead of calling it from the worker.
 * Events are delivered in order on a later macrotask.
 */
export function createQueuedSink(sink: JobStatusSink): JobStatusSink {
  const queue: JobStatusEvent[] = [];
  let scheduled = false;

  const drain = (): void => {
    scheduled = false;
    const batch = queue.splice(0, queue.length);
    for (const event of batch) {
      try {
        sink(event);
      } catch (error) {
        logger.error({ event: event.type, jobId: event.jobId, error: errorMessage(error) }, 'Status sink threw');
      }
    }
  };

  return (event) => {
    queue.push(event);
    if (!scheduled) {
      scheduled = true;
      setImmediate(drain);
    }
  };
}
