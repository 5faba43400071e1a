import { Router, Request, Response } from 'express';
import { getJobQueue } from '../services/job-queue.service';

const router = Router();

/** GET /api/jobs - List recent print jobs */
router.get('/', (req: Request, res: Response) => {
  const limit = parseInt(String(req.query.limit ?? ''), 10) || 50;
  const queue = getJobQueue();
  res.json({ success: true, data: queue.getAllJobs(limit), stats: queue.getQueueStats() });
});

/** GET /api/jobs/:id - Get a specific job */
router.get('/:id', (req: Request, res: Response) => {
  const job = getJobQueue().getJob(String(req.params.id));
  if (!job) {
    return res.status(404).json({ success: false, error: 'Job not found' });
  }
  res.json({ success: true, data: job });
});

/** POST /api/jobs/:id/cancel - Cancel at the next page boundary */
router.post('/:id/cancel', (req: Request, res: Response) => {
  const id = String(req.params.id);
  if (!getJobQueue().cancel(id)) {
    return res.status(404).json({ success: false, error: 'Job not found or already finished' });
  }
  res.json({ success: true, jobId: id });
});

export default router;
