import { Router, Request, Response } from 'express';
import { listPrinters } from '../services/printer.service';
import { getSettings } from '../services/settings.service';
import { errorMessage } from '../utils/errors';

const router = Router();

/** GET /api/printers - List discovered printers */
router.get('/', async (_req: Request, res: Response) => {
  try {
    const printers = await listPrinters(getSettings());
    res.json({ success: true, data: printers });
  } catch (error) {
    res.status(500).json({ success: false, error: errorMessage(error) });
  }
});

export default router;
