import { Router, Request, Response } from 'express';
import { listDitherModes } from '../services/dithering';
import { getSettings, updateSettings } from '../services/settings.service';
import { errorMessage } from '../utils/errors';
import { printSettingsPatchSchema } from '../validators/settings.validator';

const router = Router();

/** GET /api/settings - Current print settings */
router.get('/', (_req: Request, res: Response) => {
  res.json({ success: true, data: getSettings(), ditherModes: listDitherModes() });
});

/** PUT /api/settings - Update and persist print settings */
router.put('/', (req: Request, res: Response) => {
  try {
    const patch = printSettingsPatchSchema.parse(req.body);
    res.json({ success: true, data: updateSettings(patch) });
  } catch (error) {
    res.status(400).json({ success: false, error: errorMessage(error) });
  }
});

export default router;
