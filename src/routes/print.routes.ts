import { Router, Request, Response } from 'express';
import multer from 'multer';
import { bufferDocumentSource, type DocumentSource } from '../services/document.service';
import { getJobQueue } from '../services/job-queue.service';
import { resolvePrinterId } from '../services/printer.service';
import { getSettings } from '../services/settings.service';
import { base64ToBuffer } from '../utils/base64';
import { errorMessage } from '../utils/errors';
import { printRequestSchema } from '../validators/print.validator';

const router = Router();

const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: 20 * 1024 * 1024 }, // 20MB max
});

/**
 * POST /api/print - Queue a document for printing.
 * Multipart `document` file, or a base64 `document` field in JSON.
 */
router.post('/', upload.single('document'), async (req: Request, res: Response) => {
  try {
    const parsed = printRequestSchema.parse(req.body);

    let document: DocumentSource;
    if (req.file) {
      document = bufferDocumentSource(parsed.documentName || req.file.originalname, req.file.buffer);
    } else if (parsed.document) {
      document = bufferDocumentSource(parsed.documentName || 'document', base64ToBuffer(parsed.document));
    } else {
      return res.status(400).json({ success: false, error: 'No document provided' });
    }

    const printerId = await resolvePrinterId(parsed.printer, getSettings());
    const result = getJobQueue().submit({ printerId, document, settings: parsed.settings });
    if (!result.accepted) {
      return res.status(400).json({ success: false, error: result.reason });
    }

    res.status(202).json({ success: true, jobId: result.jobId, printer: printerId });
  } catch (error) {
    res.status(400).json({ success: false, error: errorMessage(error) });
  }
});

export default router;
