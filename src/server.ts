import cors from 'cors';
import express, { type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import {
  ProcessMessagesRequestSchema,
  RawMessageBatchSchema,
  UploadMessagesFormSchema,
} from './application/dto/ProcessMessagesDTO.js';
import { ReloadConfigRequestSchema } from './application/dto/ReloadConfigDTO.js';
import type { RawMessage } from './domain/entities/RawMessage.js';
import type { AppContainer } from './infrastructure/bootstrap/AppContainer.js';

const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: 5 * 1024 * 1024, // 5MB max
  },
  fileFilter: (req, file, cb) => {
    if (file.mimetype.startsWith('text/') || file.mimetype === 'application/octet-stream') {
      cb(null, true);
    } else {
      cb(new Error('Only plain text SMS exports are allowed'));
    }
  },
});

const sendError = (res: Response, error: unknown, fallback: string): void => {
  if (error instanceof ZodError) {
    res.status(400).json({ success: false, error: 'Invalid request body', issues: error.issues });
    return;
  }

  const message = error instanceof Error ? error.message : fallback;
  res.status(500).json({ success: false, error: message });
};

export const createServer = (container: AppContainer) => {
  const app = express();

  app.use(cors({ origin: '*', credentials: false }));
  app.use(express.json({ limit: '2mb' }));

  app.get('/', (req, res) => {
    res.json({
      name: 'SMS Transaction Inference Engine',
      version: '0.1.0',
      status: 'running',
      endpoints: {
        health: 'GET /',
        process: 'POST /api/messages/process',
        upload: 'POST /api/messages/upload',
        transactions: 'GET /api/transactions',
        bankStatistics: 'GET /api/banks/statistics',
        reload: 'POST /api/config/reload',
      },
    });
  });

  app.post('/api/messages/process', async (req, res) => {
    try {
      const body = ProcessMessagesRequestSchema.parse(req.body);
      const mode = body.mode ?? container.config.storage.defaultMode;
      const { summary, results } = await container.processingService.processBatch(body.messages, mode);

      res.json({ success: true, summary, results });
    } catch (error) {
      sendError(res, error, 'Unable to process messages');
    }
  });

  app.post('/api/messages/upload', upload.single('messages'), async (req, res) => {
    try {
      if (!req.file) {
        res.status(400).json({ success: false, error: 'No text file provided. Upload it as "messages".' });
        return;
      }

      const form = UploadMessagesFormSchema.parse(req.body);
      const lines: RawMessage[] = req.file.buffer
        .toString('utf8')
        .split(/\r?\n/)
        .filter((line) => line.trim().length > 0)
        .map((text) => ({ text, fileCreatedAt: form.lastModified ?? null }));

      if (lines.length === 0) {
        res.status(400).json({ success: false, error: 'Uploaded file contains no messages' });
        return;
      }

      const messages = RawMessageBatchSchema.parse(lines);

      const mode = form.mode ?? container.config.storage.defaultMode;
      const { summary, results } = await container.processingService.processBatch(messages, mode);

      container.logger.info(`✅ SMS export ingested: ${req.file.originalname} (${messages.length} messages)`);

      res.json({ success: true, fileName: req.file.originalname, summary, results });
    } catch (error) {
      sendError(res, error, 'Unable to ingest SMS export');
    }
  });

  app.get('/api/transactions', async (req, res) => {
    try {
      const records = await container.storage.listRecords();
      res.json({ success: true, count: records.length, records });
    } catch (error) {
      sendError(res, error, 'Unable to load transactions');
    }
  });

  app.get('/api/banks/statistics', async (req, res) => {
    try {
      const records = await container.storage.listRecords();
      const banks: Record<string, number> = {};

      for (const record of records) {
        banks[record.bankMatch.bankId] = (banks[record.bankMatch.bankId] ?? 0) + 1;
      }

      res.json({
        success: true,
        supportedBanks: container.bankIdentifier.supportedBanks().map((bank) => bank.id),
        banks,
        categories: container.categorizer.statistics(records),
      });
    } catch (error) {
      sendError(res, error, 'Unable to compute bank statistics');
    }
  });

  app.post('/api/config/reload', async (req, res) => {
    try {
      const { source } = ReloadConfigRequestSchema.parse(req.body ?? {});
      const outcomes = await container.configReloadService.reload(source);

      res.json({ success: outcomes.every((outcome) => outcome.status !== 'rejected'), outcomes });
    } catch (error) {
      sendError(res, error, 'Unable to reload configuration');
    }
  });

  app.use('/api', (req, res) => {
    res.status(404).json({ success: false, error: 'API endpoint not found' });
  });

  // Upload rejections from multer land here.
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    container.logger.error('Request failed:', error);
    sendError(res, error, 'Request failed');
  });

  return app;
};
