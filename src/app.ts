import cors from 'cors';
import express, { type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import { z } from 'zod';
import { SelectionPatchSchema } from './application/dto/SelectionPatchDTO.js';
import type { BillUpload } from './application/services/BillIngestionService.js';
import type { DashboardLoadResult, DashboardSession } from './application/services/DashboardSession.js';
import type { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { UnsupportedUploadError, toHttpError } from './infrastructure/http/ErrorMapper.js';

const billFilePattern = /\.(xlsx|xls|csv)$/i;

const SummaryQuerySchema = z.object({
  year: z.coerce.number().int().optional(),
});

const sendError = (res: Response, error: unknown) => {
  const { status, body } = toHttpError(error);

  if (status >= 500) {
    console.error('Dashboard request failed:', error);
  }

  res.status(status).json(body);
};

const toUpload = (file: Express.Multer.File): BillUpload => ({
  content: file.buffer,
  fileName: file.originalname,
});

const describeSession = (session: DashboardSession, load: DashboardLoadResult) => ({
  sessionId: session.id,
  load,
  charts: session.listCharts(),
  selections: session.listSelections(),
});

export const createApp = (container: AppContainer) => {
  const app = express();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: container.config.upload.maxBytes,
      files: 1,
    },
    fileFilter: (req, file, cb) => {
      if (billFilePattern.test(file.originalname)) {
        cb(null, true);
      } else {
        cb(new UnsupportedUploadError(file.originalname));
      }
    },
  });

  app.use(cors({ origin: '*', credentials: false }));
  app.use(express.json({ limit: '1mb' }));

  app.get('/api/health', (req, res) => {
    res.json({
      name: 'Bill Dashboard API',
      version: '0.1.0',
      sessions: container.sessions.size,
      columns: container.config.bill.columns,
      trendCategories: container.config.bill.trendCategoryOrder,
    });
  });

  app.post('/api/sessions', upload.single('bill'), async (req, res) => {
    try {
      if (!req.file) {
        res.status(400).json({ error: 'No bill file provided. Upload it as the "bill" field.' });
        return;
      }

      const { session, load } = await container.sessions.open(toUpload(req.file));
      res.status(201).json(describeSession(session, load));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.put('/api/sessions/:sessionId/bill', upload.single('bill'), async (req, res) => {
    try {
      const session = container.sessions.get(req.params.sessionId);

      if (!req.file) {
        res.status(400).json({ error: 'No bill file provided. Upload it as the "bill" field.' });
        return;
      }

      const load = await session.load(toUpload(req.file));
      res.json(describeSession(session, load));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/api/sessions/:sessionId/charts', (req, res) => {
    try {
      const session = container.sessions.get(req.params.sessionId);
      res.json({ charts: session.listCharts(), selections: session.listSelections() });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/api/sessions/:sessionId/charts/:chartId', (req, res) => {
    try {
      const session = container.sessions.get(req.params.sessionId);
      res.json(session.chart(req.params.chartId));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.patch('/api/sessions/:sessionId/charts/:chartId/selection', (req, res) => {
    try {
      const session = container.sessions.get(req.params.sessionId);
      const patch = SelectionPatchSchema.parse(req.body ?? {});
      res.json(session.select(req.params.chartId, patch));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/api/sessions/:sessionId/summary', (req, res) => {
    try {
      const session = container.sessions.get(req.params.sessionId);
      const { year } = SummaryQuerySchema.parse(req.query);
      res.json(session.summary(year));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.delete('/api/sessions/:sessionId', async (req, res) => {
    try {
      await container.sessions.close(req.params.sessionId);
      res.status(204).end();
    } catch (error) {
      sendError(res, error);
    }
  });

  app.use('/api', (req, res) => {
    res.status(404).json({ error: 'API endpoint not found' });
  });

  // multer rejections arrive here rather than in the route handlers
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    sendError(res, error);
  });

  return app;
};
