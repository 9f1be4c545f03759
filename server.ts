import express, { Express, Request, Response } from 'express';
import multer, { FileFilterCallback } from 'multer';
import cors from 'cors';
import dotenv from 'dotenv';
import { unlink } from 'fs/promises';
import * as os from 'os';
import { createPipelineContext, PipelineContext } from './services/PipelineContext';
import { IngestResult } from './types';
import { loadConfig } from './utils/config';
import { IngestionError, InvalidRequestError, errorMessage } from './utils/errors';

const allowedMimes = [
  'application/pdf',
  'text/plain',
  'application/msword',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document'
];

const upload = multer({
  dest: os.tmpdir(),
  limits: {
    fileSize: 10 * 1024 * 1024
  },
  fileFilter: (_req: Request, file: Express.Multer.File, cb: FileFilterCallback) => {
    const name = file.originalname.toLowerCase();
    if (allowedMimes.includes(file.mimetype) || name.endsWith('.txt') || name.endsWith('.pdf') || name.endsWith('.docx')) {
      cb(null, true);
    } else {
      cb(new Error('Invalid file type. Only PDF, DOCX and text files are allowed.'));
    }
  }
});

// CORS configuration - allow local front ends
const allowedOrigins = [
  /^http:\/\/localhost(:\d+)?$/,
  /^http:\/\/127\.0\.0\.1(:\d+)?$/
];

function sendError(res: Response, error: unknown, label: string): Response {
  if (error instanceof InvalidRequestError) {
    return res.status(400).json({ error: label, message: error.message });
  }
  if (error instanceof IngestionError) {
    return res.status(422).json({ error: label, code: error.code, message: error.message });
  }
  console.error(`[Server] ERROR: ${label}:`, error);
  return res.status(500).json({ error: label, message: errorMessage(error) });
}

function readPositiveInt(value: unknown, fallback: number): number {
  const parsed = typeof value === 'number' ? value : parseInt(String(value ?? ''), 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function createApp(context: PipelineContext): Express {
  const { screening, config } = context;
  const app = express();

  app.use(cors({
    origin: (origin, callback) => {
      // Allow requests with no origin (like curl requests)
      if (!origin) return callback(null, true);
      if (allowedOrigins.some(pattern => pattern.test(origin))) {
        callback(null, true);
      } else {
        callback(new Error('Not allowed by CORS'));
      }
    }
  }));
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'healthy',
      oracle: context.oracle?.name ?? 'fallback',
      timestamp: new Date().toISOString()
    });
  });

  app.post('/api/resumes', (req: Request, res: Response, next) => {
    upload.array('resumes', 20)(req, res, (err: unknown) => {
      if (err) {
        res.status(400).json({ error: 'Upload error', message: errorMessage(err) });
        return;
      }
      next();
    });
  }, async (req: Request, res: Response) => {
    const files = Array.isArray(req.files) ? req.files : [];
    if (files.length === 0) {
      console.warn(`[Server] Upload request rejected: No files provided`);
      return res.status(400).json({
        error: 'No file uploaded',
        message: "Please provide one or more files in the 'resumes' field"
      });
    }

    const ingested: IngestResult[] = [];
    const failed: Array<{ filename: string; code?: string; message: string }> = [];

    // Sequential: each document is contained, one failure does not stop the rest
    for (const file of files) {
      try {
        ingested.push(await screening.ingest(file.path, { filename: file.originalname, mimetype: file.mimetype }));
      } catch (error) {
        console.error(`[Server] ERROR: Failed to ingest ${file.originalname}:`, error);
        failed.push({
          filename: file.originalname,
          code: error instanceof IngestionError ? error.code : undefined,
          message: errorMessage(error)
        });
      } finally {
        await unlink(file.path).catch(err => console.warn(`[Server] Could not remove upload ${file.path}:`, err));
      }
    }

    return res.status(ingested.length > 0 ? 201 : 422).json({ ingested, failed });
  });

  app.get('/api/resumes', async (_req: Request, res: Response) => {
    try {
      const resumes = await screening.listDocuments();
      return res.json({ count: resumes.length, resumes });
    } catch (error) {
      return sendError(res, error, 'Failed to list resumes');
    }
  });

  app.get('/api/resumes/:id', async (req: Request, res: Response) => {
    try {
      const resume = await screening.getDocument(req.params.id);
      if (!resume) {
        return res.status(404).json({ error: 'Resume not found', documentId: req.params.id });
      }
      return res.json(resume);
    } catch (error) {
      return sendError(res, error, 'Failed to fetch resume');
    }
  });

  app.delete('/api/resumes/:id', async (req: Request, res: Response) => {
    try {
      await screening.deleteDocument(req.params.id);
      return res.status(204).send();
    } catch (error) {
      return sendError(res, error, 'Failed to delete resume');
    }
  });

  app.post('/api/query', async (req: Request, res: Response) => {
    try {
      const { keywords, topK } = req.body ?? {};
      const results = await screening.query(String(keywords ?? ''), readPositiveInt(topK, config.topK));
      return res.json({ resultsCount: results.length, results });
    } catch (error) {
      return sendError(res, error, 'Query failed');
    }
  });

  app.post('/api/analyze', async (req: Request, res: Response) => {
    try {
      const { jobDescription, topK } = req.body ?? {};
      const result = await screening.analyze(String(jobDescription ?? ''), readPositiveInt(topK, config.topK));
      if (result.status === 'empty') {
        return res.status(404).json({ error: 'No matching resumes', reason: result.reason });
      }
      return res.json({ report: result.report, candidates: result.contexts.length });
    } catch (error) {
      return sendError(res, error, 'Analysis failed');
    }
  });

  app.post('/api/rank', async (req: Request, res: Response) => {
    try {
      const { jobDescription, topKPerDocument, maxDocuments } = req.body ?? {};
      const max = readPositiveInt(maxDocuments, 0);
      const result = await screening.rank(
        String(jobDescription ?? ''),
        readPositiveInt(topKPerDocument, 3),
        max > 0 ? max : undefined
      );
      if (result.status === 'empty') {
        return res.status(404).json({ error: 'No resumes indexed', reason: result.reason });
      }
      return res.json({ count: result.reports.length, reports: result.reports });
    } catch (error) {
      return sendError(res, error, 'Ranking failed');
    }
  });

  return app;
}

function startServer(): void {
  dotenv.config();
  const config = loadConfig();
  const context = createPipelineContext(config);
  const app = createApp(context);

  const server = app.listen(config.port, () => {
    console.log(`[Server] Server started on port ${config.port}`);
    console.log(`[Server] Health check available at http://localhost:${config.port}/health`);
  });

  const shutdown = () => {
    server.close(() => process.exit(0));
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

if (require.main === module) {
  startServer();
}
