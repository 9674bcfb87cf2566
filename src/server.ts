import 'dotenv/config';

import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import path from 'path';
import { fileURLToPath } from 'url';
import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { processOrdinances } from './batch.js';
import type { BatchOptions } from './batch.js';
import { writeWorkbook, XLSX_MIME } from './xls-export.js';
import { saveRunLog } from './logging/storage.js';
import type { BatchResult, UploadedOrdinance } from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const UPLOAD_PAGE = path.join(__dirname, '../public/index.html');

function readFlag(req: Request, name: string, fallback: boolean): boolean {
  const body: Record<string, unknown> = typeof req.body === 'object' && req.body !== null ? req.body : {};
  const fromQuery = req.query[name];
  const raw = typeof fromQuery === 'string' ? fromQuery : body[name];
  if (typeof raw !== 'string' || raw === '') return fallback;
  return !['0', 'false', 'no', 'off'].includes(raw.trim().toLowerCase());
}

function uploadedFiles(req: Request): UploadedOrdinance[] {
  const files = Array.isArray(req.files) ? req.files : [];
  return files.map(f => ({ filename: f.originalname, data: f.buffer }));
}

/**
 * Batch warnings and unreadable PDFs for the X-Warnings header, as URI-encoded JSON
 */
export function warningsHeader(result: BatchResult): string {
  const failures = result.failures.map(f => ({ filename: f.filename, error: f.error }));
  return encodeURIComponent(JSON.stringify({ warnings: result.warnings, failures }));
}

function persistRun(config: AppConfig, result: BatchResult): void {
  if (!config.saveRunLogs) return;
  try {
    saveRunLog(config.logsDir, {
      metrics: result.metrics,
      documents: result.documents.map(d => ({ filename: d.filename, elixId: d.record.elixId, warnings: d.warnings })),
      failures: result.failures.map(f => ({ filename: f.filename, error: f.error })),
    });
  } catch (logError) {
    console.error('[LOG] Failed to save run log:', logError);
  }
}

export function createApp(config: AppConfig = loadConfig(), overrides: Pick<BatchOptions, 'extractText'> = {}) {
  const app = express();
  app.use(cors({ exposedHeaders: ['Content-Disposition', 'X-Warnings'] }));

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.maxUploadMb * 1024 * 1024 },
    fileFilter: (_req, file, cb) => {
      cb(null, /\.pdf$/i.test(file.originalname));
    },
  });

  async function runBatch(req: Request): Promise<{ result: BatchResult; diagnostics: boolean }> {
    const diagnostics = readFlag(req, 'diagnostics', false);
    const result = await processOrdinances(uploadedFiles(req), {
      orderByElix: readFlag(req, 'orderByElix', true),
      diagnostics,
      softUploadLimit: config.softUploadLimit,
      ...overrides,
    });
    persistRun(config, result);
    return { result, diagnostics };
  }

  app.get('/health', (req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  app.get('/', (req: Request, res: Response) => {
    res.sendFile(UPLOAD_PAGE);
  });

  /**
   * POST /api/ordinanze/parse
   * Extracted records as JSON, in export order
   */
  app.post('/api/ordinanze/parse', upload.array('files'), async (req: Request, res: Response) => {
    try {
      const { result, diagnostics } = await runBatch(req);
      res.json({
        count: result.documents.length,
        documents: result.documents.map(d => ({ filename: d.filename, record: d.record, warnings: d.warnings })),
        failures: result.failures,
        warnings: result.warnings,
        ...(diagnostics ? { diagnostics: result.documents.map(d => ({ filename: d.filename, ...d.diagnostics })) } : {}),
      });
    } catch (error) {
      console.error('[XLS] Parse error:', error);
      res.status(500).json({ error: error instanceof Error ? error.message : 'Failed to parse ordinances' });
    }
  });

  /**
   * POST /api/ordinanze/xlsx
   * Spreadsheet with one column per uploaded PDF
   */
  app.post('/api/ordinanze/xlsx', upload.array('files'), async (req: Request, res: Response) => {
    if (uploadedFiles(req).length === 0) {
      res.status(400).json({ error: 'Nessun PDF caricato' });
      return;
    }

    try {
      const { result, diagnostics } = await runBatch(req);
      if (result.documents.length === 0) {
        res.status(422).json({ error: 'Nessun PDF leggibile', failures: result.failures });
        return;
      }

      const workbook = writeWorkbook(result.documents, diagnostics);
      console.log(`[XLS] Excel generato (${result.documents.length} colonne / PDF)`);

      res.setHeader('Content-Type', XLSX_MIME);
      res.setHeader('Content-Disposition', 'attachment; filename="ordinanze.xlsx"');
      res.setHeader('X-Warnings', warningsHeader(result));
      res.send(workbook);
    } catch (error) {
      console.error('[XLS] Errore durante la generazione dell\'Excel:', error);
      res.status(500).json({ error: error instanceof Error ? error.message : 'Failed to generate workbook' });
    }
  });

  // Multer rejects oversized uploads before the handlers run
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      res.status(400).json({ error: err.message, code: err.code });
      return;
    }
    next(err);
  });

  return app;
}

export function onUncaughtException(error: Error): void {
  console.error('[UNCAUGHT EXCEPTION]', error);
  if (error.message.includes('ECONNRESET') || error.message.includes('ETIMEDOUT')) {
    console.log('[RECOVERY] Ignoring network error, continuing...');
    return;
  }
  process.exit(1);
}

// Run if called directly
if (import.meta.url === `file://${process.argv[1]}`) {
  // Prevent unhandled promise rejections from crashing the server
  process.on('unhandledRejection', (reason) => {
    console.error('[UNHANDLED REJECTION]', reason);
  });
  process.on('uncaughtException', onUncaughtException);

  const config = loadConfig();
  createApp(config).listen(config.port, () => {
    console.log(`[SERVER] Ordinance extractor listening on http://localhost:${config.port}`);
  });
}
