import express, { type ErrorRequestHandler, type Express, type Request } from 'express';
import multer from 'multer';
import { existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { recordSafely, type Metrics } from '../observability/metrics.js';
import { AppError } from './errors.js';
import { parseConversionOptions } from './options.js';
import type { JobRegistry } from './registry.js';
import type { UploadedFile } from './types.js';

export interface AppDeps {
  registry: JobRegistry;
  metrics: Pick<Metrics, 'recordJobCreated' | 'recordStatusRequest' | 'recordDownload' | 'snapshot'>;
  maxFileBytes: number;
  maxFiles: number;
}

const pid = process.pid;
const log = (msg: string) => console.log(`[PID ${pid}] [HTTP] ${msg}`);

// public/ sits next to src/ in the repo and next to dist/ once built.
const publicDir = [new URL('../public/', import.meta.url), new URL('../../public/', import.meta.url)]
  .map((url) => fileURLToPath(url))
  .find((dir) => existsSync(dir));

const uploadedFiles = (req: Request): UploadedFile[] => {
  const files = Array.isArray(req.files) ? req.files : [];
  return files.map((file) => ({
    name: file.originalname || 'file',
    mimeType: file.mimetype,
    data: file.buffer,
  }));
};

const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof multer.MulterError) {
    const status = err.code === 'LIMIT_FILE_SIZE' || err.code === 'LIMIT_FILE_COUNT' ? 413 : 400;
    res.status(status).json({ error: err.message });
    return;
  }
  if (err instanceof AppError) {
    res.status(err.statusCode).json({ error: err.message });
    return;
  }

  log(`Unhandled error: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
  res.status(500).json({ error: 'Internal Server Error' });
};

export function createApp(deps: AppDeps): Express {
  const { registry, metrics } = deps;
  const app = express();
  const upload = multer({
    storage: multer.memoryStorage(),
    // Browsers send plain filename parameters as raw UTF-8.
    defParamCharset: 'utf8',
    limits: { fileSize: deps.maxFileBytes, files: deps.maxFiles },
  });

  if (publicDir) app.use(express.static(publicDir));

  app.get('/health', (_req, res) => {
    res.json({ ok: true, jobs: registry.size });
  });

  app.get('/metrics', (_req, res) => {
    res.json(metrics.snapshot());
  });

  app.post('/start', upload.array('files', deps.maxFiles), async (req, res, next) => {
    try {
      const options = parseConversionOptions(req.body ?? {});
      const { jobId, total } = registry.submit(uploadedFiles(req), options);
      log(`Job ${jobId} queued (${total} file(s), format ${options.format})`);
      await recordSafely('recordJobCreated', () => metrics.recordJobCreated());
      res.json({ job_id: jobId, total });
    } catch (err) {
      next(err);
    }
  });

  app.get('/status/:jobId', async (req, res, next) => {
    try {
      const view = registry.getStatus(req.params.jobId);
      await recordSafely('recordStatusRequest', () => metrics.recordStatusRequest());
      res.json(view);
    } catch (err) {
      next(err);
    }
  });

  app.get('/download/:jobId', async (req, res, next) => {
    const { jobId } = req.params;
    try {
      const archive = registry.getArchive(jobId);
      await recordSafely('recordDownload', () => metrics.recordDownload());

      res.download(archive.path, archive.filename, { headers: { 'Content-Type': archive.contentType } }, (err) => {
        void archive.release().then(
          () => log(`Archive of job ${jobId} delivered and removed`),
          (releaseErr: unknown) => log(`Cleanup of job ${jobId} failed: ${releaseErr}`),
        );
        if (err) {
          log(`Download of job ${jobId} failed: ${err.message}`);
          if (!res.headersSent) next(err);
        }
      });
    } catch (err) {
      next(err);
    }
  });

  app.use(errorHandler);
  return app;
}
