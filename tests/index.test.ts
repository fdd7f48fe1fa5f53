import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createWorkerPool, type WorkerPool } from '../daemons/worker.js';
import { createApp } from '../src/app.js';
import type { FormatHandler } from '../src/conversion/handlers.js';
import { baseName } from '../src/conversion/source.js';
import { loadConfig } from '../src/config.js';
import { createServices, type Services } from '../src/index.js';
import { JobRegistry } from '../src/registry.js';
import { fakeHandlers, fakeMetrics, gate, makePng, waitForJob, zipEntryNames } from './helpers.js';

const mockDb = vi.hoisted(() => ({
  put: vi.fn().mockResolvedValue(true),
  get: vi.fn().mockReturnValue(undefined),
  transaction: vi.fn((cb: () => unknown) => cb()),
  close: vi.fn().mockResolvedValue(undefined),
}));

vi.mock('lmdb', () => ({
  open: () => mockDb,
}));

const toWebp: FormatHandler['convert'] = async (source) => [
  { name: `${baseName(source.name)}.webp`, data: Buffer.from(`webp:${source.name}`) },
];

describe('HTTP API', () => {
  let tmpDir: string;
  let registry: JobRegistry;
  let metrics: ReturnType<typeof fakeMetrics>;
  let pool: WorkerPool | null;

  const setup = (convert: FormatHandler['convert'], { maxFileBytes = 1024 * 1024 } = {}) => {
    pool = createWorkerPool(
      { registry, metrics, handlerFor: fakeHandlers(convert), tmpDir, conversionTimeoutMs: 5000 },
      1,
    );
    const running = pool;
    registry.setScheduler((jobId) => running.enqueue(jobId));
    running.start();
    return createApp({ registry, metrics, maxFileBytes, maxFiles: 10 });
  };

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    tmpDir = await mkdtemp(path.join(os.tmpdir(), 'api-test-'));
    registry = new JobRegistry({ archiveTtlMs: 60_000, jobTtlMs: 60_000 });
    metrics = fakeMetrics();
    pool = null;
  });

  afterEach(async () => {
    await pool?.stop();
    await registry.close();
    await rm(tmpDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('POST /start', () => {
    it('returns the job id and file count', async () => {
      const app = setup(toWebp);

      const res = await request(app)
        .post('/start')
        .field('format', 'webp')
        .attach('files', Buffer.from('one'), 'one.png')
        .attach('files', Buffer.from('two'), 'two.png');

      expect(res.status).toBe(200);
      expect(res.body.total).toBe(2);
      expect(res.body.job_id).toMatch(/^[0-9a-f]{32}$/);
      expect(metrics.recordJobCreated).toHaveBeenCalledTimes(1);
    });

    it('returns 400 when no files are uploaded', async () => {
      const app = setup(toWebp);

      const res = await request(app).post('/start').field('format', 'webp');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'No files uploaded' });
      expect(registry.size).toBe(0);
    });

    it('returns 400 for an unknown output format', async () => {
      const app = setup(toWebp);

      const res = await request(app)
        .post('/start')
        .field('format', 'gif')
        .attach('files', Buffer.from('one'), 'one.png');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'format must be one of webp, jpeg, png, avif, pdf, docx' });
    });

    it('returns 400 for an out-of-range quality', async () => {
      const app = setup(toWebp);

      const res = await request(app)
        .post('/start')
        .field('quality', '5')
        .attach('files', Buffer.from('one'), 'one.png');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'quality must be between 10 and 100' });
    });

    it('keeps non-ASCII filenames intact', async () => {
      const app = setup(toWebp);

      const started = await request(app).post('/start').attach('files', Buffer.from('img'), 'café.png');
      const jobId: string = started.body.job_id;
      await waitForJob(registry, jobId);

      expect(registry.getStatus(jobId).items[0].name).toBe('café.png');
      const download = await request(app).get(`/download/${jobId}`).responseType('blob');
      expect(zipEntryNames(download.body)).toEqual(['café.webp']);
    });

    it('decodes RFC 5987 encoded filenames', async () => {
      const app = setup(toWebp);
      const boundary = 'test-boundary';
      const body = [
        `--${boundary}`,
        `Content-Disposition: form-data; name="files"; filename*=UTF-8''%C3%BCber%20caf%C3%A9.png`,
        'Content-Type: image/png',
        '',
        'img',
        `--${boundary}--`,
        '',
      ].join('\r\n');

      const started = await request(app)
        .post('/start')
        .set('Content-Type', `multipart/form-data; boundary=${boundary}`)
        .send(body);

      expect(started.status).toBe(200);
      expect(registry.getStatus(started.body.job_id).items[0]).toMatchObject({ name: 'über café.png', size: 3 });
    });

    it('returns 413 when a file exceeds the upload limit', async () => {
      const app = setup(toWebp, { maxFileBytes: 8 });

      const res = await request(app)
        .post('/start')
        .attach('files', Buffer.alloc(64, 1), 'big.png');

      expect(res.status).toBe(413);
      expect(res.body).toEqual({ error: 'File too large' });
      expect(registry.size).toBe(0);
    });
  });

  describe('GET /status/:jobId', () => {
    it('returns 404 for an unknown job', async () => {
      const app = setup(toWebp);

      const res = await request(app).get('/status/does-not-exist');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'Job does-not-exist not found' });
    });

    it('reports per-item outcomes once the job finishes', async () => {
      const app = setup(async (source, ctx) => {
        if (source.name === 'bad.png') throw new Error('unsupported image format');
        return toWebp(source, ctx);
      });

      const started = await request(app)
        .post('/start')
        .attach('files', Buffer.from('good'), 'good.png')
        .attach('files', Buffer.from('bad'), 'bad.png');
      const jobId: string = started.body.job_id;
      await waitForJob(registry, jobId);

      const res = await request(app).get(`/status/${jobId}`);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        total: 2,
        processed: 2,
        status: 'done',
        error: null,
        items: [
          { name: 'good.png', size: 4, status: 'done', error: null },
          { name: 'bad.png', size: 3, status: 'error', error: 'unsupported image format' },
        ],
      });
    });
  });

  describe('GET /download/:jobId', () => {
    it('returns 404 for an unknown job', async () => {
      const app = setup(toWebp);

      const res = await request(app).get('/download/does-not-exist');

      expect(res.status).toBe(404);
    });

    it('returns 409 while the job is still processing', async () => {
      const hold = gate();
      const app = setup(async (source, ctx) => {
        await hold.opened;
        return toWebp(source, ctx);
      });

      const started = await request(app).post('/start').attach('files', Buffer.from('a'), 'a.png');
      const jobId: string = started.body.job_id;

      const res = await request(app).get(`/download/${jobId}`);
      hold.open();

      expect(res.status).toBe(409);
      expect(res.body).toEqual({ error: `Job ${jobId} is not ready` });
    });

    it('serves the archive once and returns 410 afterwards', async () => {
      const app = setup(toWebp);

      const started = await request(app)
        .post('/start')
        .attach('files', Buffer.from('a'), 'a.png')
        .attach('files', Buffer.from('b'), 'b.png');
      const jobId: string = started.body.job_id;
      await waitForJob(registry, jobId);

      const first = await request(app).get(`/download/${jobId}`).responseType('blob');
      expect(first.status).toBe(200);
      expect(first.headers['content-type']).toMatch(/^application\/zip/);
      expect(first.headers['content-disposition']).toBe('attachment; filename="converted_files.zip"');
      expect(zipEntryNames(first.body)).toEqual(['a.webp', 'b.webp']);
      expect(metrics.recordDownload).toHaveBeenCalledTimes(1);

      const second = await request(app).get(`/download/${jobId}`);
      expect(second.status).toBe(410);
      expect(second.body).toEqual({ error: `Output of job ${jobId} is no longer available` });
    });

    it('returns 422 when every item failed', async () => {
      const app = setup(async () => {
        throw new Error('corrupt');
      });

      const started = await request(app).post('/start').attach('files', Buffer.from('a'), 'a.png');
      const jobId: string = started.body.job_id;
      await waitForJob(registry, jobId);

      const res = await request(app).get(`/download/${jobId}`);

      expect(res.status).toBe(422);
      expect(res.body).toEqual({ error: `Job ${jobId} failed: No files were converted successfully` });
    });
  });

  it('serves the upload page', async () => {
    const app = setup(toWebp);

    const res = await request(app).get('/');

    expect(res.status).toBe(200);
    expect(res.text).toContain('<title>Batch Media Converter</title>');
  });

  it('reports health and metrics', async () => {
    const app = setup(toWebp);
    metrics.snapshot.mockReturnValue({
      jobs_created: 12,
      jobs_completed: 9,
      jobs_failed: 2,
      items_converted: 40,
      items_failed: 5,
      status_requests: 310,
      downloads: 8,
    });

    const health = await request(app).get('/health');
    const counters = await request(app).get('/metrics');

    expect(health.body).toEqual({ ok: true, jobs: 0 });
    expect(metrics.snapshot).toHaveBeenCalledTimes(1);
    expect(counters.body).toEqual({
      jobs_created: 12,
      jobs_completed: 9,
      jobs_failed: 2,
      items_converted: 40,
      items_failed: 5,
      status_requests: 310,
      downloads: 8,
    });
  });
});

describe('createServices', () => {
  let tmpDir: string;
  let services: Services;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.clearAllMocks();
    tmpDir = await mkdtemp(path.join(os.tmpdir(), 'services-test-'));
    services = createServices(loadConfig({ TMP_DIR: tmpDir, WORKER_CONCURRENCY: '2' }));
    services.pool.start();
  });

  afterEach(async () => {
    await services.shutdown();
    await rm(tmpDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('converts a batch of images to resized WebP and zips them', async () => {
    const png = await makePng(200, 100);

    const started = await request(services.app)
      .post('/start')
      .field('format', 'webp')
      .field('quality', '80')
      .field('max_width', '50')
      .attach('files', png, 'a.png')
      .attach('files', png, 'b.png')
      .attach('files', png, 'c.png');
    expect(started.status).toBe(200);
    expect(started.body.total).toBe(3);

    const view = await waitForJob(services.registry, started.body.job_id);
    expect(view.status).toBe('done');
    expect(view.items.map((item) => item.status)).toEqual(['done', 'done', 'done']);

    const res = await request(services.app).get(`/download/${started.body.job_id}`).responseType('blob');
    expect(res.status).toBe(200);
    expect(zipEntryNames(res.body)).toEqual(['a.webp', 'b.webp', 'c.webp']);
    expect(mockDb.transaction).toHaveBeenCalled();
  });

  it('reports a file that is not an image as a failed item', async () => {
    const png = await makePng(20, 20);

    const started = await request(services.app)
      .post('/start')
      .attach('files', Buffer.from('definitely not an image'), 'notes.png')
      .attach('files', png, 'ok.png');

    const view = await waitForJob(services.registry, started.body.job_id);
    expect(view.status).toBe('done');
    expect(view.items[0].status).toBe('error');
    expect(view.items[1]).toEqual({ name: 'ok.png', size: png.length, status: 'done', error: null });

    const res = await request(services.app).get(`/download/${started.body.job_id}`).responseType('blob');
    expect(zipEntryNames(res.body)).toEqual(['ok.webp']);
  });
});
