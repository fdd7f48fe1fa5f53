import { randomUUID } from 'node:crypto';
import { rm } from 'node:fs/promises';
import {
  InvalidInputError,
  JobExpiredError,
  JobFailedError,
  JobNotFoundError,
  JobNotReadyError,
} from './errors.js';
import type { Archive, ConversionOptions, Job, JobView, UploadedFile } from './types.js';

export interface RetentionPolicy {
  archiveTtlMs: number;
  jobTtlMs: number;
}

export interface ArchiveHandle extends Archive {
  release(): Promise<void>;
}

export type JobScheduler = (jobId: string) => void;

const pid = process.pid;
const log = (msg: string) => console.log(`[PID ${pid}] [Registry] ${msg}`);

const deleteFile = async (path: string): Promise<void> => {
  try {
    await rm(path, { force: true });
  } catch (err) {
    log(`Failed to delete ${path}: ${err}`);
  }
};

/**
 * In-memory job store shared by request handlers and workers.
 *
 * Workers change a job only through the mark and complete methods below.
 * Each of them runs to completion synchronously, so a status read can never
 * see a half-applied transition, and readers get a copy rather than the live
 * record.
 */
export class JobRegistry {
  private readonly jobs = new Map<string, Job>();
  private readonly sources = new Map<string, UploadedFile[]>();
  private sweeper: NodeJS.Timeout | null = null;
  private scheduler: JobScheduler | null = null;

  constructor(
    private readonly retention: RetentionPolicy,
    private readonly now: () => number = Date.now,
  ) {}

  setScheduler(scheduler: JobScheduler): void {
    this.scheduler = scheduler;
  }

  get size(): number {
    return this.jobs.size;
  }

  submit(files: UploadedFile[], options: ConversionOptions): { jobId: string; total: number } {
    if (files.length === 0) {
      throw new InvalidInputError('No files uploaded');
    }
    if (!this.scheduler) {
      throw new Error('JobRegistry has no scheduler attached');
    }

    const jobId = randomUUID().replace(/-/g, '');
    this.jobs.set(jobId, {
      id: jobId,
      total: files.length,
      processed: 0,
      status: 'queued',
      error: null,
      items: files.map((file) => ({ name: file.name, size: file.data.length, status: 'queued', error: null })),
      options: { ...options },
      archive: null,
      archiveState: 'pending',
      createdAt: this.now(),
      finishedAt: null,
    });
    this.sources.set(jobId, files);

    this.scheduler(jobId);
    return { jobId, total: files.length };
  }

  getStatus(jobId: string): JobView {
    const job = this.require(jobId);
    return {
      total: job.total,
      processed: job.processed,
      status: job.status,
      error: job.error,
      items: job.items.map((item) => ({ ...item })),
    };
  }

  /**
   * Hands out the finished archive once. The job is flagged as consumed
   * before the caller starts streaming, so a second request gets
   * JobExpiredError even while the first transfer is still running.
   */
  getArchive(jobId: string): ArchiveHandle {
    const job = this.require(jobId);

    if (job.status === 'queued' || job.status === 'processing') {
      throw new JobNotReadyError(jobId);
    }
    if (job.status === 'error') {
      throw new JobFailedError(jobId, job.error);
    }
    if (job.archiveState !== 'ready' || !job.archive) {
      throw new JobExpiredError(jobId);
    }

    const archive = job.archive;
    job.archiveState = 'consumed';
    job.archive = null;

    return {
      ...archive,
      release: () => deleteFile(archive.path),
    };
  }

  // Worker mutation contract.

  claim(jobId: string): Job | null {
    const job = this.jobs.get(jobId);
    if (!job || job.status !== 'queued') return null;
    job.status = 'processing';
    return { ...job, options: { ...job.options }, items: job.items.map((item) => ({ ...item })) };
  }

  takeSources(jobId: string): UploadedFile[] {
    const files = this.sources.get(jobId) ?? [];
    this.sources.delete(jobId);
    return files;
  }

  markItemProcessing(jobId: string, index: number): void {
    const item = this.requireProcessing(jobId).items[index];
    if (!item || item.status !== 'queued') {
      throw new Error(`Item ${index} of job ${jobId} cannot start from state ${item?.status ?? 'missing'}`);
    }
    item.status = 'processing';
  }

  markItemDone(jobId: string, index: number): void {
    this.finishItem(jobId, index, null);
  }

  markItemFailed(jobId: string, index: number, message: string): void {
    this.finishItem(jobId, index, message);
  }

  completeJob(jobId: string, archive: Archive): void {
    const job = this.requireAllItemsTerminal(jobId);
    job.archive = { ...archive };
    job.archiveState = 'ready';
    job.status = 'done';
    job.finishedAt = this.now();
  }

  failJob(jobId: string, message: string): void {
    const job = this.requireAllItemsTerminal(jobId);
    job.status = 'error';
    job.error = message;
    job.archiveState = 'expired';
    job.finishedAt = this.now();
  }

  /**
   * Ends a job the worker could not run to completion: every unfinished
   * item fails with `message`, then the job itself.
   */
  abortJob(jobId: string, message: string): void {
    const job = this.jobs.get(jobId);
    if (!job || job.status === 'done' || job.status === 'error') return;

    for (const item of job.items) {
      if (item.status === 'queued' || item.status === 'processing') {
        item.status = 'error';
        item.error = message;
        job.processed += 1;
      }
    }
    job.status = 'error';
    job.error = message;
    job.archiveState = 'expired';
    job.finishedAt = this.now();
    this.sources.delete(jobId);
  }

  // Retention.

  async sweep(now = this.now()): Promise<void> {
    const doomed: string[] = [];

    for (const job of this.jobs.values()) {
      if (job.finishedAt === null) continue;
      const age = now - job.finishedAt;

      if (job.archiveState === 'ready' && job.archive && age >= this.retention.archiveTtlMs) {
        doomed.push(job.archive.path);
        job.archive = null;
        job.archiveState = 'expired';
        log(`Archive of job ${job.id} expired unclaimed`);
      }

      if (age >= this.retention.jobTtlMs) {
        if (job.archive) doomed.push(job.archive.path);
        this.jobs.delete(job.id);
        log(`Evicted job ${job.id}`);
      }
    }

    await Promise.all(doomed.map(deleteFile));
  }

  startSweeper(intervalMs: number): void {
    if (this.sweeper) return;
    this.sweeper = setInterval(() => {
      this.sweep().catch((err) => log(`Sweep failed: ${err}`));
    }, intervalMs);
    this.sweeper.unref();
  }

  async close(): Promise<void> {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }

    const paths: string[] = [];
    for (const job of this.jobs.values()) {
      if (job.archive) paths.push(job.archive.path);
    }
    this.jobs.clear();
    this.sources.clear();
    await Promise.all(paths.map(deleteFile));
  }

  private require(jobId: string): Job {
    const job = this.jobs.get(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    return job;
  }

  private requireProcessing(jobId: string): Job {
    const job = this.require(jobId);
    if (job.status !== 'processing') {
      throw new Error(`Job ${jobId} is ${job.status}, expected processing`);
    }
    return job;
  }

  private requireAllItemsTerminal(jobId: string): Job {
    const job = this.requireProcessing(jobId);
    if (job.processed !== job.total) {
      throw new Error(`Job ${jobId} still has ${job.total - job.processed} unfinished item(s)`);
    }
    return job;
  }

  private finishItem(jobId: string, index: number, error: string | null): void {
    const job = this.requireProcessing(jobId);
    const item = job.items[index];
    if (!item || item.status !== 'processing') {
      throw new Error(`Item ${index} of job ${jobId} cannot finish from state ${item?.status ?? 'missing'}`);
    }
    item.status = error === null ? 'done' : 'error';
    item.error = error;
    job.processed += 1;
  }
}
