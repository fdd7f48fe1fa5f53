import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { recordSafely, type Metrics } from '../observability/metrics.js';
import type { HandlerFactory } from '../src/conversion/handlers.js';
import { withTimeout } from '../src/conversion/timeout.js';
import { ItemConversionError, toErrorMessage } from '../src/errors.js';
import { packageOutputs, type StagedOutput } from '../src/packaging.js';
import type { JobRegistry } from '../src/registry.js';

export interface WorkerDeps {
  registry: JobRegistry;
  handlerFor: HandlerFactory;
  metrics: Pick<
    Metrics,
    'recordItemConverted' | 'recordItemFailed' | 'recordJobCompleted' | 'recordJobFailed'
  >;
  tmpDir: string;
  conversionTimeoutMs: number;
}

export interface WorkerPool {
  enqueue(jobId: string): void;
  start(): void;
  stop(): Promise<void>;
}

const pid = process.pid;
const log = (workerId: number, msg: string) => console.log(`[PID ${pid}] [Worker ${workerId}] ${msg}`);

/**
 * Converts every item of a job in submission order, then packages the
 * successful outputs. Item failures are recorded on the item and never stop
 * the batch; packaging failures fail the job.
 */
export async function processJob(jobId: string, workerId: number, deps: WorkerDeps): Promise<void> {
  const { registry, metrics } = deps;

  const job = registry.claim(jobId);
  if (!job) {
    log(workerId, `Job ${jobId} is no longer queued, skipping`);
    return;
  }

  log(workerId, `Processing job ${jobId} (${job.total} file(s), format ${job.options.format})`);
  const sources = registry.takeSources(jobId);
  let workDir: string | undefined;

  try {
    const handler = deps.handlerFor(job.options);
    const scratch = await mkdtemp(path.join(deps.tmpDir, `job-${jobId}-`));
    workDir = scratch;
    const outDir = path.join(scratch, 'out');
    await mkdir(outDir);

    const staged: StagedOutput[] = [];

    for (const [index, source] of sources.entries()) {
      registry.markItemProcessing(jobId, index);
      try {
        const outputs = await withTimeout(deps.conversionTimeoutMs, (signal) =>
          handler.convert(source, { index, workDir: scratch, signal }),
        );
        if (outputs.length === 0) {
          throw new ItemConversionError('Conversion produced no output');
        }

        const itemStaged: StagedOutput[] = [];
        for (const [n, output] of outputs.entries()) {
          const outputPath = path.join(outDir, `${index}-${n}`);
          await writeFile(outputPath, output.data);
          itemStaged.push({ name: output.name, path: outputPath });
        }
        staged.push(...itemStaged);

        registry.markItemDone(jobId, index);
        log(workerId, `Job ${jobId}: ${source.name} converted`);
        await recordSafely('recordItemConverted', () => metrics.recordItemConverted());
      } catch (err) {
        const message = toErrorMessage(err);
        registry.markItemFailed(jobId, index, message);
        log(workerId, `Job ${jobId}: ${source.name} failed: ${message}`);
        await recordSafely('recordItemFailed', () => metrics.recordItemFailed());
      }
    }

    try {
      const archive = await packageOutputs({
        jobId,
        outputs: staged,
        combinePdf: handler.kind === 'pdf' && job.options.combinePdf,
        outDir: deps.tmpDir,
      });
      registry.completeJob(jobId, archive);
      log(workerId, `Job ${jobId} complete (${archive.entries.length} entr${archive.entries.length === 1 ? 'y' : 'ies'})`);
      await recordSafely('recordJobCompleted', () => metrics.recordJobCompleted());
    } catch (err) {
      const message = toErrorMessage(err);
      registry.failJob(jobId, message);
      log(workerId, `Job ${jobId} failed: ${message}`);
      await recordSafely('recordJobFailed', () => metrics.recordJobFailed());
    }
  } catch (err) {
    const message = `Job could not be processed: ${toErrorMessage(err)}`;
    registry.abortJob(jobId, message);
    log(workerId, `Job ${jobId} aborted: ${message}`);
    await recordSafely('recordJobFailed', () => metrics.recordJobFailed());
  } finally {
    if (workDir) await rm(workDir, { recursive: true, force: true });
  }
}

/**
 * In-process pool of `concurrency` worker loops. Each loop takes the next
 * queued job id and runs it to completion before taking another.
 */
export function createWorkerPool(deps: WorkerDeps, concurrency: number): WorkerPool {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error('concurrency must be an integer >= 1');
  }

  const queue: string[] = [];
  const waiting: Array<(jobId: string | null) => void> = [];
  let stopped = false;
  let running: Promise<void> | null = null;

  const claimJob = (): Promise<string | null> => {
    if (stopped) return Promise.resolve(null);
    const next = queue.shift();
    if (next !== undefined) return Promise.resolve(next);
    return new Promise((resolve) => waiting.push(resolve));
  };

  const runWorker = async (workerId: number): Promise<void> => {
    log(workerId, 'Started');
    while (true) {
      const jobId = await claimJob();
      if (jobId === null) break;

      try {
        await processJob(jobId, workerId, deps);
      } catch (err) {
        log(workerId, `Unexpected failure on job ${jobId}: ${toErrorMessage(err)}`);
        deps.registry.abortJob(jobId, toErrorMessage(err));
      }
    }
    log(workerId, 'Stopped');
  };

  return {
    enqueue(jobId) {
      if (stopped) throw new Error('Worker pool is stopped');
      const wake = waiting.shift();
      if (wake) wake(jobId);
      else queue.push(jobId);
    },
    start() {
      if (running) return;
      console.log(`[PID ${pid}] Starting ${concurrency} worker(s)`);
      running = Promise.all(Array.from({ length: concurrency }, (_, i) => runWorker(i + 1))).then(() => undefined);
    },
    async stop() {
      stopped = true;
      waiting.splice(0).forEach((wake) => wake(null));
      await running;
    },
  };
}
