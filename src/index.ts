import { createWorkerPool, type WorkerPool } from '../daemons/worker.js';
import { Metrics } from '../observability/metrics.js';
import { createApp } from './app.js';
import { loadConfig, type Config } from './config.js';
import { createHandlerFactory } from './conversion/handlers.js';
import { JobRegistry } from './registry.js';

export interface Services {
  app: ReturnType<typeof createApp>;
  registry: JobRegistry;
  pool: WorkerPool;
  metrics: Metrics;
  shutdown(): Promise<void>;
}

export function createServices(config: Config): Services {
  const metrics = new Metrics(config.metricsPath);
  const registry = new JobRegistry({ archiveTtlMs: config.archiveTtlMs, jobTtlMs: config.jobTtlMs });
  const pool = createWorkerPool(
    {
      registry,
      metrics,
      handlerFor: createHandlerFactory({
        binaries: config.binaries,
        ocrLang: config.ocrLang,
        toolTimeoutMs: config.conversionTimeoutMs,
      }),
      tmpDir: config.tmpDir,
      conversionTimeoutMs: config.conversionTimeoutMs,
    },
    config.workerConcurrency,
  );
  registry.setScheduler((jobId) => pool.enqueue(jobId));

  const app = createApp({ registry, metrics, maxFileBytes: config.maxFileBytes, maxFiles: config.maxFiles });

  return {
    app,
    registry,
    pool,
    metrics,
    async shutdown() {
      await pool.stop();
      await registry.close();
      await metrics.close();
    },
  };
}

if (process.env.NODE_ENV !== 'test') {
  const config = loadConfig();
  const services = createServices(config);
  services.pool.start();
  services.registry.startSweeper(config.sweepIntervalMs);

  const server = services.app.listen(config.port, () => {
    console.log(`Server running at http://localhost:${config.port}`);
  });

  const stop = (signal: string) => {
    console.log(`[PID ${process.pid}] ${signal} received, shutting down`);
    server.close();
    services.shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(`[PID ${process.pid}] Shutdown failed: ${err}`);
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => stop('SIGINT'));
  process.once('SIGTERM', () => stop('SIGTERM'));
}
