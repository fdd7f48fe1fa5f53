import { open, type RootDatabase } from 'lmdb';

const KEYS = {
  JOBS_CREATED: 'jobs_created',
  JOBS_COMPLETED: 'jobs_completed',
  JOBS_FAILED: 'jobs_failed',
  ITEMS_CONVERTED: 'items_converted',
  ITEMS_FAILED: 'items_failed',
  STATUS_REQUESTS: 'status_requests',
  DOWNLOADS: 'downloads',
} as const;

export type MetricName = (typeof KEYS)[keyof typeof KEYS];

export type MetricsSnapshot = Record<MetricName, number>;

export class Metrics {
  private db: RootDatabase;

  constructor(path: string = './metrics') {
    this.db = open({ path });
  }

  private async increment(key: MetricName): Promise<void> {
    await this.db.transaction(() => {
      const current = (this.db.get(key) as number | undefined) ?? 0;
      this.db.put(key, current + 1);
    });
  }

  recordJobCreated(): Promise<void> {
    return this.increment(KEYS.JOBS_CREATED);
  }

  recordJobCompleted(): Promise<void> {
    return this.increment(KEYS.JOBS_COMPLETED);
  }

  recordJobFailed(): Promise<void> {
    return this.increment(KEYS.JOBS_FAILED);
  }

  recordItemConverted(): Promise<void> {
    return this.increment(KEYS.ITEMS_CONVERTED);
  }

  recordItemFailed(): Promise<void> {
    return this.increment(KEYS.ITEMS_FAILED);
  }

  recordStatusRequest(): Promise<void> {
    return this.increment(KEYS.STATUS_REQUESTS);
  }

  recordDownload(): Promise<void> {
    return this.increment(KEYS.DOWNLOADS);
  }

  snapshot(): MetricsSnapshot {
    const read = (key: MetricName) => (this.db.get(key) as number | undefined) ?? 0;
    return {
      jobs_created: read(KEYS.JOBS_CREATED),
      jobs_completed: read(KEYS.JOBS_COMPLETED),
      jobs_failed: read(KEYS.JOBS_FAILED),
      items_converted: read(KEYS.ITEMS_CONVERTED),
      items_failed: read(KEYS.ITEMS_FAILED),
      status_requests: read(KEYS.STATUS_REQUESTS),
      downloads: read(KEYS.DOWNLOADS),
    };
  }

  close(): Promise<void> {
    return this.db.close();
  }
}

/** Counters are best effort; a failed write is logged and never surfaces to callers. */
export async function recordSafely(label: string, write: () => Promise<void>): Promise<void> {
  try {
    await write();
  } catch (err) {
    console.warn(`[PID ${process.pid}] [Metrics] ${label} failed: ${err instanceof Error ? err.message : String(err)}`);
  }
}
