import { PDFDocument } from 'pdf-lib';
import sharp from 'sharp';
import { vi } from 'vitest';
import type { FormatHandler, HandlerFactory, OutputKind } from '../src/conversion/handlers.js';
import type { JobRegistry } from '../src/registry.js';
import type { ConversionOptions, JobView, UploadedFile } from '../src/types.js';

export const defaultOptions: ConversionOptions = {
  format: 'webp',
  quality: 85,
  maxWidth: 0,
  maxHeight: 0,
  combinePdf: false,
  ocr: false,
  preserveLayout: false,
};

export const upload = (name: string, data: Buffer | string, mimeType = 'image/png'): UploadedFile => ({
  name,
  mimeType,
  data: Buffer.isBuffer(data) ? data : Buffer.from(data),
});

export const makePng = (width: number, height: number, alpha = false): Promise<Buffer> =>
  sharp({
    create: {
      width,
      height,
      channels: alpha ? 4 : 3,
      background: alpha ? { r: 20, g: 120, b: 220, alpha: 0.5 } : { r: 20, g: 120, b: 220 },
    },
  })
    .png()
    .toBuffer();

export const makePdf = async (pages: number): Promise<Buffer> => {
  const pdf = await PDFDocument.create();
  for (let i = 0; i < pages; i++) pdf.addPage([200, 100]);
  return Buffer.from(await pdf.save());
};

export const pdfPageCount = async (data: Buffer): Promise<number> => (await PDFDocument.load(data)).getPageCount();

export const fakeHandlers = (convert: FormatHandler['convert'], kind: OutputKind = 'image'): HandlerFactory =>
  () => ({ kind, convert });

export const fakeMetrics = () => ({
  recordJobCreated: vi.fn().mockResolvedValue(undefined),
  recordJobCompleted: vi.fn().mockResolvedValue(undefined),
  recordJobFailed: vi.fn().mockResolvedValue(undefined),
  recordItemConverted: vi.fn().mockResolvedValue(undefined),
  recordItemFailed: vi.fn().mockResolvedValue(undefined),
  recordStatusRequest: vi.fn().mockResolvedValue(undefined),
  recordDownload: vi.fn().mockResolvedValue(undefined),
  snapshot: vi.fn(() => ({
    jobs_created: 1,
    jobs_completed: 1,
    jobs_failed: 0,
    items_converted: 3,
    items_failed: 0,
    status_requests: 4,
    downloads: 1,
  })),
});

export const waitForJob = (registry: JobRegistry, jobId: string): Promise<JobView> =>
  vi.waitFor(
    () => {
      const view = registry.getStatus(jobId);
      if (view.status !== 'done' && view.status !== 'error') throw new Error(`job ${jobId} is ${view.status}`);
      return view;
    },
    { timeout: 10000, interval: 20 },
  );

/** Deferred promise for holding a fake conversion until the test lets it go. */
export const gate = () => {
  let open: () => void = () => undefined;
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { open, opened };
};

const EOCD_SIGNATURE = Buffer.from([0x50, 0x4b, 0x05, 0x06]);
const CENTRAL_HEADER = 0x02014b50;

/** Entry names from a ZIP's central directory, in archive order. */
export function zipEntryNames(zip: Buffer): string[] {
  const eocd = zip.lastIndexOf(EOCD_SIGNATURE);
  if (eocd < 0) throw new Error('not a zip archive');

  const count = zip.readUInt16LE(eocd + 10);
  let offset = zip.readUInt32LE(eocd + 16);
  const names: string[] = [];

  for (let i = 0; i < count; i++) {
    if (zip.readUInt32LE(offset) !== CENTRAL_HEADER) throw new Error(`bad central directory entry at ${offset}`);
    const nameLength = zip.readUInt16LE(offset + 28);
    const extraLength = zip.readUInt16LE(offset + 30);
    const commentLength = zip.readUInt16LE(offset + 32);
    names.push(zip.toString('utf8', offset + 46, offset + 46 + nameLength));
    offset += 46 + nameLength + extraLength + commentLength;
  }
  return names;
}
