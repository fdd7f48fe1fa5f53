export type JobStatus = 'queued' | 'processing' | 'done' | 'error';
export type ItemStatus = JobStatus;

export type ImageFormat = 'webp' | 'jpeg' | 'png' | 'avif';
export type OutputFormat = ImageFormat | 'pdf' | 'docx';

export interface ConversionOptions {
  format: OutputFormat;
  quality: number;
  maxWidth: number;
  maxHeight: number;
  combinePdf: boolean;
  ocr: boolean;
  preserveLayout: boolean;
}

export interface UploadedFile {
  name: string;
  mimeType: string;
  data: Buffer;
}

export interface Item {
  name: string;
  size: number;
  status: ItemStatus;
  error: string | null;
}

export interface Archive {
  path: string;
  filename: string;
  contentType: string;
}

export type ArchiveState = 'pending' | 'ready' | 'consumed' | 'expired';

export interface Job {
  id: string;
  total: number;
  processed: number;
  status: JobStatus;
  error: string | null;
  items: Item[];
  options: ConversionOptions;
  archive: Archive | null;
  archiveState: ArchiveState;
  createdAt: number;
  finishedAt: number | null;
}

// Wire shape of GET /status/:jobId.
export interface JobView {
  total: number;
  processed: number;
  status: JobStatus;
  error: string | null;
  items: Item[];
}

export interface OutputFile {
  name: string;
  data: Buffer;
}
