import path from 'node:path';
import type { UploadedFile } from '../types.js';

const PDF_MAGIC = Buffer.from('%PDF-');

export const isPdf = (file: UploadedFile): boolean =>
  file.data.subarray(0, 1024).includes(PDF_MAGIC) ||
  file.mimeType === 'application/pdf' ||
  path.extname(file.name).toLowerCase() === '.pdf';

export const baseName = (name: string): string => {
  const parsed = path.parse(path.basename(name));
  return parsed.name || 'file';
};
