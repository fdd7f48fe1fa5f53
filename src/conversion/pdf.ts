import { PDFDocument } from 'pdf-lib';
import type { ConversionOptions } from '../types.js';
import { encodeForPdf } from './image.js';

/** One-page PDF sized to the image. */
export async function imageToPdf(
  input: Buffer,
  options: Pick<ConversionOptions, 'quality' | 'maxWidth' | 'maxHeight'>,
): Promise<Buffer> {
  const encoded = await encodeForPdf(input, options);
  const pdf = await PDFDocument.create();
  const image = encoded.kind === 'png' ? await pdf.embedPng(encoded.data) : await pdf.embedJpg(encoded.data);

  const page = pdf.addPage([image.width, image.height]);
  page.drawImage(image, { x: 0, y: 0, width: image.width, height: image.height });

  return Buffer.from(await pdf.save());
}

/** Loads and re-saves a PDF, which also drops unreachable objects. */
export async function normalizePdf(input: Buffer): Promise<Buffer> {
  const pdf = await PDFDocument.load(input);
  return Buffer.from(await pdf.save({ useObjectStreams: true }));
}

export async function mergePdfs(inputs: Buffer[]): Promise<Buffer> {
  const merged = await PDFDocument.create();
  for (const input of inputs) {
    const source = await PDFDocument.load(input);
    const pages = await merged.copyPages(source, source.getPageIndices());
    pages.forEach((page) => merged.addPage(page));
  }
  return Buffer.from(await merged.save());
}
