import { readdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { runTool, type ToolRun } from './tools.js';

export const DPI_RANGE = { min: 72, max: 300 } as const;

/** Maps quality 10..100 linearly onto 72..300 dpi. */
export function dpiForQuality(quality: number): number {
  const clamped = Math.min(100, Math.max(10, quality));
  return DPI_RANGE.min + Math.round(((clamped - 10) * (DPI_RANGE.max - DPI_RANGE.min)) / 90);
}

const pageNumber = (file: string, prefix: string): number =>
  Number.parseInt(file.slice(prefix.length + 1, -'.png'.length), 10);

/**
 * Renders every page of a PDF to PNG with `pdftoppm`. Returns the pages in
 * page order.
 */
export async function rasterizePdf(
  bin: string,
  pdf: Buffer,
  opts: ToolRun & { workDir: string; dpi: number; stem: string },
): Promise<Buffer[]> {
  const input = path.join(opts.workDir, `${opts.stem}.pdf`);
  const prefix = `${opts.stem}-page`;
  await writeFile(input, pdf);

  await runTool(bin, ['-r', String(opts.dpi), '-png', input, path.join(opts.workDir, prefix)], opts);

  // pdftoppm zero-pads page numbers depending on the page count.
  const pages = (await readdir(opts.workDir))
    .filter((file) => file.startsWith(`${prefix}-`) && file.endsWith('.png'))
    .sort((a, b) => pageNumber(a, prefix) - pageNumber(b, prefix));

  return Promise.all(pages.map((file) => readFile(path.join(opts.workDir, file))));
}

/** Digital text layer of a PDF, one string per page. */
export async function extractPdfText(
  bin: string,
  pdf: Buffer,
  opts: ToolRun & { workDir: string; stem: string },
): Promise<string[]> {
  const input = path.join(opts.workDir, `${opts.stem}-text.pdf`);
  await writeFile(input, pdf);

  const stdout = await runTool(bin, ['-layout', '-enc', 'UTF-8', input, '-'], opts);
  const pages = stdout.split('\f');
  // pdftotext ends the last page with a form feed too.
  if (pages.length > 1 && pages[pages.length - 1].trim() === '') pages.pop();
  return pages;
}
