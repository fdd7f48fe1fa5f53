import archiver from 'archiver';
import { createWriteStream } from 'node:fs';
import { readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import { mergePdfs } from './conversion/pdf.js';
import { PackagingError, toErrorMessage } from './errors.js';
import type { Archive } from './types.js';

/** A converted file already written to the job's scratch directory. */
export interface StagedOutput {
  name: string;
  path: string;
}

export interface PackagedArchive extends Archive {
  entries: string[];
}

export const ZIP_DOWNLOAD_NAME = 'converted_files.zip';
export const COMBINED_PDF_NAME = 'combined.pdf';

/**
 * Keeps names unique inside the archive: the second `photo.webp` becomes
 * `photo (1).webp`, the third `photo (2).webp`, and so on.
 */
export function assignEntryNames(names: string[]): string[] {
  const taken = new Set<string>();
  return names.map((name) => {
    const ext = path.extname(name);
    const stem = name.slice(0, name.length - ext.length);
    let candidate = name;
    for (let n = 1; taken.has(candidate.toLowerCase()); n++) {
      candidate = `${stem} (${n})${ext}`;
    }
    taken.add(candidate.toLowerCase());
    return candidate;
  });
}

export async function writeZipArchive(outputs: StagedOutput[], destPath: string): Promise<string[]> {
  const names = assignEntryNames(outputs.map((output) => output.name));
  const archive = archiver('zip', { zlib: { level: 9 } });
  archive.on('warning', (err) => archive.emit('error', err));

  outputs.forEach((output, i) => archive.file(output.path, { name: names[i] }));

  await Promise.all([pipeline(archive, createWriteStream(destPath)), archive.finalize()]);
  return names;
}

/**
 * Builds the downloadable result of a job: every staged output zipped in
 * order, or all of them merged into one PDF when `combinePdf` is set.
 */
export async function packageOutputs(args: {
  jobId: string;
  outputs: StagedOutput[];
  combinePdf: boolean;
  outDir: string;
}): Promise<PackagedArchive> {
  const { jobId, outputs, combinePdf, outDir } = args;
  if (outputs.length === 0) {
    throw new PackagingError('No files were converted successfully');
  }

  const destPath = path.join(outDir, combinePdf ? `${jobId}.pdf` : `${jobId}.zip`);
  try {
    if (combinePdf) {
      const merged = await mergePdfs(await Promise.all(outputs.map((output) => readFile(output.path))));
      await writeFile(destPath, merged);
      return { path: destPath, filename: COMBINED_PDF_NAME, contentType: 'application/pdf', entries: [COMBINED_PDF_NAME] };
    }

    const entries = await writeZipArchive(outputs, destPath);
    return { path: destPath, filename: ZIP_DOWNLOAD_NAME, contentType: 'application/zip', entries };
  } catch (err) {
    await rm(destPath, { force: true });
    throw new PackagingError(`Packaging failed: ${toErrorMessage(err)}`, { cause: err });
  }
}
