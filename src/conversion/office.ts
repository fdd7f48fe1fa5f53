import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { ItemConversionError } from '../errors.js';
import { runTool, type ToolRun } from './tools.js';

/**
 * Layout-preserving PDF to DOCX through a headless LibreOffice. Each call
 * gets its own user profile so concurrent jobs do not fight over the
 * profile lock.
 */
export async function convertPdfWithOffice(
  bin: string,
  pdf: Buffer,
  opts: ToolRun & { workDir: string; stem: string },
): Promise<Buffer> {
  const officeDir = path.join(opts.workDir, `${opts.stem}-office`);
  const profileDir = path.join(officeDir, 'profile');
  await mkdir(profileDir, { recursive: true });

  const input = path.join(officeDir, `${opts.stem}.pdf`);
  await writeFile(input, pdf);

  await runTool(
    bin,
    [
      `-env:UserInstallation=${pathToFileURL(profileDir).href}`,
      '--headless',
      '--infilter=writer_pdf_import',
      '--convert-to',
      'docx:MS Word 2007 XML',
      '--outdir',
      officeDir,
      input,
    ],
    opts,
  );

  try {
    return await readFile(path.join(officeDir, `${opts.stem}.docx`));
  } catch (err) {
    throw new ItemConversionError(`${bin} produced no DOCX output`, { cause: err });
  }
}
