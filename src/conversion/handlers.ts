import type { Config } from '../config.js';
import { ItemConversionError, toErrorMessage } from '../errors.js';
import type { ConversionOptions, ImageFormat, OutputFile, OutputFormat, UploadedFile } from '../types.js';
import { buildDocx, hasText } from './docx.js';
import { encodeImage } from './image.js';
import { recognizeText } from './ocr.js';
import { convertPdfWithOffice } from './office.js';
import { imageToPdf, normalizePdf } from './pdf.js';
import { dpiForQuality, extractPdfText, rasterizePdf } from './poppler.js';
import { baseName, isPdf } from './source.js';

export type OutputKind = 'image' | 'pdf' | 'docx';

export interface ConversionContext {
  index: number;
  workDir: string;
  signal: AbortSignal;
}

export interface FormatHandler {
  readonly kind: OutputKind;
  convert(source: UploadedFile, ctx: ConversionContext): Promise<OutputFile[]>;
}

export interface ConversionToolkit {
  binaries: Config['binaries'];
  ocrLang: string;
  toolTimeoutMs: number;
}

export type HandlerFactory = (options: ConversionOptions) => FormatHandler;

const OCR_DPI = 300;

export function outputKindOf(format: OutputFormat): OutputKind {
  switch (format) {
    case 'pdf':
      return 'pdf';
    case 'docx':
      return 'docx';
    default:
      return 'image';
  }
}

const isImageFormat = (format: OutputFormat): format is ImageFormat => outputKindOf(format) === 'image';

const scratchStem = (ctx: ConversionContext) => `item-${ctx.index}`;

function imageHandler(format: ImageFormat, options: ConversionOptions, toolkit: ConversionToolkit): FormatHandler {
  return {
    kind: 'image',
    async convert(source, ctx) {
      const stem = baseName(source.name);

      if (!isPdf(source)) {
        const encoded = await encodeImage(source.data, format, options);
        return [{ name: `${stem}.${encoded.ext}`, data: encoded.data }];
      }

      const pages = await rasterizePdf(toolkit.binaries.pdftoppm, source.data, {
        workDir: ctx.workDir,
        stem: scratchStem(ctx),
        dpi: dpiForQuality(options.quality),
        signal: ctx.signal,
        timeoutMs: toolkit.toolTimeoutMs,
      });
      if (pages.length === 0) {
        throw new ItemConversionError('PDF has no pages to render');
      }

      const outputs: OutputFile[] = [];
      for (const [i, page] of pages.entries()) {
        const encoded = await encodeImage(page, format, options);
        outputs.push({ name: `${stem}_page-${i + 1}.${encoded.ext}`, data: encoded.data });
      }
      return outputs;
    },
  };
}

function pdfHandler(options: ConversionOptions): FormatHandler {
  return {
    kind: 'pdf',
    async convert(source) {
      const data = isPdf(source) ? await normalizePdf(source.data) : await imageToPdf(source.data, options);
      return [{ name: `${baseName(source.name)}.pdf`, data }];
    },
  };
}

function docxHandler(options: ConversionOptions, toolkit: ConversionToolkit): FormatHandler {
  const requireOcr = () => {
    if (!options.ocr) {
      throw new ItemConversionError('No extractable text; enable OCR to convert scanned pages and images');
    }
  };

  return {
    kind: 'docx',
    async convert(source, ctx) {
      const stem = baseName(source.name);
      const name = `${stem}.docx`;
      const run = { workDir: ctx.workDir, stem: scratchStem(ctx), signal: ctx.signal, timeoutMs: toolkit.toolTimeoutMs };

      if (!isPdf(source)) {
        requireOcr();
        const text = await recognizeText([source.data], toolkit.ocrLang, ctx.signal);
        return [{ name, data: await buildDocx(stem, text) }];
      }

      if (options.preserveLayout) {
        try {
          return [{ name, data: await convertPdfWithOffice(toolkit.binaries.soffice, source.data, run) }];
        } catch (err) {
          if (ctx.signal.aborted) throw err;
          console.warn(
            `[PID ${process.pid}] [Docx] Layout conversion of ${source.name} failed, extracting text instead: ${toErrorMessage(err)}`,
          );
        }
      }

      const text = await extractPdfText(toolkit.binaries.pdftotext, source.data, run);
      if (hasText(text)) {
        return [{ name, data: await buildDocx(stem, text) }];
      }

      requireOcr();
      const pages = await rasterizePdf(toolkit.binaries.pdftoppm, source.data, { ...run, dpi: OCR_DPI });
      const recognized = await recognizeText(pages, toolkit.ocrLang, ctx.signal);
      return [{ name, data: await buildDocx(stem, recognized) }];
    },
  };
}

/** Picks the handler for a job's output format. Called once per job. */
export function selectHandler(options: ConversionOptions, toolkit: ConversionToolkit): FormatHandler {
  const { format } = options;
  if (isImageFormat(format)) return imageHandler(format, options, toolkit);
  if (format === 'pdf') return pdfHandler(options);
  return docxHandler(options, toolkit);
}

export const createHandlerFactory =
  (toolkit: ConversionToolkit): HandlerFactory =>
  (options) =>
    selectHandler(options, toolkit);
