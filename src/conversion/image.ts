import sharp from 'sharp';
import type { ConversionOptions, ImageFormat } from '../types.js';

export const IMAGE_EXTENSIONS: Record<ImageFormat, string> = {
  webp: 'webp',
  jpeg: 'jpg',
  png: 'png',
  avif: 'avif',
};

export interface EncodedImage {
  data: Buffer;
  ext: string;
}

type ResizeOptions = Pick<ConversionOptions, 'maxWidth' | 'maxHeight'>;

// Honors EXIF orientation and shrinks to fit inside the box, never enlarging.
const prepare = (input: Buffer, resize: ResizeOptions): sharp.Sharp => {
  const pipeline = sharp(input, { failOn: 'error' }).rotate();
  if (resize.maxWidth > 0 || resize.maxHeight > 0) {
    pipeline.resize({
      width: resize.maxWidth > 0 ? resize.maxWidth : undefined,
      height: resize.maxHeight > 0 ? resize.maxHeight : undefined,
      fit: 'inside',
      withoutEnlargement: true,
    });
  }
  return pipeline;
};

export async function encodeImage(
  input: Buffer,
  format: ImageFormat,
  options: Pick<ConversionOptions, 'quality' | 'maxWidth' | 'maxHeight'>,
): Promise<EncodedImage> {
  const { quality } = options;

  switch (format) {
    case 'webp':
      return { data: await prepare(input, options).webp({ quality, effort: 6 }).toBuffer(), ext: IMAGE_EXTENSIONS.webp };
    case 'jpeg':
      return {
        data: await prepare(input, options)
          .flatten({ background: '#ffffff' })
          .jpeg({ quality, progressive: true, mozjpeg: true })
          .toBuffer(),
        ext: IMAGE_EXTENSIONS.jpeg,
      };
    case 'png':
      return {
        data: await prepare(input, options).png({ compressionLevel: 9, adaptiveFiltering: true }).toBuffer(),
        ext: IMAGE_EXTENSIONS.png,
      };
    case 'avif':
      try {
        return { data: await prepare(input, options).avif({ quality }).toBuffer(), ext: IMAGE_EXTENSIONS.avif };
      } catch (err) {
        // Some libvips builds ship without an AV1 encoder.
        console.warn(`[PID ${process.pid}] [Image] AVIF encode failed, falling back to WebP: ${err}`);
        return encodeImage(input, 'webp', options);
      }
  }
}

/**
 * Re-encodes an image so pdf-lib can embed it: PNG when it carries alpha,
 * JPEG otherwise.
 */
export async function encodeForPdf(
  input: Buffer,
  options: Pick<ConversionOptions, 'quality' | 'maxWidth' | 'maxHeight'>,
): Promise<{ data: Buffer; kind: 'png' | 'jpeg' }> {
  const { hasAlpha } = await sharp(input).metadata();
  if (hasAlpha) {
    return { data: await prepare(input, options).png().toBuffer(), kind: 'png' };
  }
  return { data: await prepare(input, options).jpeg({ quality: options.quality }).toBuffer(), kind: 'jpeg' };
}
