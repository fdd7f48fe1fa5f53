import { z } from 'zod';
import { InvalidInputError } from './errors.js';
import type { ConversionOptions } from './types.js';

export const OUTPUT_FORMATS = ['webp', 'jpeg', 'png', 'avif', 'pdf', 'docx'] as const;

export const QUALITY_RANGE = { min: 10, max: 100, fallback: 85 } as const;

// Form fields arrive as strings; '' is what an untouched <input> sends.
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const flag = (name: string) =>
  z.preprocess(
    blankToUndefined,
    z.enum(['0', '1'], { errorMap: () => ({ message: `${name} must be 0 or 1` }) }).optional(),
  ).transform((value) => value === '1');

const dimension = (name: string) =>
  z.preprocess(
    blankToUndefined,
    z.coerce
      .number({ invalid_type_error: `${name} must be a number` })
      .int(`${name} must be an integer`)
      .min(0, `${name} must be non-negative`)
      .optional(),
  ).transform((value) => value ?? 0);

const formSchema = z.object({
  format: z.preprocess(
    blankToUndefined,
    z.enum(OUTPUT_FORMATS, {
      errorMap: () => ({ message: `format must be one of ${OUTPUT_FORMATS.join(', ')}` }),
    }).default('webp'),
  ),
  quality: z.preprocess(
    blankToUndefined,
    z.coerce
      .number({ invalid_type_error: 'quality must be a number' })
      .int('quality must be an integer')
      .min(QUALITY_RANGE.min, `quality must be between ${QUALITY_RANGE.min} and ${QUALITY_RANGE.max}`)
      .max(QUALITY_RANGE.max, `quality must be between ${QUALITY_RANGE.min} and ${QUALITY_RANGE.max}`)
      .default(QUALITY_RANGE.fallback),
  ),
  max_width: dimension('max_width'),
  max_height: dimension('max_height'),
  combine_pdf: flag('combine_pdf'),
  ocr: flag('ocr'),
  preserve_layout: flag('preserve_layout'),
});

export function parseConversionOptions(fields: Record<string, unknown>): ConversionOptions {
  const result = formSchema.safeParse(fields);
  if (!result.success) {
    throw new InvalidInputError(result.error.issues.map((issue) => issue.message).join('; '));
  }

  const form = result.data;
  return {
    format: form.format,
    quality: form.quality,
    maxWidth: form.max_width,
    maxHeight: form.max_height,
    combinePdf: form.combine_pdf,
    ocr: form.ocr,
    preserveLayout: form.preserve_layout,
  };
}
