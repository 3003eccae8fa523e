import { z } from 'zod';

import { ConfigValidationError } from '../errors/config-validation-error';
import {
  BATCH_SCHEDULER,
  LAYOUT_CLASSIFIER,
  MARKDOWN_FORMAT,
  OCR_ENGINE,
} from './constants';

const positiveInt = z.number().int().positive();

export const layoutClassifierOptionsSchema = z.object({
  shortTextMaxLength: positiveInt.default(LAYOUT_CLASSIFIER.SHORT_TEXT_MAX_LENGTH),
  mediumTextMaxLength: positiveInt.default(
    LAYOUT_CLASSIFIER.MEDIUM_TEXT_MAX_LENGTH,
  ),
});

export const tesseractOcrAdapterOptionsSchema = z.object({
  binaryPath: z.string().min(1).default(OCR_ENGINE.BINARY),
  language: z
    .string()
    .regex(/^[A-Za-z_]+(\+[A-Za-z_]+)*$/, {
      message: 'Language must look like "eng" or "eng+deu"',
    })
    .default(OCR_ENGINE.LANGUAGE),
  /** Tesseract page segmentation mode (`--psm`) */
  pageSegmentationMode: z.number().int().min(0).max(13).optional(),
});

export const markdownOptionsSchema = z.object({
  title: z.string().min(1).default(MARKDOWN_FORMAT.TITLE),
});

export const batchRunOptionsSchema = z.object({
  concurrency: positiveInt.default(BATCH_SCHEDULER.DEFAULT_CONCURRENCY),
  outputRoot: z.string().min(1),
});

export type LayoutClassifierOptions = z.input<typeof layoutClassifierOptionsSchema>;
export type ResolvedLayoutClassifierOptions = z.output<
  typeof layoutClassifierOptionsSchema
>;
export type TesseractOcrAdapterOptions = z.input<
  typeof tesseractOcrAdapterOptionsSchema
>;
export type MarkdownOptions = z.input<typeof markdownOptionsSchema>;

/**
 * Validate options against a schema and apply its defaults.
 *
 * @throws ConfigValidationError listing every failing field
 */
export function parseOptions<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  context: string,
): z.output<S> {
  const result = schema.safeParse(value ?? {});
  if (!result.success) {
    throw ConfigValidationError.fromZodError(context, result.error);
  }
  return result.data;
}
