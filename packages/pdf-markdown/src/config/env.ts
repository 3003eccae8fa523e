import type { LogLevel } from '@docmark/logger';

import { z } from 'zod';

import { ConfigValidationError } from '../errors/config-validation-error';
import {
  BATCH_SCHEDULER,
  LAYOUT_CLASSIFIER,
  OCR_ENGINE,
} from './constants';

const envSchema = z.object({
  DOCMARK_CONCURRENCY: z.coerce
    .number()
    .int()
    .positive()
    .default(BATCH_SCHEDULER.DEFAULT_CONCURRENCY),
  DOCMARK_OUTPUT_DIR: z.string().default(BATCH_SCHEDULER.DEFAULT_OUTPUT_ROOT),
  DOCMARK_OCR_LANGUAGE: z.string().default(OCR_ENGINE.LANGUAGE),
  DOCMARK_TESSERACT_PATH: z.string().default(OCR_ENGINE.BINARY),
  DOCMARK_SHORT_HEADING_MAX: z.coerce
    .number()
    .int()
    .positive()
    .default(LAYOUT_CLASSIFIER.SHORT_TEXT_MAX_LENGTH),
  DOCMARK_MEDIUM_HEADING_MAX: z.coerce
    .number()
    .int()
    .positive()
    .default(LAYOUT_CLASSIFIER.MEDIUM_TEXT_MAX_LENGTH),
  DOCMARK_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface DocmarkConfig {
  concurrency: number;
  outputRoot: string;
  logLevel: LogLevel;
  ocr: {
    binaryPath: string;
    language: string;
  };
  classifier: {
    shortTextMaxLength: number;
    mediumTextMaxLength: number;
  };
}

/**
 * Read configuration from environment variables.
 *
 * Unset or empty variables fall back to the defaults in `constants.ts`.
 *
 * @throws ConfigValidationError when a variable holds an invalid value
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): DocmarkConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(
      ([key, value]) => key.startsWith('DOCMARK_') && value !== '',
    ),
  );

  const result = envSchema.safeParse(present);
  if (!result.success) {
    throw ConfigValidationError.fromZodError(
      'Invalid DOCMARK_* environment',
      result.error,
    );
  }

  const parsed = result.data;
  return {
    concurrency: parsed.DOCMARK_CONCURRENCY,
    outputRoot: parsed.DOCMARK_OUTPUT_DIR,
    logLevel: parsed.DOCMARK_LOG_LEVEL,
    ocr: {
      binaryPath: parsed.DOCMARK_TESSERACT_PATH,
      language: parsed.DOCMARK_OCR_LANGUAGE,
    },
    classifier: {
      shortTextMaxLength: parsed.DOCMARK_SHORT_HEADING_MAX,
      mediumTextMaxLength: parsed.DOCMARK_MEDIUM_HEADING_MAX,
    },
  };
}
