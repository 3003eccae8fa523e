import { describe, expect, test } from 'vitest';

import { ConfigValidationError } from '../errors/config-validation-error';
import {
  batchRunOptionsSchema,
  layoutClassifierOptionsSchema,
  parseOptions,
  tesseractOcrAdapterOptionsSchema,
} from './options';

describe('parseOptions', () => {
  test('applies classifier defaults', () => {
    expect(
      parseOptions(layoutClassifierOptionsSchema, undefined, 'classifier'),
    ).toEqual({ shortTextMaxLength: 60, mediumTextMaxLength: 100 });
  });

  test('keeps explicit values', () => {
    expect(
      parseOptions(
        layoutClassifierOptionsSchema,
        { shortTextMaxLength: 30 },
        'classifier',
      ),
    ).toEqual({ shortTextMaxLength: 30, mediumTextMaxLength: 100 });
  });

  test('applies tesseract defaults', () => {
    expect(parseOptions(tesseractOcrAdapterOptionsSchema, {}, 'ocr')).toEqual({
      binaryPath: 'tesseract',
      language: 'eng',
    });
  });

  test('rejects malformed language codes', () => {
    expect(() =>
      parseOptions(
        tesseractOcrAdapterOptionsSchema,
        { language: 'eng; rm -rf' },
        'ocr',
      ),
    ).toThrow(ConfigValidationError);
  });

  test('rejects a page segmentation mode out of range', () => {
    expect(() =>
      parseOptions(
        tesseractOcrAdapterOptionsSchema,
        { pageSegmentationMode: 14 },
        'ocr',
      ),
    ).toThrow(ConfigValidationError);
  });

  test('requires an output root for batch runs', () => {
    expect(() => parseOptions(batchRunOptionsSchema, {}, 'batch')).toThrow(
      /^batch: outputRoot: /,
    );
  });

  test('rejects zero concurrency', () => {
    expect(() =>
      parseOptions(
        batchRunOptionsSchema,
        { concurrency: 0, outputRoot: 'out' },
        'batch',
      ),
    ).toThrow(ConfigValidationError);
  });
});
