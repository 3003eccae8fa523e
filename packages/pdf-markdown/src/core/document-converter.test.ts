import {
  existsSync,
  mkdirSync,
  mkdtempSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import type { FixtureImage } from '../testing/pdf-fixture';

import { ConfigValidationError } from '../errors/config-validation-error';
import { OcrEngineUnavailableError } from '../errors/ocr-engine-unavailable-error';
import { FakeOcrAdapter } from '../testing/fake-ocr-adapter';
import { buildPdf } from '../testing/pdf-fixture';
import { DocumentConverter, toErrorRecord } from './document-converter';

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

const chart: FixtureImage = {
  x: 72,
  y: 400,
  width: 200,
  height: 100,
  pixelWidth: 2,
  pixelHeight: 2,
  rgb: [0, 0, 0, 255, 255, 255, 255, 255, 255, 0, 0, 0],
};

const reportPdf = buildPdf([
  {
    texts: [
      { text: 'INTRODUCTION', x: 72, y: 720, size: 18, bold: true },
      { text: 'This is a normal sentence.', x: 72, y: 680, size: 12 },
    ],
    images: [chart],
  },
  {
    texts: [{ text: 'Sample Section Title', x: 72, y: 700, size: 14 }],
  },
]);

describe('DocumentConverter', () => {
  let outputRoot: string;

  beforeEach(() => {
    vi.clearAllMocks();
    outputRoot = mkdtempSync(join(tmpdir(), 'docmark-converter-'));
  });

  afterEach(() => {
    rmSync(outputRoot, { recursive: true, force: true });
  });

  test('converts text and images into Markdown', async () => {
    const converter = new DocumentConverter(
      mockLogger,
      new FakeOcrAdapter('Chart Total 42'),
    );

    const result = await converter.convert(
      reportPdf,
      'reports/report.pdf',
      outputRoot,
    );

    expect(result.error).toBeNull();
    expect(result.sourceName).toBe('reports/report.pdf');
    expect(result.outputStem).toBe('report');
    expect(result.markdownText).toBe(
      '# PDF Document Conversion\n\n' +
        '## Page 1\n\n' +
        '# INTRODUCTION\n\n' +
        'This is a normal sentence.\n\n' +
        '![Image](<report/image_p1_1.png>)\n\n' +
        '*Image text (OCR):* Chart Total 42\n\n' +
        '---\n\n' +
        '## Page 2\n\n' +
        '## Sample Section Title\n\n' +
        '---\n\n' +
        '*End of document*\n',
    );
    expect(result.artifacts).toEqual([
      {
        pageIndex: 1,
        sequenceIndex: 1,
        relativePath: 'report/image_p1_1.png',
        recognizedText: 'Chart Total 42',
      },
    ]);
  });

  test('writes each image before recognizing it', async () => {
    const ocr = new FakeOcrAdapter('text');
    const converter = new DocumentConverter(mockLogger, ocr);

    await converter.convert(reportPdf, 'report.pdf', outputRoot);

    const written = readFileSync(join(outputRoot, 'report', 'image_p1_1.png'));
    expect([...written.subarray(1, 4)]).toEqual([0x50, 0x4e, 0x47]);
    expect(ocr.recognized).toHaveLength(1);
    expect(Buffer.from(ocr.recognized[0]).equals(written)).toBe(true);
  });

  test('omits the caption when OCR finds no text', async () => {
    const converter = new DocumentConverter(mockLogger, new FakeOcrAdapter(''));

    const result = await converter.convert(reportPdf, 'report.pdf', outputRoot);

    expect(result.markdownText).toContain(
      '![Image](<report/image_p1_1.png>)\n\n---\n\n## Page 2',
    );
    expect(result.markdownText).not.toContain('*Image text (OCR):*');
    expect(result.artifacts[0].recognizedText).toBe('');
  });

  test('applies title and classifier options', async () => {
    const converter = new DocumentConverter(mockLogger, new FakeOcrAdapter(), {
      markdown: { title: 'Annual Report' },
      classifier: { shortTextMaxLength: 5 },
    });

    const result = await converter.convert(reportPdf, 'report.pdf', outputRoot);

    expect(result.markdownText?.startsWith('# Annual Report\n\n## Page 1\n\n## INTRODUCTION\n\n')).toBe(true);
  });

  test('rejects invalid options at construction', () => {
    expect(
      () =>
        new DocumentConverter(mockLogger, new FakeOcrAdapter(), {
          classifier: { mediumTextMaxLength: 0 },
        }),
    ).toThrow(ConfigValidationError);
  });

  test('reports a parse failure without rejecting', async () => {
    const converter = new DocumentConverter(mockLogger, new FakeOcrAdapter());

    const result = await converter.convert(
      Buffer.from('definitely not a pdf'),
      'broken.pdf',
      outputRoot,
    );

    expect(result.markdownText).toBeNull();
    expect(result.artifacts).toEqual([]);
    expect(result.error?.kind).toBe('DocumentParseError');
    expect(result.error?.message).toMatch(/^Failed to open PDF: /);
    expect(mockLogger.error).toHaveBeenCalledTimes(1);
  });

  test('reports an OCR engine that disappears mid-document', async () => {
    const converter = new DocumentConverter(
      mockLogger,
      new FakeOcrAdapter('', new OcrEngineUnavailableError('tesseract not found')),
    );

    const result = await converter.convert(reportPdf, 'report.pdf', outputRoot);

    expect(result.markdownText).toBeNull();
    expect(result.error).toEqual({
      kind: 'OcrEngineUnavailable',
      message: 'tesseract not found',
    });
  });

  test('reports an image that cannot be written', async () => {
    const blocker = join(outputRoot, 'blocker');
    writeFileSync(blocker, 'not a directory');
    const converter = new DocumentConverter(mockLogger, new FakeOcrAdapter());

    const result = await converter.convert(reportPdf, 'report.pdf', blocker);

    expect(result.markdownText).toBeNull();
    expect(result.error?.kind).toBe('ArtifactWriteError');
    expect(result.error?.message.startsWith(
      `Failed to write ${join(blocker, 'report', 'image_p1_1.png')}: `,
    )).toBe(true);
  });

  test('produces the same paths when converting twice and drops stale images', async () => {
    const staleDir = join(outputRoot, 'report');
    mkdirSync(staleDir, { recursive: true });
    writeFileSync(join(staleDir, 'image_p9_9.png'), 'stale');
    const converter = new DocumentConverter(mockLogger, new FakeOcrAdapter('x'));

    const first = await converter.convert(reportPdf, 'report.pdf', outputRoot);
    const second = await converter.convert(reportPdf, 'report.pdf', outputRoot);

    expect(second.artifacts.map((a) => a.relativePath)).toEqual(
      first.artifacts.map((a) => a.relativePath),
    );
    expect(second.markdownText).toBe(first.markdownText);
    expect(existsSync(join(staleDir, 'image_p9_9.png'))).toBe(false);
    expect(existsSync(join(staleDir, 'image_p1_1.png'))).toBe(true);
  });
});

describe('toErrorRecord', () => {
  test('maps unknown failures to UnexpectedError', () => {
    expect(toErrorRecord(new TypeError('boom'))).toEqual({
      kind: 'UnexpectedError',
      message: 'boom',
    });
    expect(toErrorRecord('plain string')).toEqual({
      kind: 'UnexpectedError',
      message: 'plain string',
    });
  });
});
