import { spawnAsync } from '@docmark/shared';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { ConfigValidationError } from '../errors/config-validation-error';
import { OcrEngineUnavailableError } from '../errors/ocr-engine-unavailable-error';
import { TesseractOcrAdapter } from './tesseract-ocr-adapter';

vi.mock('@docmark/shared', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@docmark/shared')>()),
  spawnAsync: vi.fn(),
}));

const mockSpawnAsync = vi.mocked(spawnAsync);

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

function enoent(): Error {
  return Object.assign(new Error('spawn tesseract ENOENT'), {
    code: 'ENOENT',
  });
}

describe('TesseractOcrAdapter', () => {
  let adapter: TesseractOcrAdapter;

  beforeEach(() => {
    vi.clearAllMocks();
    adapter = new TesseractOcrAdapter(mockLogger);
  });

  describe('constructor', () => {
    test('rejects an invalid language', () => {
      expect(
        () => new TesseractOcrAdapter(mockLogger, { language: 'eng; rm' }),
      ).toThrow(ConfigValidationError);
    });

    test('rejects an out-of-range page segmentation mode', () => {
      expect(
        () => new TesseractOcrAdapter(mockLogger, { pageSegmentationMode: 14 }),
      ).toThrow(ConfigValidationError);
    });
  });

  describe('ensureAvailable', () => {
    test('checks the version once and logs it', async () => {
      mockSpawnAsync.mockResolvedValue({
        code: 0,
        stdout: 'tesseract 5.3.0\n leptonica-1.82.0',
        stderr: '',
      });

      await adapter.ensureAvailable();
      await adapter.ensureAvailable();

      expect(mockSpawnAsync).toHaveBeenCalledTimes(1);
      expect(mockSpawnAsync).toHaveBeenCalledWith('tesseract', ['--version']);
      expect(mockLogger.info).toHaveBeenCalledWith(
        '[TesseractOcrAdapter] Using tesseract 5.3.0',
      );
    });

    test('throws OcrEngineUnavailableError when the binary is missing', async () => {
      mockSpawnAsync.mockRejectedValue(enoent());

      await expect(adapter.ensureAvailable()).rejects.toThrow(
        'Cannot run tesseract: spawn tesseract ENOENT',
      );
      await expect(adapter.ensureAvailable()).rejects.toBeInstanceOf(
        OcrEngineUnavailableError,
      );
      expect(mockSpawnAsync).toHaveBeenCalledTimes(2);
    });

    test('throws OcrEngineUnavailableError on a non-zero exit', async () => {
      mockSpawnAsync.mockResolvedValue({
        code: 127,
        stdout: '',
        stderr: 'error while loading shared libraries\n',
      });

      await expect(adapter.ensureAvailable()).rejects.toThrow(
        'tesseract --version exited with code 127: error while loading shared libraries',
      );
    });

    test('uses the configured binary path', async () => {
      mockSpawnAsync.mockResolvedValue({ code: 0, stdout: '', stderr: 'tesseract 3.05' });
      const custom = new TesseractOcrAdapter(mockLogger, {
        binaryPath: '/opt/tesseract/bin/tesseract',
      });

      await custom.ensureAvailable();

      expect(mockSpawnAsync).toHaveBeenCalledWith(
        '/opt/tesseract/bin/tesseract',
        ['--version'],
      );
      expect(mockLogger.info).toHaveBeenCalledWith(
        '[TesseractOcrAdapter] Using tesseract 3.05',
      );
    });
  });

  describe('recognize', () => {
    const png = new Uint8Array([0x89, 0x50, 0x4e, 0x47]);

    test('pipes the image to tesseract and trims the output', async () => {
      mockSpawnAsync.mockResolvedValue({
        code: 0,
        stdout: '  Total: 42 units\n\f',
        stderr: '',
      });

      await expect(adapter.recognize(png)).resolves.toBe('Total: 42 units');
      expect(mockSpawnAsync).toHaveBeenCalledWith(
        'tesseract',
        ['stdin', 'stdout', '-l', 'eng'],
        { input: png },
      );
    });

    test('passes language and page segmentation mode', async () => {
      mockSpawnAsync.mockResolvedValue({ code: 0, stdout: 'x', stderr: '' });
      const custom = new TesseractOcrAdapter(mockLogger, {
        language: 'eng+deu',
        pageSegmentationMode: 6,
      });

      await custom.recognize(png);

      expect(mockSpawnAsync).toHaveBeenCalledWith(
        'tesseract',
        ['stdin', 'stdout', '-l', 'eng+deu', '--psm', '6'],
        { input: png },
      );
    });

    test('returns empty string for whitespace-only output', async () => {
      mockSpawnAsync.mockResolvedValue({ code: 0, stdout: ' \n\f\n', stderr: '' });

      await expect(adapter.recognize(png)).resolves.toBe('');
    });

    test('logs a per-image failure and returns empty string', async () => {
      mockSpawnAsync.mockResolvedValue({
        code: 1,
        stdout: '',
        stderr: 'Error in pixReadMem: Unknown format\n',
      });

      await expect(adapter.recognize(png)).resolves.toBe('');
      expect(mockLogger.warn).toHaveBeenCalledWith(
        '[TesseractOcrAdapter] tesseract exited with code 1: Error in pixReadMem: Unknown format',
      );
    });

    test('logs a spawn failure other than a missing binary', async () => {
      mockSpawnAsync.mockRejectedValue(new Error('EMFILE: too many open files'));

      await expect(adapter.recognize(png)).resolves.toBe('');
      expect(mockLogger.warn).toHaveBeenCalledWith(
        '[TesseractOcrAdapter] Failed to run tesseract: EMFILE: too many open files',
      );
    });

    test('throws OcrEngineUnavailableError when the binary disappears', async () => {
      mockSpawnAsync.mockRejectedValue(enoent());

      await expect(adapter.recognize(png)).rejects.toThrow(
        new OcrEngineUnavailableError(
          'tesseract not found: spawn tesseract ENOENT',
        ),
      );
    });
  });

  test('names images by page and sequence', () => {
    expect(adapter.imageFilename(3, 2)).toBe('image_p3_2.png');
  });
});
