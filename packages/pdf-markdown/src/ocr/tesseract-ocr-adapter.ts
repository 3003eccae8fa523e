import type { LoggerMethods } from '@docmark/logger';
import type { SpawnResult } from '@docmark/shared';

import { isCommandNotFoundError, spawnAsync } from '@docmark/shared';

import type { TesseractOcrAdapterOptions } from '../config/options';
import type { OcrAdapter } from './ocr-adapter';

import {
  parseOptions,
  tesseractOcrAdapterOptionsSchema,
} from '../config/options';
import { ImageRecognitionError } from '../errors/image-recognition-error';
import { OcrEngineUnavailableError } from '../errors/ocr-engine-unavailable-error';
import { imageFilename } from '../utils/output-paths';

/**
 * OCR through the locally installed `tesseract` CLI.
 *
 * Each image is piped to `tesseract stdin stdout` in its own process.
 *
 * ## System Requirements
 * - Tesseract OCR (`brew install tesseract` / `apt install tesseract-ocr`)
 */
export class TesseractOcrAdapter implements OcrAdapter {
  private readonly binaryPath: string;
  private readonly language: string;
  private readonly pageSegmentationMode: number | undefined;
  private availability: Promise<void> | null = null;

  constructor(
    private readonly logger: LoggerMethods,
    options?: TesseractOcrAdapterOptions,
  ) {
    const resolved = parseOptions(
      tesseractOcrAdapterOptionsSchema,
      options,
      'Invalid TesseractOcrAdapter options',
    );
    this.binaryPath = resolved.binaryPath;
    this.language = resolved.language;
    this.pageSegmentationMode = resolved.pageSegmentationMode;
  }

  /**
   * Run `tesseract --version` once. A failed check is not cached, so a
   * later call probes again.
   */
  async ensureAvailable(): Promise<void> {
    this.availability ??= this.checkAvailability();
    try {
      await this.availability;
    } catch (error) {
      this.availability = null;
      throw error;
    }
  }

  async recognize(imageBytes: Uint8Array): Promise<string> {
    let result: SpawnResult;
    try {
      result = await spawnAsync(this.binaryPath, this.recognizeArgs(), {
        input: imageBytes,
      });
    } catch (error) {
      if (isCommandNotFoundError(error)) {
        throw OcrEngineUnavailableError.fromError(
          `${this.binaryPath} not found`,
          error,
        );
      }
      const failure = ImageRecognitionError.fromError(
        `Failed to run ${this.binaryPath}`,
        error,
      );
      this.logger.warn(`[TesseractOcrAdapter] ${failure.message}`);
      return '';
    }

    if (result.code !== 0) {
      const failure = new ImageRecognitionError(
        `${this.binaryPath} exited with code ${result.code}: ${result.stderr.trim() || 'Unknown error'}`,
      );
      this.logger.warn(`[TesseractOcrAdapter] ${failure.message}`);
      return '';
    }

    return result.stdout.trim();
  }

  imageFilename(pageIndex: number, sequenceIndex: number): string {
    return imageFilename(pageIndex, sequenceIndex);
  }

  private recognizeArgs(): string[] {
    const args = ['stdin', 'stdout', '-l', this.language];
    if (this.pageSegmentationMode !== undefined) {
      args.push('--psm', String(this.pageSegmentationMode));
    }
    return args;
  }

  private async checkAvailability(): Promise<void> {
    let result: SpawnResult;
    try {
      result = await spawnAsync(this.binaryPath, ['--version']);
    } catch (error) {
      throw OcrEngineUnavailableError.fromError(
        `Cannot run ${this.binaryPath}`,
        error,
      );
    }

    if (result.code !== 0) {
      throw new OcrEngineUnavailableError(
        `${this.binaryPath} --version exited with code ${result.code}: ${result.stderr.trim() || 'Unknown error'}`,
      );
    }

    // Older releases print the version banner on stderr
    const banner = (result.stdout.trim() || result.stderr.trim()).split('\n')[0];
    this.logger.info(`[TesseractOcrAdapter] Using ${banner}`);
  }
}
