import type { OcrAdapter } from '../ocr/ocr-adapter';

import { imageFilename } from '../utils/output-paths';

/**
 * In-process OCR stand-in. Returns a fixed text for every image, or throws
 * the configured error from both methods.
 */
export class FakeOcrAdapter implements OcrAdapter {
  readonly recognized: Uint8Array[] = [];
  availabilityChecks = 0;

  constructor(
    private readonly text = '',
    private readonly failure: Error | null = null,
  ) {}

  async ensureAvailable(): Promise<void> {
    this.availabilityChecks++;
    if (this.failure) throw this.failure;
  }

  async recognize(imageBytes: Uint8Array): Promise<string> {
    if (this.failure) throw this.failure;
    this.recognized.push(imageBytes);
    return this.text;
  }

  imageFilename(pageIndex: number, sequenceIndex: number): string {
    return imageFilename(pageIndex, sequenceIndex);
  }
}
