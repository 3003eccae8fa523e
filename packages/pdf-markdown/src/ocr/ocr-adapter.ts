/**
 * Text recognition for extracted images.
 *
 * Implementations are injected into the converter; one instance may serve
 * many documents concurrently.
 */
export interface OcrAdapter {
  /**
   * Verify the engine can run.
   *
   * @throws OcrEngineUnavailableError
   */
  ensureAvailable(): Promise<void>;

  /**
   * Recognize the text of one PNG image. Returns the trimmed text, or `''`
   * when nothing was recognized or recognition failed for this image.
   *
   * @throws OcrEngineUnavailableError when the engine itself is missing
   */
  recognize(imageBytes: Uint8Array): Promise<string>;

  /** Stable file name for an image, both indices 1-based */
  imageFilename(pageIndex: number, sequenceIndex: number): string;
}
