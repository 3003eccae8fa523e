/**
 * An extracted image persisted to disk together with its OCR caption.
 */
export interface ImageArtifact {
  /** 1-based page number */
  pageIndex: number;

  /** 1-based position of the image on its page */
  sequenceIndex: number;

  /**
   * Path of the image file relative to the output root,
   * e.g. `report/image_p1_1.png`
   */
  relativePath: string;

  /** Trimmed OCR text, empty when nothing was recognized */
  recognizedText: string;
}

export type ConversionErrorKind =
  | 'DocumentParseError'
  | 'OcrEngineUnavailable'
  | 'ArtifactWriteError'
  | 'UnexpectedError';

export interface ConversionErrorRecord {
  kind: ConversionErrorKind;
  message: string;
}

/**
 * Outcome of converting one PDF.
 *
 * A successful conversion has `markdownText` and `error === null`; a failed
 * one has `error` and `markdownText === null`. Artifacts written before a
 * failure are still listed.
 */
export interface ConversionResult {
  /** Name the document was submitted under */
  sourceName: string;

  /**
   * Directory under the output root that holds the images, and the file
   * name of the Markdown in a bundle. Unique within a batch.
   */
  outputStem: string;

  markdownText: string | null;

  /** Images in page order, then extraction order within a page */
  artifacts: ImageArtifact[];

  error: ConversionErrorRecord | null;
}
