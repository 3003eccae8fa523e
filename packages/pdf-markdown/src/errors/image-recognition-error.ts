import { getErrorMessage } from './error-message';

/**
 * ImageRecognitionError
 *
 * OCR failed for a single image. Recovered locally as an empty caption.
 */
export class ImageRecognitionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ImageRecognitionError';
  }

  static fromError(context: string, error: unknown): ImageRecognitionError {
    return new ImageRecognitionError(`${context}: ${getErrorMessage(error)}`, {
      cause: error,
    });
  }
}
