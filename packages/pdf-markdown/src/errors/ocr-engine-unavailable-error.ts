import { getErrorMessage } from './error-message';

/**
 * OcrEngineUnavailableError
 *
 * The recognition engine is missing or misconfigured. Every document would
 * fail the same way, so the batch stops before converting anything.
 */
export class OcrEngineUnavailableError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'OcrEngineUnavailableError';
  }

  static fromError(context: string, error: unknown): OcrEngineUnavailableError {
    return new OcrEngineUnavailableError(
      `${context}: ${getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
