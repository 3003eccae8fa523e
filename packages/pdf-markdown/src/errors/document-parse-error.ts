import { getErrorMessage } from './error-message';

/**
 * DocumentParseError
 *
 * Thrown when a PDF cannot be opened or read: malformed bytes, an encrypted
 * document without a usable password, or an unreadable page. Fatal for the
 * one document only.
 */
export class DocumentParseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DocumentParseError';
  }

  /**
   * Create DocumentParseError from unknown error with context
   */
  static fromError(context: string, error: unknown): DocumentParseError {
    return new DocumentParseError(`${context}: ${getErrorMessage(error)}`, {
      cause: error,
    });
  }
}
