import { getErrorMessage } from './error-message';

/**
 * ArtifactWriteError
 *
 * An extracted image could not be written to disk. The owning document
 * fails, since its Markdown would reference a missing file.
 */
export class ArtifactWriteError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ArtifactWriteError';
  }

  static fromError(path: string, error: unknown): ArtifactWriteError {
    return new ArtifactWriteError(
      `Failed to write ${path}: ${getErrorMessage(error)}`,
      path,
      { cause: error },
    );
  }
}
