import type { ZodError } from 'zod';

/**
 * ConfigValidationError
 *
 * Options or environment values failed schema validation.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[],
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ConfigValidationError';
  }

  /**
   * Flatten zod issues into `path: message` lines
   */
  static fromZodError(context: string, error: ZodError): ConfigValidationError {
    const issues = error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    return new ConfigValidationError(
      `${context}: ${issues.join('; ')}`,
      issues,
      { cause: error },
    );
  }
}
