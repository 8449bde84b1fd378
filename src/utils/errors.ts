/**
 * A backend cannot be used because its credentials or settings are missing.
 * Retrying does not help; the message says what to set.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * The selected backend does not offer the requested capability.
 */
export class UnsupportedOperationError extends Error {
  constructor(
    readonly backend: string,
    readonly operation: string,
    hint?: string
  ) {
    super(`${backend} does not support ${operation}${hint ? `. ${hint}` : ''}`);
    this.name = 'UnsupportedOperationError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
