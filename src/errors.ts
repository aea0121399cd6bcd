export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class UnsupportedMediaError extends Error {
  constructor(readonly path: string) {
    super(`Not an image or video: ${path}`);
    this.name = 'UnsupportedMediaError';
  }
}

export class CancelledError extends Error {
  constructor(message = 'Run cancelled.') {
    super(message);
    this.name = 'CancelledError';
  }
}

export function assertNonEmptyString(value: unknown, name: string): asserts value is string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new InvariantError(`${name} must be a non-empty string`);
  }
}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
