interface ExtractionErrorOptions extends ErrorOptions {
  url?: string;
}

export class ExtractionError extends Error {
  readonly url?: string;

  constructor(message: string, { url, ...options }: ExtractionErrorOptions = {}) {
    super(message, options);
    this.name = 'ExtractionError';
    this.url = url;
  }
}

interface RetrievalErrorOptions extends ExtractionErrorOptions {
  status?: number;
}

export class RetrievalError extends ExtractionError {
  readonly status?: number;

  constructor(message: string, { status, ...options }: RetrievalErrorOptions = {}) {
    super(message, options);
    this.name = 'RetrievalError';
    this.status = status;
  }
}

interface MissingFieldErrorOptions extends ExtractionErrorOptions {
  field: string;
}

export class MissingFieldError extends ExtractionError {
  readonly field: string;

  constructor(message: string, { field, ...options }: MissingFieldErrorOptions) {
    super(message, options);
    this.name = 'MissingFieldError';
    this.field = field;
  }
}

export class ManifestError extends ExtractionError {
  constructor(message: string, options: ExtractionErrorOptions = {}) {
    super(message, options);
    this.name = 'ManifestError';
  }
}

export class UnsupportedUrlError extends ExtractionError {
  constructor(message: string, options: ExtractionErrorOptions = {}) {
    super(message, options);
    this.name = 'UnsupportedUrlError';
  }
}

export function isExtractionError(error: unknown): error is ExtractionError {
  return error instanceof ExtractionError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
