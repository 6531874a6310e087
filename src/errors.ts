export type ErrorCode =
  | 'CONFIGURATION'
  | 'SEARCH_API'
  | 'FETCH'
  | 'RENDER'
  | 'EXTRACTION'
  | 'INPUT';

export class AppError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Fatal: raised before any company is processed. */
export class ConfigurationError extends AppError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super('CONFIGURATION', `Configuration errors: ${problems.join(', ')}`);
    this.problems = problems;
  }
}

export class InputError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INPUT', message, options);
  }
}

export class SearchApiError extends AppError {
  readonly status: number | undefined;
  readonly transient: boolean;

  constructor(message: string, details: { status?: number; transient: boolean; cause?: unknown }) {
    super('SEARCH_API', message, { cause: details.cause });
    this.status = details.status;
    this.transient = details.transient;
  }
}

export class FetchError extends AppError {
  readonly url: string;
  readonly status: number | undefined;

  constructor(url: string, message: string, details: { status?: number; cause?: unknown } = {}) {
    super('FETCH', message, { cause: details.cause });
    this.url = url;
    this.status = details.status;
  }
}

export class RenderError extends AppError {
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super('RENDER', message, options);
    this.url = url;
  }
}

export class ExtractionError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EXTRACTION', message, options);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
