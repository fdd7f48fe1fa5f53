export class AppError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidInputError extends AppError {
  constructor(message: string, statusCode = 400) {
    super(message, statusCode);
  }
}

export class JobNotFoundError extends AppError {
  constructor(jobId: string) {
    super(`Job ${jobId} not found`, 404);
  }
}

export class JobNotReadyError extends AppError {
  constructor(jobId: string) {
    super(`Job ${jobId} is not ready`, 409);
  }
}

export class JobFailedError extends AppError {
  constructor(jobId: string, reason: string | null) {
    super(reason ? `Job ${jobId} failed: ${reason}` : `Job ${jobId} failed`, 422);
  }
}

export class JobExpiredError extends AppError {
  constructor(jobId: string) {
    super(`Output of job ${jobId} is no longer available`, 410);
  }
}

/** Raised by a format handler when one file cannot be converted. */
export class ItemConversionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ItemConversionError';
  }
}

export class ConversionTimeoutError extends ItemConversionError {
  constructor(timeoutMs: number) {
    super(`Conversion timed out after ${timeoutMs}ms`);
    this.name = 'ConversionTimeoutError';
  }
}

export class PackagingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PackagingError';
  }
}

export const toErrorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
