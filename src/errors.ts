/**
 * Error taxonomy for the report engine.
 *
 * Every error the HTTP surface maps to a status code lives here, so the
 * mapping in `server.ts` can switch on class instead of message text.
 *
 * @module errors
 */

// ---------------------------------------------------------------------------
// Not found
// ---------------------------------------------------------------------------

export class NotFoundError extends Error {
  readonly status = 404;

  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class ClientNotFoundError extends NotFoundError {
  readonly clientId: string;

  constructor(clientId: string) {
    super('Client not found');
    this.name = 'ClientNotFoundError';
    this.clientId = clientId;
  }
}

/** The message names only the template; `templatePath` is for server-side logs. */
export class TemplateNotFoundError extends NotFoundError {
  readonly templateName: string;
  readonly templatePath: string;

  constructor(templateName: string, templatePath: string) {
    super(`Template not found: ${templateName}`);
    this.name = 'TemplateNotFoundError';
    this.templateName = templateName;
    this.templatePath = templatePath;
  }
}

export class ReportFileNotFoundError extends NotFoundError {
  readonly filename: string;

  constructor(filename: string) {
    super('Report file not found');
    this.name = 'ReportFileNotFoundError';
    this.filename = filename;
  }
}

// ---------------------------------------------------------------------------
// Client input
// ---------------------------------------------------------------------------

export class BadRequestError extends Error {
  readonly status: 400 | 405 | 413;

  constructor(message: string, status: 400 | 405 | 413 = 400) {
    super(message);
    this.name = 'BadRequestError';
    this.status = status;
  }
}

export class InvalidFileNameError extends Error {
  readonly status = 400;

  constructor(fileName: string) {
    super(`Invalid file name: "${fileName}" must not contain path separators or '..'`);
    this.name = 'InvalidFileNameError';
  }
}

export class RequestValidationError extends Error {
  readonly status = 422;
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Request validation failed: ${issues.join('; ')}`);
    this.name = 'RequestValidationError';
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Backend failures
// ---------------------------------------------------------------------------

/**
 * DOCX → PDF conversion failed: no backend, non-zero exit, timeout, or a
 * backend that exited cleanly without producing the output file.
 */
export class PdfConversionError extends Error {
  public readonly cause: Error | null;

  constructor(message: string, cause: Error | null = null) {
    super(message);
    this.name = 'PdfConversionError';
    this.cause = cause;
  }
}

/** Raised from `BrandStore.open()` when the store file is unreadable and the policy is `fail`. */
export class StoreLoadError extends Error {
  public readonly cause: Error | null;
  readonly storePath: string;

  constructor(storePath: string, message: string, cause: Error | null = null) {
    super(`Failed to load brand store ${storePath}: ${message}`);
    this.name = 'StoreLoadError';
    this.storePath = storePath;
    this.cause = cause;
  }
}

/**
 * HTTP status for an error thrown anywhere below the server.
 * Anything unclassified is a 500.
 */
export function statusForError(err: unknown): number {
  if (
    err instanceof NotFoundError ||
    err instanceof BadRequestError ||
    err instanceof InvalidFileNameError ||
    err instanceof RequestValidationError
  ) {
    return err.status;
  }
  return 500;
}
