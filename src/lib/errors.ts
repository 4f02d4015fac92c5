/**
 * Error taxonomy shared by the pipeline, the drivers and the CLI.
 *
 * Every error is terminal: nothing in lingopipe retries. Errors raised while a
 * translation is in flight carry the diagnostics gathered up to that point so
 * callers can show masked request/response previews on failure.
 */

export type PipelineStage =
  | 'start'
  | 'pre-validate'
  | 'mask'
  | 'build-request'
  | 'authenticate'
  | 'transmit'
  | 'parse-response'
  | 'unmask'
  | 'post-validate'
  | 'normalize-usage';

export interface Diagnostics {
  stage?: PipelineStage;
  modelKey?: string;
  preparedLength?: number;
  httpStatus?: number;
  debugRequest?: string;
  debugResponse?: string;
  rawResponseBody?: string;
}

export type ErrorCode =
  | 'CONFIGURATION'
  | 'MISSING_REQUIRED_CONFIG'
  | 'TEMPLATE_NOT_FOUND'
  | 'FORMAT_NOT_FOUND'
  | 'AUTH'
  | 'VALIDATION'
  | 'TRANSPORT'
  | 'VENDOR_API'
  | 'RESPONSE_MALFORMED'
  | 'TRUNCATED'
  | 'MARKERS_NOT_FOUND';

export class LingopipeError extends Error {
  readonly code: ErrorCode;
  diagnostics: Diagnostics;

  constructor(code: ErrorCode, message: string, diagnostics: Diagnostics = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.diagnostics = diagnostics;
  }

  /** Merge pipeline context into the error without overwriting what the thrower recorded. */
  withDiagnostics(extra: Diagnostics): this {
    this.diagnostics = { ...extra, ...this.diagnostics };
    return this;
  }
}

/** Unknown model or vendor, unsupported format, bad registry or prompt document. */
export class ConfigurationError extends LingopipeError {
  constructor(message: string, diagnostics?: Diagnostics, code: ErrorCode = 'CONFIGURATION') {
    super(code, message, diagnostics);
  }
}

/** A model name or per-call variable the driver cannot work without. Raised before any I/O. */
export class MissingRequiredConfigError extends ConfigurationError {
  constructor(message: string, diagnostics?: Diagnostics) {
    super(message, diagnostics, 'MISSING_REQUIRED_CONFIG');
  }
}

export class TemplateNotFoundError extends ConfigurationError {
  constructor(kind: string) {
    super(`Prompt group '${kind}' not found`, undefined, 'TEMPLATE_NOT_FOUND');
  }
}

export class FormatNotFoundError extends ConfigurationError {
  constructor(kind: string, format: string) {
    super(`Prompt '${kind}.${format}' not found`, undefined, 'FORMAT_NOT_FOUND');
  }
}

export class AuthError extends LingopipeError {
  constructor(message: string, diagnostics?: Diagnostics) {
    super('AUTH', message, diagnostics);
  }
}

/** Pre/post syntax failure or schema mismatch; the translation is never partially applied. */
export class ValidationError extends LingopipeError {
  readonly errors: string[];

  constructor(message: string, errors: string[], diagnostics?: Diagnostics) {
    super('VALIDATION', errors.length > 0 ? `${message}:\n- ${errors.join('\n- ')}` : message, diagnostics);
    this.errors = errors;
  }
}

export class TransportError extends LingopipeError {
  readonly status?: number;
  readonly body?: string;

  constructor(message: string, options: { status?: number; body?: string; cause?: unknown } = {}) {
    super('TRANSPORT', message, {
      ...(options.status !== undefined ? { httpStatus: options.status } : {}),
      ...(options.body !== undefined ? { rawResponseBody: options.body } : {}),
    });
    this.status = options.status;
    this.body = options.body;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/** The vendor answered with its own structured error envelope. */
export class VendorApiError extends LingopipeError {
  readonly vendor: string;

  constructor(vendor: string, message: string) {
    super('VENDOR_API', message);
    this.vendor = vendor;
  }
}

export class ResponseFormatError extends LingopipeError {}

export class ResponseMalformedError extends ResponseFormatError {
  constructor(message: string) {
    super('RESPONSE_MALFORMED', message);
  }
}

export class TruncatedError extends ResponseFormatError {
  constructor(message: string) {
    super('TRUNCATED', message);
  }
}

export class MarkersNotFoundError extends ResponseFormatError {
  constructor(vendorName: string) {
    super('MARKERS_NOT_FOUND', `Markers not found in ${vendorName} response`);
  }
}

export function isLingopipeError(error: unknown): error is LingopipeError {
  return error instanceof LingopipeError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
