/**
 * Base application error. All domain-specific errors extend this class.
 *
 * - `code`          short machine-readable identifier (e.g. "SOURCE_UNREADABLE")
 * - `exitCode`      process exit status the CLI uses when this error aborts a run
 * - `isOperational` true = expected/recoverable, false = programmer error
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly exitCode: number;
  public readonly isOperational: boolean;
  public readonly timestamp: string;

  constructor(
    message: string,
    code: string,
    exitCode = 1,
    isOperational = true,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.exitCode = exitCode;
    this.isOperational = isOperational;
    this.timestamp = new Date().toISOString();

    // Maintains proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      exitCode: this.exitCode,
      isOperational: this.isOperational,
      timestamp: this.timestamp,
      ...(process.env['NODE_ENV'] !== 'production' ? { stack: this.stack } : {}),
    };
  }
}

/**
 * The candidate list could not be opened or is structurally broken.
 * Raised before any candidate reaches the pipeline.
 */
export class SourceError extends AppError {
  public readonly path: string;
  public readonly line?: number;

  constructor(
    message: string,
    code: 'SOURCE_UNREADABLE' | 'SOURCE_MALFORMED',
    path: string,
    line?: number,
    options?: { cause?: unknown },
  ) {
    super(message, code, 1, true, options);
    this.path = path;
    this.line = line;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      path: this.path,
      line: this.line,
    };
  }
}

export class ReportError extends AppError {
  public readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, 'REPORT_WRITE_FAILED', 1, true, options);
    this.path = path;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      path: this.path,
    };
  }
}

/**
 * A single proxy failed its test. Never escapes the verifier: it is
 * folded into a Failure outcome carrying `message` as the reason.
 */
export class VerificationError extends AppError {
  public readonly proxyHost: string;

  constructor(message: string, code: string, proxyHost: string) {
    super(message, code);
    this.proxyHost = proxyHost;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      proxyHost: this.proxyHost,
    };
  }
}

export class ChannelClosedError extends AppError {
  constructor() {
    super('Cannot send on a closed channel', 'CHANNEL_CLOSED', 1, false);
  }
}

export class ValidationError extends AppError {
  public readonly field: string;
  public readonly value: unknown;

  constructor(message: string, field: string, value?: unknown) {
    super(message, 'VALIDATION_ERROR', 2);
    this.field = field;
    this.value = value;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      field: this.field,
      value: this.value,
    };
  }
}

/**
 * Type guard to distinguish operational errors (expected) from
 * programmer errors (bugs). The CLI prints operational errors as a
 * one-line message and logs everything else with a stack.
 */
export function isOperationalError(error: unknown): error is AppError {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
