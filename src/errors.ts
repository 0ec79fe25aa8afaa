// ─── Errors ─────────────────────────────────────────────────────────────────
//
// Only precondition violations and sub-parser failures are thrown. Unknown
// formats and unusable arguments never reach here: they are rendered inline
// as diagnostics.

export enum ErrorSeverity {
  /** The surrounding render can carry on */
  Recoverable = 'recoverable',
  /** The render must stop */
  Fatal = 'fatal',
}

export interface ExpansionErrorOptions {
  code: string;
  severity: ErrorSeverity;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base class for every error the expander or its parsers throw.
 */
export class ExpansionError extends Error {
  /** A stable code identifying the kind of failure */
  public readonly code: string;
  public readonly severity: ErrorSeverity;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, options: ExpansionErrorOptions) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code;
    this.severity = options.severity;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/** A placeholder node did not have its three expected children. */
export class MalformedPlaceholderError extends ExpansionError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Malformed raw block placeholder: ${reason}`, {
      code: 'MALFORMED_PLACEHOLDER',
      severity: ErrorSeverity.Fatal,
      details,
    });
  }
}

/** An embedded-language parser could not handle its input. */
export class SubParserError extends ExpansionError {
  public readonly parser: string;

  constructor(parser: string, message: string, options: { details?: Record<string, unknown>; cause?: unknown } = {}) {
    super(`${parser}: ${message}`, {
      code: 'SUBPARSER_FAILED',
      severity: ErrorSeverity.Fatal,
      details: { parser, ...options.details },
      cause: options.cause,
    });
    this.parser = parser;
  }
}

export class DocbookParseError extends SubParserError {
  constructor(message: string, line?: number, column?: number) {
    super('docbook', message, { details: { line, column } });
  }
}

export class ConfigError extends ExpansionError {
  constructor(message: string, issues: string[]) {
    super(message, {
      code: 'INVALID_CONFIG',
      severity: ErrorSeverity.Fatal,
      details: { issues },
    });
  }
}
