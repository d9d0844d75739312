/**
 * Error handling for delimited text reading and writing
 *
 * Every error raised by dsvio derives from {@link DSVError}, so callers can
 * catch the whole family with a single `instanceof` check and branch on
 * `code` for the specific failure.
 */

/**
 * Base error class for all dsvio errors
 */
export class DSVError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "DSVError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for values that fail a schema
 */
export class ValidationError extends DSVError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Construction-time option errors: unknown keys, bad separators,
 * unresolvable converter names
 */
export class ConfigurationError extends ValidationError {
  override readonly code = "CONFIGURATION_ERROR";

  constructor(
    message: string,
    public readonly option?: string
  ) {
    super(message, undefined, option && `option "${option}"`);
    this.name = "ConfigurationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends DSVError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * Malformed delimited input, with record and column context
 */
export class DSVParseError extends ParseError {
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
    public readonly field?: string
  ) {
    const context = [
      line !== undefined && `line ${line}`,
      column !== undefined && `column ${column}`,
      field !== undefined && `field "${field}"`,
    ]
      .filter(Boolean)
      .join(", ");

    super(context ? `${message} (${context})` : message, "DSV", line);
    this.name = "DSVParseError";
  }

  /**
   * The message already names the position
   */
  override toString(): string {
    return `${this.name}: ${this.message}`;
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class FileError extends DSVError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }

    return msg;
  }
}

/**
 * Errors from the text source or sink a stream wraps
 */
export class StreamError extends DSVError {
  constructor(
    message: string,
    public readonly streamType: "read" | "write",
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}

/**
 * Error recovery suggestions for common issues
 */
export const ERROR_SUGGESTIONS = {
  UNCLOSED_QUOTE: 'Every quoted field needs a closing ", and quotes inside it must be doubled ("")',
  ILLEGAL_QUOTING: "Fields containing quotes must be quoted as a whole, with inner quotes doubled",
  LINE_BREAK_IN_FIELD: "Fields containing line breaks must be quoted, or rowSep may be wrong",
  UNKNOWN_OPTION: "Check option names for typos; unrecognized keys are rejected",
  NOT_WRITABLE: "Construct the stream over a writable source such as StringStream",
  FILE_ACCESS: "Check that the file exists and is readable",
} as const;

/**
 * Get helpful suggestion for common error patterns
 */
export function getErrorSuggestion(error: DSVError): string | undefined {
  const message = error.message.toLowerCase();

  if (error instanceof ConfigurationError) {
    return ERROR_SUGGESTIONS.UNKNOWN_OPTION;
  }
  if (error instanceof FileError) {
    return ERROR_SUGGESTIONS.FILE_ACCESS;
  }
  if (error instanceof StreamError) {
    return ERROR_SUGGESTIONS.NOT_WRITABLE;
  }
  if (message.includes("unclosed")) {
    return ERROR_SUGGESTIONS.UNCLOSED_QUOTE;
  }
  if (message.includes("\\r or \\n")) {
    return ERROR_SUGGESTIONS.LINE_BREAK_IN_FIELD;
  }
  if (message.includes("quot")) {
    return ERROR_SUGGESTIONS.ILLEGAL_QUOTING;
  }

  return undefined;
}
