/**
 * Error hierarchy and suggestion tests
 */

import { describe, expect, test } from "vitest";
import {
  ConfigurationError,
  DSVError,
  DSVParseError,
  ERROR_SUGGESTIONS,
  FileError,
  getErrorSuggestion,
  ParseError,
  StreamError,
  ValidationError,
} from "../src/errors";

describe("Error hierarchy", () => {
  test("DSVParseError carries position context", () => {
    const error = new DSVParseError("Unclosed quoted field", 4, 7);

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toBeInstanceOf(DSVError);
    expect(error.message).toBe("Unclosed quoted field (line 4, column 7)");
    expect(error.code).toBe("PARSE_ERROR");
    expect(error.format).toBe("DSV");
    expect(error.lineNumber).toBe(4);
    expect(error.toString()).toBe("DSVParseError: Unclosed quoted field (line 4, column 7)");
  });

  test("ConfigurationError is a ValidationError with its own code", () => {
    const error = new ConfigurationError("Unknown options: bogus", "bogus");

    expect(error).toBeInstanceOf(ValidationError);
    expect(error.code).toBe("CONFIGURATION_ERROR");
    expect(error.option).toBe("bogus");
    expect(error.toString()).toBe(
      'ConfigurationError: Unknown options: bogus\nContext: option "bogus"'
    );
  });

  test("FileError.fromSystemError adds a suggestion", () => {
    const error = FileError.fromSystemError("read", "data.csv", new Error("ENOENT: no such file"));

    expect(error.message).toBe(
      "read operation failed: ENOENT: no such file. Check that the file path is correct and the file exists"
    );
    expect(error.filePath).toBe("data.csv");
    expect(error.operation).toBe("read");
    expect(error.code).toBe("FILE_ERROR");
  });

  test("StreamError", () => {
    const error = new StreamError("Cannot append to a read-only source", "write");
    expect(error.code).toBe("STREAM_ERROR");
    expect(error.streamType).toBe("write");
  });
});

describe("getErrorSuggestion", () => {
  test.each([
    [new DSVParseError("Unclosed quoted field", 1), ERROR_SUGGESTIONS.UNCLOSED_QUOTE],
    [new DSVParseError("Illegal quoting in unquoted field", 1), ERROR_SUGGESTIONS.ILLEGAL_QUOTING],
    [
      new DSVParseError("Unquoted fields do not allow \\r or \\n", 1),
      ERROR_SUGGESTIONS.LINE_BREAK_IN_FIELD,
    ],
    [new ConfigurationError("Unknown options: bogus"), ERROR_SUGGESTIONS.UNKNOWN_OPTION],
    [new FileError("gone", "x.csv", "read"), ERROR_SUGGESTIONS.FILE_ACCESS],
    [new StreamError("read-only", "write"), ERROR_SUGGESTIONS.NOT_WRITABLE],
  ])("%s", (error, suggestion) => {
    expect(getErrorSuggestion(error)).toBe(suggestion);
  });

  test("returns undefined for other errors", () => {
    expect(getErrorSuggestion(new DSVError("something else", "OTHER"))).toBeUndefined();
  });
});
