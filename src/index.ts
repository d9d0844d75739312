/**
 * dsvio - streaming reader and writer for delimiter-separated text
 *
 * CSV and its dialects, one record at a time, with the distinction between
 * absent and empty fields kept intact.
 */

// Error types
export {
  ConfigurationError,
  DSVError,
  DSVParseError,
  ERROR_SUGGESTIONS,
  FileError,
  getErrorSuggestion,
  ParseError,
  StreamError,
  ValidationError,
} from "./errors";

// DSV format
export * from "./formats/dsv";

// Text sources and file I/O infrastructure
export { getSize, readToString } from "./io/file-reader";
export { appendString, writeString } from "./io/file-writer";
export { getPlatform } from "./io/runtime";
export { isTextSink, StringStream, type TextSink, type TextSource } from "./io/text-source";

// Core types
export type { FilePath, FileReaderOptions } from "./types";
export { FilePathSchema, FileReaderOptionsSchema } from "./types";
