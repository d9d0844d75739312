/**
 * Shared types and validation schemas for file I/O
 */

import { type } from "arktype";

/**
 * File path validation schema
 *
 * Rejects null bytes and directory traversal; collapses repeated and
 * backslash separators.
 */
export const FilePathSchema = type("string > 0")
  .narrow((path, ctx) => {
    if (path.includes("\0")) {
      return ctx.reject({ expected: "a path without null characters", actual: "a null character" });
    }
    if (/(^|[\\/])\.\.([\\/]|$)/.test(path)) {
      return ctx.reject({ expected: "a path without '..' segments", actual: path });
    }
    return true;
  })
  .pipe((path) => path.replace(/[\\/]+/g, "/"));

/**
 * A file path that passed {@link FilePathSchema}
 */
export type FilePath = typeof FilePathSchema.infer;

/**
 * Options for reading whole files
 */
export interface FileReaderOptions {
  /** Largest file, in bytes, that will be read into memory */
  maxFileSize?: number;
}

/**
 * File reader options validation schema
 */
export const FileReaderOptionsSchema = type({
  "+": "reject",
  "maxFileSize?": "number >= 0",
});
