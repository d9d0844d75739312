/**
 * File writing operations using Effect Platform
 *
 * All Effect complexity is hidden behind Promise-based APIs.
 *
 * @module file-writer
 */

import { FileSystem, Path } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";
import { validatePath } from "./file-reader";
import { getPlatform } from "./runtime";

/**
 * Write string to file (overwrites if exists, creates if not)
 *
 * @param path - File path to write to
 * @param content - String content to write
 * @throws {FileError} When write operation fails or path is invalid
 *
 * @example
 * ```typescript
 * await writeString("out.csv", "a,b\n1,2\n");
 * ```
 */
export async function writeString(path: string, content: string): Promise<void> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFileString(validatedPath, content);
  });

  try {
    await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("write", validatedPath, error);
  }
}

/**
 * Append string to file (creates the file and its directory if missing)
 *
 * @param path - File path to append to
 * @param content - String content to append
 * @throws {FileError} When append operation fails
 */
export async function appendString(path: string, content: string): Promise<void> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;

    // Ensure parent directory exists
    const parentDir = pathService.dirname(validatedPath);
    const dirExists = yield* fs.exists(parentDir);
    if (!dirExists) {
      yield* fs.makeDirectory(parentDir, { recursive: true });
    }

    // Open file in append mode
    const file = yield* fs.open(validatedPath, { flag: "a" });
    yield* file.writeAll(new TextEncoder().encode(content));

    // File automatically closes when scope exits
  });

  try {
    await Effect.runPromise(
      program.pipe(
        Effect.scoped, // Required for automatic file handle cleanup
        Effect.provide(getPlatform())
      )
    );
  } catch (error) {
    throw FileError.fromSystemError("write", validatedPath, error);
  }
}
