/**
 * @module formats/dsv/validation
 * @description Construction-time validation of DSV options
 *
 * Options are checked once, when a stream or writer is built. Undeclared
 * keys are rejected rather than ignored.
 */

import { type } from "arktype";
import { ConfigurationError } from "../../errors";
import { AUTO_ROW_SEP, QUOTE } from "./constants";
import type { DSVOptions } from "./types";

// =============================================================================
// ARKTYPE VALIDATION SCHEMAS
// =============================================================================

/**
 * ArkType validation schema for stream options
 */
export const DSVOptionsSchema = type({
  "+": "reject",
  "colSep?": "string > 0",
  "rowSep?": "string > 0",
  "converters?": "string | object",
  "headers?": "boolean | string | unknown[]",
  "returnHeaders?": "boolean",
  "headerConverters?": "string | object",
  "skipBlanks?": "boolean",
  "onWarning?": "unknown",
}).narrow((options, ctx) => {
  if (options.onWarning !== undefined && typeof options.onWarning !== "function") {
    return ctx.reject({
      path: ["onWarning"],
      expected: "a function",
      actual: typeof options.onWarning,
    });
  }

  if (options.colSep?.includes(QUOTE)) {
    return ctx.reject({
      path: ["colSep"],
      expected: "a separator without quote characters",
      actual: JSON.stringify(options.colSep),
    });
  }

  if (
    options.rowSep !== undefined &&
    options.rowSep !== AUTO_ROW_SEP &&
    options.rowSep === (options.colSep ?? ",")
  ) {
    return ctx.reject({
      path: ["rowSep", "colSep"],
      expected: "different row and column separators",
      actual: "same separator for both",
    });
  }

  return true;
});

/**
 * ArkType validation schema for writer options
 */
export const DSVWriterOptionsSchema = type({
  "+": "reject",
  "colSep?": "string > 0",
  "rowSep?": "string > 0",
}).narrow((options, ctx) => {
  if (options.colSep?.includes(QUOTE)) {
    return ctx.reject({
      path: ["colSep"],
      expected: "a separator without quote characters",
      actual: JSON.stringify(options.colSep),
    });
  }
  return true;
});

/**
 * Copy of `options` without the keys whose value is `undefined`, which
 * count as left out
 */
export function definedOptions(options: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(options).filter(([, value]) => value !== undefined));
}

const KNOWN_OPTIONS: ReadonlySet<string> = new Set([
  "colSep",
  "rowSep",
  "converters",
  "headers",
  "returnHeaders",
  "headerConverters",
  "skipBlanks",
  "onWarning",
]);

/**
 * Keys of `options` that DSVStream does not recognize
 */
export function unknownOptionKeys(options: object): string[] {
  return Object.keys(options).filter((key) => !KNOWN_OPTIONS.has(key));
}

/**
 * Validate stream options
 * @throws {ConfigurationError} Naming unknown keys first, otherwise with the schema summary
 */
export function validateOptions(options: DSVOptions): void {
  const unknown = unknownOptionKeys(options);
  if (unknown.length > 0) {
    throw new ConfigurationError(`Unknown options: ${unknown.join(", ")}`, unknown[0]);
  }

  const validation = DSVOptionsSchema(definedOptions(options));
  if (validation instanceof type.errors) {
    throw new ConfigurationError(`Invalid DSV options: ${validation.summary}`);
  }
}
